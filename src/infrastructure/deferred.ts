import type { Container } from '../application/container.js';
import type { Overrides } from '../domain/types.js';
import type { Provider } from './provider.js';

/**
 * Symbol used to mark a zero-argument function as a deferred reference.
 * Providers invoke marked functions when resolving their arguments;
 * unmarked functions are passed through as plain values.
 */
export const DEFERRED_MARKER = Symbol.for('depot-di:deferred');

/** Symbol used to mark a lazy argument wrapper. */
export const LAZY_MARKER = Symbol.for('depot-di:lazy');

/**
 * A zero-argument callable that looks something up when invoked, never before.
 */
export interface Deferred<T = unknown> {
  (): T;
  readonly [DEFERRED_MARKER]: true;
  /** What the reference points at, e.g. `db` or `config:database.url`. */
  readonly target: string;
}

/**
 * Argument wrapper: the provider passes a getter instead of the resolved value.
 */
export interface Lazy<T = unknown> {
  readonly [LAZY_MARKER]: true;
  readonly get: () => T;
}

/**
 * Marks `lookup` as a deferred reference.
 * @internal Used by `deferred()` and `ConfigStore.ref()`.
 */
export function createDeferred<T>(target: string, lookup: () => T): Deferred<T> {
  return Object.assign(() => lookup(), {
    [DEFERRED_MARKER]: true as const,
    target,
  });
}

/**
 * Creates a reference to `name` in `container`. Nothing is looked up until
 * the reference is invoked, so the referenced provider may be registered later.
 *
 * @example
 * ```typescript
 * container.register('userService', new Singleton(
 *   (repo: UserRepository) => new UserService(repo),
 *   { args: [deferred(container, 'userRepo')] },
 * ));
 * container.register('userRepo', new Singleton(() => new PgUserRepo()));
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: `any` allows interfaces without index signatures
export function deferred<R extends Record<string, any>, K extends keyof R & string>(
  container: Container<R>,
  name: K,
  overrides?: Overrides,
): Deferred<R[K]> {
  return createDeferred(name, () => container.resolve(name, overrides));
}

/**
 * Wraps a deferred reference or a provider so the consuming factory receives
 * a getter. The getter is only called when the instance needs the value,
 * which lets two providers hold each other.
 *
 * @example
 * ```typescript
 * container.register('a', new Singleton(
 *   (getB: () => B) => new A(getB),
 *   { args: [lazy(deferred(container, 'b'))] },
 * ));
 * ```
 */
export function lazy<T>(source: Deferred<T> | Provider<T>): Lazy<T> {
  if (isDeferred(source)) {
    const ref = source;
    return { [LAZY_MARKER]: true, get: () => ref() };
  }
  const provider = source;
  return { [LAZY_MARKER]: true, get: () => provider.resolve() };
}

/** Checks if a value is a deferred reference. */
export function isDeferred(value: unknown): value is Deferred {
  return (
    typeof value === 'function' &&
    DEFERRED_MARKER in value &&
    value[DEFERRED_MARKER] === true
  );
}

/** Checks if a value is a lazy wrapper. */
export function isLazy(value: unknown): value is Lazy {
  return (
    value !== null &&
    typeof value === 'object' &&
    LAZY_MARKER in value &&
    value[LAZY_MARKER] === true
  );
}
