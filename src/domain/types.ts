/**
 * Any function that builds an instance from its bound arguments.
 * Named arguments, when present, arrive as one trailing object.
 *
 * @example
 * ```typescript
 * const build: FactoryFn<Database> = (url: string) => new Database(url);
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: factories accept whatever their bindings supply
export type FactoryFn<T = unknown> = (...args: any[]) => T;

/** Lifecycle policy of a provider. */
export type ProviderKind = 'singleton' | 'factory' | 'resource';

/** Named arguments, passed to the factory as its last parameter. */
export type NamedArgs = Record<string, unknown>;

/**
 * Arguments fixed on a provider at registration time.
 * Values may be plain, nested providers, deferred references or lazy wrappers.
 */
export interface Bindings {
  args?: readonly unknown[];
  named?: NamedArgs;
}

/**
 * Extra arguments supplied at resolution time.
 * Positional values are appended; named values win on collision.
 */
export interface Overrides {
  args?: readonly unknown[];
  named?: NamedArgs;
}

export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | readonly ConfigValue[] | ConfigNode;

/** A nested configuration tree. Arrays are treated as leaves. */
export interface ConfigNode {
  readonly [key: string]: ConfigValue;
}

/**
 * Options accepted by `createContainer()`.
 */
export interface ContainerOptions {
  /** Shown by `toString()` and `inspect()`. */
  name?: string;
  /** Initial configuration, loaded into `container.config`. */
  config?: ConfigNode;
}

/**
 * Serializable summary of every registered provider.
 */
export interface ContainerGraph {
  name?: string;
  providers: Record<string, ProviderInfo>;
}

/**
 * Metadata about a single registration.
 */
export interface ProviderInfo {
  name: string;
  /** `undefined` when nothing is registered under `name`. */
  kind: ProviderKind | undefined;
  /** Whether a cached instance is currently held. Always `false` for factories. */
  resolved: boolean;
}

// ── Ports ───────────────────────────────────────────────────────────────────

export interface IValidator {
  validateCallable(owner: string, role: string, value: unknown): void;
  suggestKey(key: string, registered: readonly string[]): string | undefined;
}

export interface ICycleDetector {
  enter(key: string): void;
  leave(key: string): void;
  isResolving(key: string): boolean;
  chain(): string[];
}

/** What the use cases see of a registered provider. */
export interface Registration {
  readonly kind: ProviderKind;
  isResolved(): boolean;
}

/** A registration holding something that must be torn down. */
export interface Releasable extends Registration {
  release(): Promise<void>;
}

/** Read side of the name registry. */
export interface IRegistry {
  getName(): string | undefined;
  get(name: string): Registration | undefined;
  entries(): Iterable<[string, Registration]>;
}

/** Resolves a registered name, used by the eager-loading use case. */
export type ResolveFn = (name: string) => unknown;
