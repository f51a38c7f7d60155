import createDebug from 'debug';
import type { Bindings, FactoryFn, NamedArgs, Overrides, ProviderKind } from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import { isDeferred, isLazy } from './deferred.js';

const debug = createDebug('depot:provider');

const validator = new Validator();

/**
 * Arguments ready to be passed to a factory.
 */
export interface ResolvedArguments {
  args: unknown[];
  /** `undefined` when neither bindings nor overrides name anything. */
  named: NamedArgs | undefined;
}

/**
 * Base class of every provider: a factory plus the arguments bound to it
 * at registration time. Subclasses decide how often `construct()` runs.
 */
export abstract class Provider<T = unknown> {
  abstract readonly kind: ProviderKind;

  protected readonly factory: FactoryFn<T>;
  protected readonly bindings: Readonly<Bindings>;

  constructor(factory: FactoryFn<T>, bindings: Bindings = {}) {
    validator.validateCallable(new.target.name, 'factory', factory);
    this.factory = factory;
    this.bindings = {
      args: [...(bindings.args ?? [])],
      named: { ...bindings.named },
    };
  }

  /**
   * Returns an instance according to the provider's lifecycle policy.
   * Errors thrown by the factory propagate unchanged.
   */
  abstract resolve(overrides?: Overrides): T;

  /** Whether a cached instance is currently held. */
  abstract isResolved(): boolean;

  /**
   * Calls the factory with merged, resolved arguments.
   * Named arguments are appended as one object, only when there are any.
   */
  protected construct(overrides?: Overrides): T {
    const { args, named } = resolveArguments(this.bindings, overrides);
    debug(
      'construct %s %s args=%d named=%o',
      this.kind,
      this.factory.name || '<anonymous>',
      args.length,
      named ? Object.keys(named) : [],
    );
    return named ? this.factory(...args, named) : this.factory(...args);
  }
}

/**
 * Turns one bound value into what the factory receives:
 * nested providers are resolved, deferred references invoked,
 * lazy wrappers become getters, everything else passes through.
 */
export function resolveArgument(value: unknown): unknown {
  if (value instanceof Provider) return value.resolve();
  if (isDeferred(value)) return value();
  if (isLazy(value)) return value.get;
  return value;
}

/**
 * Merges bound and call-time arguments, then resolves each value in order:
 * bound positional, override positional, then named.
 * A named override replaces the bound value before it is resolved.
 */
export function resolveArguments(
  bindings: Readonly<Bindings>,
  overrides?: Overrides,
): ResolvedArguments {
  const positional = [...(bindings.args ?? []), ...(overrides?.args ?? [])];
  const args = positional.map(resolveArgument);

  const merged: NamedArgs = { ...bindings.named, ...overrides?.named };
  const keys = Object.keys(merged);
  if (keys.length === 0) return { args, named: undefined };

  const named: NamedArgs = {};
  for (const key of keys) {
    named[key] = resolveArgument(merged[key]);
  }
  return { args, named };
}
