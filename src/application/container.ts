import createDebug from 'debug';
import { CircularDependencyError, ProviderConfigError, ProviderNotFoundError } from '../domain/errors.js';
import type {
  ContainerGraph,
  ContainerOptions,
  ICycleDetector,
  IValidator,
  Overrides,
  ProviderInfo,
} from '../domain/types.js';
import { Validator, describeType } from '../domain/validation.js';
import { CachedProvider } from '../infrastructure/cached-provider.js';
import { ConfigStore } from '../infrastructure/config-store.js';
import { CycleDetector } from '../infrastructure/cycle-detector.js';
import { Provider } from '../infrastructure/provider.js';
import { Registry } from '../infrastructure/registry.js';
import { Disposer } from './disposer.js';
import { Introspection } from './introspection.js';
import { Preloader } from './preloader.js';

const debug = createDebug('depot:container');

/**
 * Named registry of providers plus one configuration store.
 *
 * Registration is purely declarative: nothing is constructed and no
 * dependency is checked until a name is resolved. Pass a contract type to
 * get typed `register()` and `resolve()`.
 *
 * @example
 * ```typescript
 * interface AppDeps { db: Database; users: UserService }
 *
 * const container = new Container<AppDeps>();
 * container.config.load({ database: { url: 'mysql://localhost/app' } });
 * container
 *   .register('db', new Singleton((url: string) => new Database(url), {
 *     args: [container.config.ref('database.url')],
 *   }))
 *   .register('users', new Singleton((db: Database) => new UserService(db), {
 *     args: [deferred(container, 'db')],
 *   }));
 *
 * container.resolve('users'); // UserService
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: `any` allows interfaces without index signatures
export class Container<R extends Record<string, any> = Record<string, unknown>> {
  /** The configuration store. Never part of the name registry. */
  readonly config = new ConfigStore();

  private readonly registry: Registry;
  private readonly retired: Provider[] = [];
  private readonly cycleDetector: ICycleDetector = new CycleDetector();
  private readonly validator: IValidator = new Validator();
  private readonly introspection: Introspection;

  constructor(options: ContainerOptions = {}) {
    this.registry = new Registry(options.name);
    if (options.config) this.config.load(options.config);
    this.introspection = new Introspection(this.registry);
  }

  /**
   * Binds `name` to `provider`. A later registration under the same name
   * replaces the binding and moves it to the end of registration order.
   * Instances already handed out by the replaced provider stay with their
   * holders; a replaced resource is still released by `shutdown()`.
   */
  register<K extends keyof R & string>(name: K, provider: Provider<R[K]>): this {
    if (!(provider instanceof Provider)) {
      throw new ProviderConfigError(
        `Registration '${name}'`,
        'provider',
        describeType(provider),
        'a Provider',
      );
    }

    const previous = this.registry.get(name);
    if (previous) {
      this.registry.delete(name);
      if (previous.isResolved()) {
        debug(
          'register %s: replacing a resolved %s, existing holders keep the old instance',
          name,
          previous.kind,
        );
      }
      if (previous.kind === 'resource') this.retired.push(previous);
    }

    this.registry.set(name, provider);
    debug('register %s (%s)', name, provider.kind);
    return this;
  }

  /**
   * Resolves `name` through its provider.
   *
   * @throws ProviderNotFoundError if nothing is registered under `name`.
   * @throws CircularDependencyError if `name` is already being constructed.
   */
  resolve<K extends keyof R & string>(name: K, overrides?: Overrides): R[K] {
    // Registration is typed against R, so the provider under `name` yields R[K].
    return this.resolveName(name, overrides) as R[K];
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  /** Registered names, in registration order. */
  keys(): string[] {
    return this.registry.keys();
  }

  /**
   * Drops cached instances, forcing construction on next resolve.
   * No teardown is run. Without names, every caching provider is reset.
   */
  reset(...names: (keyof R & string)[]): void {
    const targets = names.length > 0 ? names : this.keys();
    for (const name of targets) {
      const provider = this.registry.get(name);
      if (provider instanceof CachedProvider) provider.reset();
    }
  }

  /**
   * Resolves every registered resource in registration order and awaits
   * the ones whose factories are async.
   */
  async initResources(): Promise<void> {
    await new Preloader((name) => this.resolveName(name)).preload(this.resourceNames());
  }

  /**
   * Releases every live resource in reverse registration order; resources
   * replaced by a later registration go last. Continues past failures and
   * rethrows them afterwards.
   */
  async shutdown(): Promise<void> {
    const live = [...this.retired, ...this.registry.values()];
    this.retired.length = 0;
    await new Disposer(live).dispose();
  }

  inspect(): ContainerGraph {
    return this.introspection.inspect();
  }

  describe(name: string): ProviderInfo {
    return this.introspection.describe(name);
  }

  toString(): string {
    return this.introspection.toString();
  }

  private resolveName(name: string, overrides?: Overrides): unknown {
    const provider = this.registry.get(name);
    if (!provider) {
      const registered = this.keys();
      const suggestion = this.validator.suggestKey(name, registered);
      throw new ProviderNotFoundError(name, this.cycleDetector.chain(), registered, suggestion);
    }

    if (this.cycleDetector.isResolving(name)) {
      throw new CircularDependencyError(name, this.cycleDetector.chain());
    }

    this.cycleDetector.enter(name);
    try {
      return provider.resolve(overrides);
    } finally {
      this.cycleDetector.leave(name);
    }
  }

  private resourceNames(): string[] {
    return this.keys().filter((name) => this.registry.get(name)?.kind === 'resource');
  }
}
