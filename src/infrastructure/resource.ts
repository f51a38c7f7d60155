import createDebug from 'debug';
import type { Bindings, FactoryFn } from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import { CachedProvider } from './cached-provider.js';

const debug = createDebug('depot:provider');

const validator = new Validator();

/** Teardown routine of a resource; receives the settled instance. */
export type ReleaseFn<T> = (instance: Awaited<T>) => void | Promise<void>;

/**
 * A singleton whose instance needs explicit teardown, such as a connection
 * pool. Release is never automatic: call `release()` directly, or
 * `container.shutdown()` to release every live resource.
 *
 * After `release()` the cache is empty, so a later `resolve()` builds a
 * fresh instance that needs releasing again.
 *
 * @example
 * ```typescript
 * const pool = new Resource(
 *   (url: string) => createPool(url),
 *   (p) => p.end(),
 *   { args: [container.config.ref('database.url')] },
 * );
 * ```
 */
export class Resource<T = unknown> extends CachedProvider<T> {
  readonly kind = 'resource' as const;

  private readonly releaseFn: ReleaseFn<T>;

  constructor(factory: FactoryFn<T>, release: ReleaseFn<T>, bindings?: Bindings) {
    super(factory, bindings);
    validator.validateCallable('Resource', 'release', release);
    this.releaseFn = release;
  }

  /**
   * Runs the release routine on the live instance, at most once per instance.
   * The instance is awaited first, so a thenable instance is settled here
   * and its result is what the release routine receives.
   * No-op when nothing has been resolved or it was already released.
   * Errors from the release routine propagate unchanged.
   */
  async release(): Promise<void> {
    const entry = this.cached;
    if (!entry) return;
    this.cached = undefined;

    let instance: Awaited<T>;
    try {
      instance = await entry.value;
    } catch (error) {
      debug('resource construction had failed, nothing to release: %O', error);
      return;
    }

    debug('release %s', this.factory.name || '<anonymous>');
    await this.releaseFn(instance);
  }
}
