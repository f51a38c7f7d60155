import createDebug from 'debug';
import type { Overrides } from '../domain/types.js';
import { Provider } from './provider.js';

const debug = createDebug('depot:provider');

/** Holder for a constructed instance; `undefined` is a valid instance. */
interface Cached<T> {
  value: T;
}

/**
 * Provider that constructs at most once and hands the same instance to every
 * caller until `reset()`. Shared by `Singleton` and `Resource`.
 *
 * A factory that throws leaves the cache empty, so the next `resolve()` retries.
 * A factory returning a promise has the promise cached, so concurrent awaiters
 * share one construction; if it rejects, the cache is emptied again.
 * Only native promises are watched: other objects with a `then` method are
 * cached untouched.
 */
export abstract class CachedProvider<T = unknown> extends Provider<T> {
  protected cached: Cached<T> | undefined;

  /**
   * Returns the cached instance, constructing it on first call.
   * Overrides only take effect on the call that constructs.
   */
  resolve(overrides?: Overrides): T {
    if (this.cached) return this.cached.value;

    const value = this.construct(overrides);
    const entry: Cached<T> = { value };
    this.cached = entry;

    if (value instanceof Promise) {
      void value.catch((error: unknown) => {
        if (this.cached === entry) this.cached = undefined;
        debug('%s construction rejected, cache cleared: %O', this.kind, error);
      });
    }

    return value;
  }

  isResolved(): boolean {
    return this.cached !== undefined;
  }

  /**
   * Drops the cached instance without any teardown.
   * The next `resolve()` constructs a new one.
   */
  reset(): void {
    this.cached = undefined;
  }
}
