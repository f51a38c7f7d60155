import { CachedProvider } from './cached-provider.js';

/**
 * Constructs the instance on first `resolve()` and returns that same
 * instance to every later caller. Arguments passed after the first call
 * are ignored.
 *
 * @example
 * ```typescript
 * const db = new Singleton(
 *   (url: string) => new Database(url),
 *   { args: [container.config.ref('database.url')] },
 * );
 * db.resolve() === db.resolve(); // true
 * ```
 */
export class Singleton<T = unknown> extends CachedProvider<T> {
  readonly kind = 'singleton' as const;
}
