import type { Overrides } from '../domain/types.js';
import { Provider } from './provider.js';

/**
 * Constructs a new instance on every `resolve()`, from that call's merged
 * arguments. Nothing is cached or tracked.
 *
 * @example
 * ```typescript
 * const request = new Factory(
 *   (id: string, opts: { user: string }) => new Request(id, opts.user),
 *   { named: { user: 'anonymous' } },
 * );
 * request.resolve({ args: ['r-1'] }); // new Request('r-1', 'anonymous')
 * request.resolve({ args: ['r-2'], named: { user: 'ada' } });
 * ```
 */
export class Factory<T = unknown> extends Provider<T> {
  readonly kind = 'factory' as const;

  resolve(overrides?: Overrides): T {
    return this.construct(overrides);
  }

  isResolved(): boolean {
    return false;
  }
}
