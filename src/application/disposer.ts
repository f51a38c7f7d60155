import createDebug from 'debug';
import type { Registration, Releasable } from '../domain/types.js';

const debug = createDebug('depot:container');

/**
 * Use Case: release every live resource in reverse registration order.
 * Calls `release()` on each, collects errors, then rethrows them.
 */
export class Disposer {
  constructor(private readonly registrations: readonly Registration[]) {}

  async dispose(): Promise<void> {
    const live = this.registrations.filter(
      (registration): registration is Releasable =>
        isReleasable(registration) && registration.isResolved(),
    );
    debug('shutdown: %d live resources', live.length);

    const errors: unknown[] = [];
    for (const resource of [...live].reverse()) {
      try {
        await resource.release();
      } catch (error) {
        errors.push(error);
      }
    }

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `shutdown() encountered ${errors.length} errors`);
    }
  }
}

function isReleasable(registration: Registration): registration is Releasable {
  return 'release' in registration && typeof registration.release === 'function';
}
