import type { ResolveFn } from '../domain/types.js';

/**
 * Use Case: resolve a set of names eagerly and wait for async instances.
 * Names are resolved one after another, in the order given, so a later
 * name can rely on an earlier one being constructed.
 */
export class Preloader {
  constructor(private readonly resolve: ResolveFn) {}

  async preload(names: readonly string[]): Promise<void> {
    for (const name of names) {
      await this.resolve(name);
    }
  }
}
