import type { ICycleDetector } from '../domain/types.js';

/**
 * Tracks which names are currently being resolved, in order, so a repeated
 * name can be reported together with the chain that led to it.
 * `enter`/`leave` must be balanced (use try/finally).
 */
export class CycleDetector implements ICycleDetector {
  private readonly stack: string[] = [];

  enter(key: string): void {
    this.stack.push(key);
  }

  leave(key: string): void {
    const index = this.stack.lastIndexOf(key);
    if (index !== -1) this.stack.splice(index, 1);
  }

  isResolving(key: string): boolean {
    return this.stack.includes(key);
  }

  /** Names currently on the stack, outermost first. */
  chain(): string[] {
    return [...this.stack];
  }
}
