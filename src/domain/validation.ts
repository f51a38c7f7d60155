import { ProviderConfigError } from './errors.js';
import type { IValidator } from './types.js';

const MIN_SIMILARITY = 0.5;

/**
 * Checks provider inputs and provides fuzzy key matching.
 *
 * @example
 * ```typescript
 * const validator = new Validator();
 * validator.validateCallable('Singleton', 'factory', 'sk-123');
 * // throws ProviderConfigError
 * ```
 */
export class Validator implements IValidator {
  /**
   * Throws unless `value` is a function. `owner` and `role` only shape the message.
   */
  validateCallable(owner: string, role: string, value: unknown): void {
    if (typeof value !== 'function') {
      throw new ProviderConfigError(owner, role, describeType(value));
    }
  }

  /**
   * Closest registered name to `key`, compared case-insensitively.
   * Returns `undefined` when nothing is at least half similar.
   *
   * @example
   * ```typescript
   * validator.suggestKey('userRepo', ['userRepository', 'logger', 'db']);
   * // 'userRepository'
   * ```
   */
  suggestKey(key: string, registered: readonly string[]): string | undefined {
    const needle = key.toLowerCase();
    let best: { name: string; score: number } | undefined;

    for (const name of registered) {
      const score = similarity(needle, name.toLowerCase());
      if (score >= MIN_SIMILARITY && (!best || score > best.score)) {
        best = { name, score };
      }
    }

    return best?.name;
  }
}

/** `typeof`, except `null` and arrays get their own names. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** 1 for identical strings, 0 when every character differs. */
function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  return longest === 0 ? 1 : 1 - editDistance(a, b) / longest;
}

/** Insertions, deletions and substitutions needed to turn `a` into `b`. */
function editDistance(a: string, b: string): number {
  const row = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    let diagonal = row[0];
    row[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const above = row[j];
      const substitution = diagonal + (a[i - 1] === b[j - 1] ? 0 : 1);
      row[j] = Math.min(above + 1, row[j - 1] + 1, substitution);
      diagonal = above;
    }
  }

  return row[b.length];
}
