import createDebug from 'debug';
import { ConfigKeyNotFoundError } from '../domain/errors.js';
import type { ConfigNode, ConfigValue } from '../domain/types.js';
import { type Deferred, createDeferred } from './deferred.js';

const debug = createDebug('depot:config');

const SEPARATOR = '.';

type Lookup = { found: true; value: ConfigValue } | { found: false; missing: string };

function isConfigNode(value: ConfigValue): value is ConfigNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Nested, read-mostly settings tree with dotted-path access.
 * Populated once at startup with `load()`; consumers only read.
 *
 * @example
 * ```typescript
 * const config = new ConfigStore();
 * config.load({ database: { url: 'mysql://localhost/app', pool: 5 } });
 *
 * config.get('database.url');        // 'mysql://localhost/app'
 * config.get('database.timeout', 30); // 30
 * config.at('database');             // { url: ..., pool: 5 }
 * ```
 */
export class ConfigStore {
  private root: ConfigNode = {};

  /**
   * Replaces the whole tree with a copy of `source`. Nothing is merged.
   */
  load(source: ConfigNode): void {
    this.root = structuredClone(source);
    debug('load: %d top-level keys', Object.keys(this.root).length);
  }

  /**
   * Walks `path` segment by segment. Every segment must be a key of the
   * node at its level; there is no partial match.
   *
   * @throws ConfigKeyNotFoundError when absent and no fallback is given.
   */
  get(path: string): ConfigValue;
  get<D>(path: string, fallback: D): ConfigValue | D;
  get(path: string, ...fallback: unknown[]): unknown {
    const result = this.lookup(path.split(SEPARATOR));
    if (result.found) return result.value;
    if (fallback.length > 0) return fallback[0];
    throw new ConfigKeyNotFoundError(path, result.missing);
  }

  /**
   * Single-level access: `key` is taken literally, separators included.
   *
   * @throws ConfigKeyNotFoundError when `key` is absent.
   */
  at(key: string): ConfigValue {
    const result = this.lookup([key]);
    if (result.found) return result.value;
    throw new ConfigKeyNotFoundError(key, key);
  }

  has(path: string): boolean {
    return this.lookup(path.split(SEPARATOR)).found;
  }

  /**
   * A deferred reference that reads `path` when invoked, so providers
   * registered before `load()` still see the loaded value.
   */
  ref(path: string): Deferred<ConfigValue>;
  ref<D>(path: string, fallback: D): Deferred<ConfigValue | D>;
  ref(path: string, ...fallback: unknown[]): Deferred<unknown> {
    const target = `config:${path}`;
    if (fallback.length > 0) {
      const value = fallback[0];
      return createDeferred(target, () => this.get(path, value));
    }
    return createDeferred(target, () => this.get(path));
  }

  private lookup(segments: string[]): Lookup {
    let node: ConfigValue = this.root;
    for (const segment of segments) {
      if (segment === '' || !isConfigNode(node) || !Object.hasOwn(node, segment)) {
        return { found: false, missing: segment };
      }
      node = node[segment];
    }
    return { found: true, value: node };
  }
}
