import type { ContainerOptions } from '../domain/types.js';
import { Container } from './container.js';

/**
 * Creates an empty container, the composition root's starting point.
 * Build it once per process (or per test) and pass it, or the instances
 * it resolves, down through constructors.
 *
 * @example
 * ```typescript
 * interface AppDeps { logger: Logger; db: Database }
 *
 * const container = createContainer<AppDeps>({
 *   name: 'app',
 *   config: { database: { url: process.env.DB_URL ?? 'mysql://localhost/app' } },
 * });
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: `any` allows interfaces without index signatures
export function createContainer<R extends Record<string, any> = Record<string, unknown>>(
  options: ContainerOptions = {},
): Container<R> {
  return new Container<R>(options);
}
