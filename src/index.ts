/**
 * depot-di: a small inversion-of-control container.
 * Explicit providers, lazy resolution, deferred references, no decorators.
 *
 * @example
 * ```typescript
 * import { createContainer, deferred, Factory, Singleton } from 'depot-di';
 *
 * const container = createContainer({ config: { database: { url: 'mysql://localhost/app' } } });
 *
 * container
 *   .register('db', new Singleton((url: string) => new Database(url), {
 *     args: [container.config.ref('database.url')],
 *   }))
 *   .register('request', new Factory((db: Database) => new Request(db), {
 *     args: [deferred(container, 'db')],
 *   }));
 *
 * container.resolve('request'); // new Request each time, same Database
 * ```
 *
 * @packageDocumentation
 */

// Core API
export { Container } from './application/container.js';
export { createContainer } from './application/create-container.js';
export { ConfigStore } from './infrastructure/config-store.js';
export { deferred, lazy, isDeferred, isLazy } from './infrastructure/deferred.js';

// Providers
export { Provider } from './infrastructure/provider.js';
export { CachedProvider } from './infrastructure/cached-provider.js';
export { Singleton } from './infrastructure/singleton.js';
export { Factory } from './infrastructure/factory.js';
export { Resource } from './infrastructure/resource.js';

// Types
export type { Deferred, Lazy } from './infrastructure/deferred.js';
export type { ReleaseFn } from './infrastructure/resource.js';
export type {
  Bindings,
  ConfigNode,
  ConfigScalar,
  ConfigValue,
  ContainerGraph,
  ContainerOptions,
  FactoryFn,
  NamedArgs,
  Overrides,
  ProviderInfo,
  ProviderKind,
} from './domain/types.js';

// Errors (classes, so exported as values)
export {
  ContainerError,
  NotFoundError,
  ProviderConfigError,
  ProviderNotFoundError,
  ConfigKeyNotFoundError,
  CircularDependencyError,
} from './domain/errors.js';
