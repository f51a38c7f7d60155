import { describe, expectTypeOf, it } from 'vitest';
import {
  createContainer,
  deferred,
  Factory,
  lazy,
  Resource,
  Singleton,
} from '../src/index.js';
import type { ConfigValue, Deferred, Lazy } from '../src/index.js';

interface Logger {
  log(message: string): void;
}

interface AppDeps {
  logger: Logger;
  port: number;
}

describe('TypeScript type inference', () => {
  it('infers instance types from factories', () => {
    expectTypeOf(new Singleton(() => 42).resolve()).toEqualTypeOf<number>();
    expectTypeOf(new Factory(() => 'x').resolve()).toEqualTypeOf<string>();
    expectTypeOf(new Resource(() => ({ open: true }), () => {}).resolve()).toEqualTypeOf<{
      open: boolean;
    }>();
  });

  it('types resolve() against the container contract', () => {
    const container = createContainer<AppDeps>();
    container.register('port', new Singleton(() => 8080));
    container.register('logger', new Singleton(() => ({ log: (_message: string) => {} })));

    expectTypeOf(container.resolve('port')).toEqualTypeOf<number>();
    expectTypeOf(container.resolve('logger')).toEqualTypeOf<Logger>();
  });

  it('types deferred references and lazy getters', () => {
    const container = createContainer<AppDeps>();

    expectTypeOf(deferred(container, 'logger')).toEqualTypeOf<Deferred<Logger>>();
    expectTypeOf(lazy(deferred(container, 'port'))).toEqualTypeOf<Lazy<number>>();
    expectTypeOf(container.config.ref('server.port')).toEqualTypeOf<Deferred<ConfigValue>>();
  });

  it('falls back to unknown in free mode', () => {
    const container = createContainer();
    container.register('anything', new Factory(() => 'value'));

    expectTypeOf(container.resolve('anything')).toEqualTypeOf<unknown>();
  });
});
