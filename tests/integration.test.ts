import { describe, it, expect, vi } from 'vitest';
import {
  createContainer,
  deferred,
  Factory,
  lazy,
  ProviderNotFoundError,
  Resource,
  Singleton,
} from '../src/index.js';

// === Domain collaborators ===
class Database {
  static instances = 0;
  constructor(readonly url: string) {
    Database.instances++;
  }
}

class Request {
  constructor(readonly id: number) {}
}

class ServiceA {
  constructor(private readonly getB: () => ServiceB) {}
  get peer(): ServiceB {
    return this.getB();
  }
}

class ServiceB {
  constructor(private readonly getA: () => ServiceA) {}
  get peer(): ServiceA {
    return this.getA();
  }
}

class ConnectionPool {
  open = true;
  constructor(readonly size: number) {}
  end(): void {
    this.open = false;
  }
}

describe('composition root scenarios', () => {
  it('constructs a config-backed singleton once', () => {
    Database.instances = 0;
    const container = createContainer<{ db: Database }>();
    container.config.load({ database: { url: 'mysql://x' } });
    container.register(
      'db',
      new Singleton((url: string) => new Database(url), { args: [container.config.ref('database.url')] }),
    );

    const first = container.resolve('db');
    const second = container.resolve('db');

    expect(first).toBe(second);
    expect(first.url).toBe('mysql://x');
    expect(Database.instances).toBe(1);
  });

  it('builds a fresh factory instance per resolution', () => {
    let next = 0;
    const container = createContainer<{ req: Request }>();
    container.register('req', new Factory(() => new Request(++next)));

    const requests = [container.resolve('req'), container.resolve('req'), container.resolve('req')];

    expect(new Set(requests).size).toBe(3);
    expect(requests.map((r) => r.id)).toEqual([1, 2, 3]);
  });

  it('links two services that reference each other', () => {
    const container = createContainer<{ service_a: ServiceA; service_b: ServiceB }>();
    container.register(
      'service_a',
      new Singleton((getB: () => ServiceB) => new ServiceA(getB), {
        args: [lazy(deferred(container, 'service_b'))],
      }),
    );
    container.register(
      'service_b',
      new Singleton((getA: () => ServiceA) => new ServiceB(getA), {
        args: [lazy(deferred(container, 'service_a'))],
      }),
    );

    const a = container.resolve('service_a');
    const b = container.resolve('service_b');

    expect(a.peer).toBe(b);
    expect(b.peer).toBe(a);
  });

  it('reports an unregistered name', () => {
    const container = createContainer();

    expect(() => container.resolve('missing')).toThrow(ProviderNotFoundError);
    expect(() => container.resolve('missing')).toThrow("dependency 'missing' not found");
  });

  it('releases a resource once at shutdown however often it was resolved', async () => {
    const release = vi.fn((pool: ConnectionPool) => pool.end());
    const container = createContainer<{ pool: ConnectionPool }>({ config: { pool: { size: 4 } } });
    container.register(
      'pool',
      new Resource((size: number) => new ConnectionPool(size), release, {
        args: [container.config.ref('pool.size')],
      }),
    );

    const pool = container.resolve('pool');
    for (let i = 0; i < 4; i++) container.resolve('pool');

    await container.shutdown();
    await container.shutdown();

    expect(release).toHaveBeenCalledTimes(1);
    expect(pool.open).toBe(false);
    expect(pool.size).toBe(4);
  });
});

describe('resource lifecycle', () => {
  it('initResources() constructs every resource in registration order', async () => {
    const order: string[] = [];
    const container = createContainer();
    container.register('db', new Resource(async () => {
      order.push('db');
      return 'db';
    }, () => {}));
    container.register('service', new Singleton(() => order.push('service')));
    container.register('cache', new Resource(() => {
      order.push('cache');
      return 'cache';
    }, () => {}));

    await container.initResources();

    expect(order).toEqual(['db', 'cache']);
    expect(container.describe('db').resolved).toBe(true);
    expect(container.describe('service').resolved).toBe(false);
  });

  it('shutdown() releases in reverse registration order and only live resources', async () => {
    const released: string[] = [];
    const container = createContainer();
    for (const name of ['db', 'cache', 'queue', 'idle']) {
      container.register(name, new Resource(() => name, (value) => { released.push(value); }));
    }
    container.resolve('queue');
    container.resolve('db');
    container.resolve('cache');

    await container.shutdown();

    expect(released).toEqual(['queue', 'cache', 'db']);
  });

  it('resources rebuild after shutdown', async () => {
    let created = 0;
    const container = createContainer();
    container.register('pool', new Resource(() => ++created, () => {}));

    container.resolve('pool');
    await container.shutdown();

    expect(container.resolve('pool')).toBe(2);
  });
});

describe('wiring an application', () => {
  interface Repository {
    find(id: string): string | undefined;
  }

  class MemoryRepository implements Repository {
    private readonly rows = new Map([['1', 'Alice']]);
    find(id: string): string | undefined {
      return this.rows.get(id);
    }
  }

  class EventBus {
    readonly published: string[] = [];
    publish(event: string): void {
      this.published.push(event);
    }
  }

  class UserService {
    constructor(
      private readonly repo: Repository,
      private readonly deps: { bus: EventBus; prefix: string },
    ) {}
    greet(id: string): string {
      const name = this.repo.find(id) ?? 'stranger';
      this.deps.bus.publish(`greeted:${id}`);
      return `${this.deps.prefix} ${name}`;
    }
  }

  interface AppDeps {
    repo: Repository;
    bus: EventBus;
    users: UserService;
  }

  it('registers in any order and resolves on demand', () => {
    const container = createContainer<AppDeps>({ config: { greeting: { prefix: 'Hello' } } });

    container
      .register(
        'users',
        new Singleton(
          (repo: Repository, deps: { bus: EventBus; prefix: string }) => new UserService(repo, deps),
          {
            args: [deferred(container, 'repo')],
            named: { bus: deferred(container, 'bus'), prefix: container.config.ref('greeting.prefix') },
          },
        ),
      )
      .register('repo', new Singleton((): Repository => new MemoryRepository()))
      .register('bus', new Singleton(() => new EventBus()));

    const users = container.resolve('users');

    expect(users.greet('1')).toBe('Hello Alice');
    expect(users.greet('2')).toBe('Hello stranger');
    expect(container.resolve('bus').published).toEqual(['greeted:1', 'greeted:2']);
  });

  it('swaps an implementation for tests by re-registering', () => {
    const container = createContainer<AppDeps>({ config: { greeting: { prefix: 'Hi' } } });
    container.register('bus', new Singleton(() => new EventBus()));
    container.register('repo', new Singleton((): Repository => new MemoryRepository()));
    container.register(
      'users',
      new Factory((repo: Repository, deps: { bus: EventBus; prefix: string }) => new UserService(repo, deps), {
        args: [deferred(container, 'repo')],
        named: { bus: deferred(container, 'bus'), prefix: container.config.ref('greeting.prefix') },
      }),
    );

    container.register('repo', new Singleton((): Repository => ({ find: () => 'Test User' })));

    expect(container.resolve('users').greet('1')).toBe('Hi Test User');
  });
});
