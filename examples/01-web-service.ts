/**
 * Example 01 — Web Service (composition root)
 *
 * Showcases: contract-typed container, configuration store, deferred
 * references, factory vs singleton, resource init and shutdown.
 */
import {
  createContainer,
  deferred,
  Factory,
  ProviderNotFoundError,
  Resource,
  Singleton,
} from '../src/index.js';

// ── Domain interfaces (the contract) ────────────────────────────────────────

interface ILogger {
  log(msg: string): void;
}

interface IDatabase {
  connected: boolean;
  query(sql: string): string;
}

interface IExampleRepository {
  findById(id: string): string;
}

interface IEventBus {
  publish(event: string): void;
}

// ── Concrete implementations ────────────────────────────────────────────────

class ConsoleLogger implements ILogger {
  constructor(private readonly level: string) {}
  log(msg: string) { console.log(`[${this.level}] ${msg}`); }
}

class MysqlDatabase implements IDatabase {
  connected = false;
  constructor(readonly url: string) {}
  async connect() { this.connected = true; console.log(`[Database] connected to ${this.url}`); return this; }
  async disconnect() { this.connected = false; console.log('[Database] disconnected'); }
  query(sql: string) { return `result of: ${sql}`; }
}

class SqlExampleRepository implements IExampleRepository {
  constructor(private readonly db: IDatabase) {}
  findById(id: string) { return this.db.query(`SELECT * FROM examples WHERE id = '${id}'`); }
}

class MemoryEventBus implements IEventBus {
  constructor(private readonly logger: ILogger) {}
  publish(event: string) { this.logger.log(`event: ${event}`); }
}

class ExampleHandler {
  constructor(
    readonly requestId: string,
    private readonly deps: { repo: IExampleRepository; bus: IEventBus },
  ) {}
  handle(id: string) {
    const row = this.deps.repo.findById(id);
    this.deps.bus.publish(`example.viewed:${id}`);
    return `${this.requestId} -> ${row}`;
  }
}

// ── Composition root ────────────────────────────────────────────────────────

interface AppDeps {
  logger: ILogger;
  db: Promise<MysqlDatabase>;
  repo: IExampleRepository;
  bus: IEventBus;
  handler: ExampleHandler;
}

async function main() {
  const app = createContainer<AppDeps>({
    name: 'web',
    config: {
      logging: { level: 'info' },
      db: { url: 'mysql://localhost/examples' },
    },
  });

  app
    .register('logger', new Singleton((level: string) => new ConsoleLogger(level), {
      args: [app.config.ref('logging.level', 'debug')],
    }))
    .register('db', new Resource(
      (url: string) => new MysqlDatabase(url).connect(),
      (db) => db.disconnect(),
      { args: [app.config.ref('db.url')] },
    ))
    .register('bus', new Singleton((logger: ILogger) => new MemoryEventBus(logger), {
      args: [deferred(app, 'logger')],
    }))
    .register('handler', new Factory(
      (requestId: string, deps: { repo: IExampleRepository; bus: IEventBus }) =>
        new ExampleHandler(requestId, deps),
      { named: { repo: deferred(app, 'repo'), bus: deferred(app, 'bus') } },
    ));

  // Opens the connection before the repository needs it.
  await app.initResources();
  const db = await app.resolve('db');
  app.register('repo', new Singleton(() => new SqlExampleRepository(db)));

  console.log(String(app));

  // One handler per request, shared singletons underneath.
  const first = app.resolve('handler', { args: ['req-1'] });
  const second = app.resolve('handler', { args: ['req-2'] });
  console.log(first.handle('42'));
  console.log(second.handle('7'));
  console.log('distinct handlers:', first !== second);

  await app.shutdown();

  // Typos surface at resolve time with a suggestion.
  const untyped = createContainer();
  untyped.register('database', new Singleton(() => 'conn'));
  try {
    untyped.resolve('databse');
  } catch (e) {
    if (e instanceof ProviderNotFoundError) console.log(e.hint);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
