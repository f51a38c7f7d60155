import { describe, it, expect, vi } from 'vitest';
import { ProviderConfigError, Resource } from '../src/index.js';

class Pool {
  closed = false;
  constructor(readonly url: string) {}
}

describe('Resource', () => {
  it('caches like a singleton', () => {
    const provider = new Resource(
      (url: string) => new Pool(url),
      (pool) => {
        pool.closed = true;
      },
      { args: ['mysql://test'] },
    );

    const first = provider.resolve();
    expect(provider.resolve()).toBe(first);
    expect(first.url).toBe('mysql://test');
  });

  it('releases the live instance exactly once', async () => {
    const release = vi.fn();
    const provider = new Resource(() => new Pool('mysql://test'), release);

    const pool = provider.resolve();
    for (let i = 0; i < 4; i++) provider.resolve();

    await provider.release();
    await provider.release();

    expect(release).toHaveBeenCalledTimes(1);
    expect(release).toHaveBeenCalledWith(pool);
    expect(provider.isResolved()).toBe(false);
  });

  it('release before any resolve is a no-op', async () => {
    const factory = vi.fn(() => new Pool('mysql://test'));
    const release = vi.fn();
    const provider = new Resource(factory, release);

    await provider.release();

    expect(factory).not.toHaveBeenCalled();
    expect(release).not.toHaveBeenCalled();
  });

  it('awaits an async instance before releasing it', async () => {
    const released: string[] = [];
    const provider = new Resource(
      async () => new Pool('mysql://async'),
      async (pool) => {
        released.push(pool.url);
      },
    );

    await provider.resolve();
    await provider.release();

    expect(released).toEqual(['mysql://async']);
  });

  it('constructs a fresh instance when resolved after release', async () => {
    let created = 0;
    const provider = new Resource(() => ({ id: ++created }), () => {});

    const first = provider.resolve();
    await provider.release();
    const second = provider.resolve();

    expect(second).not.toBe(first);
    expect(second.id).toBe(2);
  });

  it('propagates release errors unchanged', async () => {
    const failure = new Error('close failed');
    const provider = new Resource(
      () => new Pool('mysql://test'),
      () => {
        throw failure;
      },
    );

    provider.resolve();
    await expect(provider.release()).rejects.toBe(failure);
  });

  it('skips release when async construction failed', async () => {
    const release = vi.fn();
    const provider = new Resource(async (): Promise<Pool> => {
      throw new Error('unreachable host');
    }, release);

    const pending = provider.resolve();
    await provider.release();

    await expect(pending).rejects.toThrow('unreachable host');
    expect(release).not.toHaveBeenCalled();
  });

  it('rejects a non-function release routine', () => {
    expect(() => new Resource(() => 1, 'close' as never)).toThrow(ProviderConfigError);
  });

  it('reports its kind', () => {
    expect(new Resource(() => 1, () => {}).kind).toBe('resource');
  });
});
