import { describe, it, expect, vi } from 'vitest';
import { RequestCoalescer } from '../request-coalescer.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('RequestCoalescer', () => {
  it('shares one in-flight call per key', async () => {
    const coalescer = new RequestCoalescer<number>();
    const gate = deferred<number>();
    const fn = vi.fn(() => gate.promise);

    const a = coalescer.run('k', fn);
    const b = coalescer.run('k', fn);
    expect(coalescer.isInFlight('k')).toBe(true);

    gate.resolve(42);
    await expect(Promise.all([a, b])).resolves.toEqual([42, 42]);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(coalescer.size()).toBe(0);
  });

  it('runs different keys independently', async () => {
    const coalescer = new RequestCoalescer<string>();
    const fn = vi.fn(async () => 'x');

    await Promise.all([coalescer.run('a', fn), coalescer.run('b', fn)]);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('forgets a key after its call rejects', async () => {
    const coalescer = new RequestCoalescer<number>();

    await expect(coalescer.run('k', async () => {
      throw new Error('upstream down');
    })).rejects.toThrow('upstream down');

    expect(coalescer.isInFlight('k')).toBe(false);
    await expect(coalescer.run('k', async () => 1)).resolves.toBe(1);
  });

  it('forgets a key whose function throws before returning a promise', async () => {
    const coalescer = new RequestCoalescer<number>();
    const explode = (): Promise<number> => {
      throw new Error('bad arguments');
    };

    await expect(coalescer.run('k', explode)).rejects.toThrow('bad arguments');

    expect(coalescer.isInFlight('k')).toBe(false);
    expect(coalescer.size()).toBe(0);
  });
});
