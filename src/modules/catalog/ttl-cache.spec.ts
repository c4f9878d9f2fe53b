import { TtlCache } from './ttl-cache';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('TtlCache', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000;
  });

  it('fetches once for two reads inside the TTL window', async () => {
    const cache = new TtlCache<string>(300_000, clock);
    const loader = jest.fn().mockResolvedValue('models');

    await expect(cache.get('models', loader)).resolves.toBe('models');
    now += 299_999;
    await expect(cache.get('models', loader)).resolves.toBe('models');

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('fetches exactly once more after the TTL expires', async () => {
    const cache = new TtlCache<string>(300_000, clock);
    const loader = jest.fn().mockResolvedValueOnce('old').mockResolvedValueOnce('new');

    await cache.get('models', loader);
    now += 300_000;
    await expect(cache.get('models', loader)).resolves.toBe('new');
    await expect(cache.get('models', loader)).resolves.toBe('new');

    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('fetches on every sequential read when the TTL is 0', async () => {
    const cache = new TtlCache<number>(0, clock);
    const loader = jest.fn().mockResolvedValueOnce(1).mockResolvedValueOnce(2);

    await expect(cache.get('models', loader)).resolves.toBe(1);
    await expect(cache.get('models', loader)).resolves.toBe(2);

    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('shares one in-flight load between concurrent misses', async () => {
    const cache = new TtlCache<string>(0, clock);
    const pending = deferred<string>();
    const loader = jest.fn(() => pending.promise);

    const reads = [cache.get('k', loader), cache.get('k', loader), cache.get('k', loader)];
    pending.resolve('shared');

    await expect(Promise.all(reads)).resolves.toEqual(['shared', 'shared', 'shared']);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('surfaces a failed load without caching it', async () => {
    const cache = new TtlCache<string>(1_000, clock);
    await cache.get('k', async () => 'first');

    now += 1_000;
    await expect(
      cache.get('k', async () => {
        throw new Error('upstream down');
      }),
    ).rejects.toThrow('upstream down');
    await expect(cache.get('k', async () => 'second')).resolves.toBe('second');
  });
});
