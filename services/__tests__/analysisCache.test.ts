import { EventEmitter } from 'events';
import { AnalysisCache, ETL_COMPLETED } from '../analysisCache';

describe('AnalysisCache', () => {
  let now = 0;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000;
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reuses a result until the TTL expires', async () => {
    const cache = new AnalysisCache<string>({ ttlSeconds: 60, clock });
    const compute = jest.fn().mockResolvedValueOnce('first').mockResolvedValueOnce('second');

    expect(await cache.getOrCompute('dashboard', compute)).toBe('first');
    now += 59_999;
    expect(await cache.getOrCompute('dashboard', compute)).toBe('first');
    now += 1;
    expect(await cache.getOrCompute('dashboard', compute)).toBe('second');
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('shares one computation between concurrent callers', async () => {
    const cache = new AnalysisCache<number>({ ttlSeconds: 60, clock });
    let resolve: (value: number) => void = () => undefined;
    const compute = jest.fn(() => new Promise<number>((done) => { resolve = done; }));

    const first = cache.getOrCompute('dashboard', compute);
    const second = cache.getOrCompute('dashboard', compute);
    resolve(42);

    await expect(Promise.all([first, second])).resolves.toEqual([42, 42]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('does not keep results rejected by the cache predicate', async () => {
    const cache = new AnalysisCache<string>({ ttlSeconds: 60, clock });
    const compute = jest.fn().mockResolvedValue('no-data');

    await cache.getOrCompute('dashboard', compute, (value) => value !== 'no-data');
    await cache.getOrCompute('dashboard', compute, (value) => value !== 'no-data');

    expect(compute).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it('does not cache failures', async () => {
    const cache = new AnalysisCache<string>({ ttlSeconds: 60, clock });
    const compute = jest.fn().mockRejectedValueOnce(new Error('database down')).mockResolvedValueOnce('ok');

    await expect(cache.getOrCompute('dashboard', compute)).rejects.toThrow('database down');
    await expect(cache.getOrCompute('dashboard', compute)).resolves.toBe('ok');
  });

  it('drops everything when the ETL reports new data', async () => {
    const events = new EventEmitter();
    const cache = new AnalysisCache<string>({ ttlSeconds: 60, clock, events });
    const compute = jest.fn().mockResolvedValueOnce('before').mockResolvedValueOnce('after');

    await cache.getOrCompute('dashboard', compute);
    events.emit(ETL_COMPLETED);

    expect(cache.peek('dashboard')).toBeUndefined();
    expect(await cache.getOrCompute('dashboard', compute)).toBe('after');
    cache.dispose();
    expect(events.listenerCount(ETL_COMPLETED)).toBe(0);
  });

  it('ignores a computation that finishes after an invalidation', async () => {
    const cache = new AnalysisCache<string>({ ttlSeconds: 60, clock });
    let resolve: (value: string) => void = () => undefined;

    const pending = cache.getOrCompute('dashboard', () => new Promise<string>((done) => { resolve = done; }));
    cache.invalidate();
    resolve('stale');

    await expect(pending).resolves.toBe('stale');
    expect(cache.peek('dashboard')).toBeUndefined();
  });

  it('invalidates a single key', async () => {
    const cache = new AnalysisCache<string>({ ttlSeconds: 60, clock });
    await cache.getOrCompute('a', async () => 'A');
    await cache.getOrCompute('b', async () => 'B');

    cache.invalidate('a');

    expect(cache.peek('a')).toBeUndefined();
    expect(cache.peek('b')).toBe('B');
  });
});
