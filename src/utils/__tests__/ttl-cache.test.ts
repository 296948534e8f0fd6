import { afterEach, describe, expect, it, vi } from 'vitest';
import { TTLCache } from '../ttl-cache.js';

describe('TTLCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should share one in-flight load between concurrent lookups', async () => {
    const cache = new TTLCache<string, boolean>(1000);
    const load = vi.fn(async () => true);

    const [a, b] = await Promise.all([cache.getOrLoad('ollama', load), cache.getOrLoad('ollama', load)]);

    expect(a).toBe(true);
    expect(b).toBe(true);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('should load again once the entry expired', async () => {
    vi.useFakeTimers();
    const cache = new TTLCache<string, number>(1000);
    let calls = 0;
    const load = async () => ++calls;

    expect(await cache.getOrLoad('k', load)).toBe(1);
    vi.advanceTimersByTime(999);
    expect(await cache.getOrLoad('k', load)).toBe(1);
    vi.advanceTimersByTime(1);
    expect(await cache.getOrLoad('k', load)).toBe(2);
  });

  it('should forget a load that rejected', async () => {
    const cache = new TTLCache<string, boolean>(60_000);

    await expect(cache.getOrLoad('k', async () => Promise.reject(new Error('down')))).rejects.toThrow('down');
    expect(await cache.getOrLoad('k', async () => false)).toBe(false);
  });
});
