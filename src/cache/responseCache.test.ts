import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteStore } from '../store/sqliteStore.js';
import { ResponseCache } from './responseCache.js';

describe('ResponseCache', () => {
  let now: number;
  let store: SqliteStore;
  let cache: ResponseCache;

  beforeEach(() => {
    now = 1_700_000_000;
    store = new SqliteStore({ filename: ':memory:', now: () => now });
    cache = new ResponseCache(store);
  });

  afterEach(() => {
    store.close();
  });

  it('ignores payload key order when fingerprinting', () => {
    const first = cache.fingerprint({ method: 'POST', endpoint: '/api/rank', payload: { rankId: 1, position: 0 } });
    const second = cache.fingerprint({ method: 'POST', endpoint: '/api/rank', payload: { position: 0, rankId: 1 } });

    expect(first).toBe(second);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
  });

  it('distinguishes method, endpoint and payload', () => {
    const base = cache.fingerprint({ method: 'POST', endpoint: '/api/rank', payload: { rankId: 1 } });

    expect(cache.fingerprint({ method: 'GET', endpoint: '/api/rank', payload: { rankId: 1 } })).not.toBe(base);
    expect(cache.fingerprint({ method: 'POST', endpoint: '/api/heroes', payload: { rankId: 1 } })).not.toBe(base);
    expect(cache.fingerprint({ method: 'POST', endpoint: '/api/rank', payload: { rankId: 2 } })).not.toBe(base);
  });

  it('round-trips JSON payloads until they expire', async () => {
    const request = { method: 'POST', endpoint: '/api/heroes' } as const;
    expect(await cache.read(request)).toBeNull();

    await cache.write(request, { data: { heroList: [{ heroId: 101 }] } });
    expect(await cache.read(request)).toEqual({ data: { heroList: [{ heroId: 101 }] } });

    now += 3000;
    expect(await cache.read(request)).toBeNull();
  });
});
