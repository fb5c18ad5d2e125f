import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteStore } from './sqliteStore.js';

const T = 1_700_000_000;

describe('SqliteStore credential pool', () => {
  let now: number;
  let store: SqliteStore;

  beforeEach(() => {
    now = T;
    store = new SqliteStore({ filename: ':memory:', now: () => now });
  });

  afterEach(() => {
    store.close();
  });

  it('prefers a never-used row over a once-used one', async () => {
    now = T - 10;
    await store.addCredentials(['B']);
    expect(await store.allocate()).toBe('B');
    await store.addCredentials(['A']);

    now = T;
    expect(await store.allocate()).toBe('A');
    expect(await store.getCredentialRow('A')).toEqual({ param: 'A', useCount: 1, lastUsedAt: T });
    expect(await store.getCredentialRow('B')).toEqual({ param: 'B', useCount: 1, lastUsedAt: T - 10 });
  });

  it('picks the least recently used row among once-used rows', async () => {
    now = T - 20;
    await store.addCredentials(['X']);
    expect(await store.allocate()).toBe('X');

    now = T - 10;
    await store.addCredentials(['Y']);
    expect(await store.allocate()).toBe('Y');

    now = T;
    expect(await store.allocate()).toBe('X');
    expect(await store.allocate()).toBe('Y');
  });

  it('reuses an exhausted row once it has cooled down', async () => {
    now = T - 7200;
    await store.addCredentials(['C']);
    await store.allocate();
    await store.allocate();
    expect(await store.getCredentialRow('C')).toEqual({ param: 'C', useCount: 2, lastUsedAt: T - 7200 });

    now = T;
    expect(await store.allocate()).toBe('C');
    expect(await store.getCredentialRow('C')).toEqual({ param: 'C', useCount: 3, lastUsedAt: T });
  });

  it('returns null and leaves the row untouched while it is still cooling down', async () => {
    now = T - 10;
    await store.addCredentials(['D']);
    await store.allocate();
    await store.allocate();

    now = T;
    expect(await store.allocate()).toBeNull();
    expect(await store.getCredentialRow('D')).toEqual({ param: 'D', useCount: 2, lastUsedAt: T - 10 });
  });

  it('treats a row as cooled exactly at the cooldown boundary', async () => {
    now = T - 3600;
    await store.addCredentials(['E']);
    await store.allocate();
    await store.allocate();

    now = T - 1;
    expect(await store.allocate()).toBeNull();
    now = T;
    expect(await store.allocate()).toBe('E');
  });

  it('never recycles an exhausted row while a fresh one exists', async () => {
    now = T - 7200;
    await store.addCredentials(['old']);
    await store.allocate();
    await store.allocate();

    now = T;
    await store.addCredentials(['fresh']);
    expect(await store.allocate()).toBe('fresh');
  });

  it('counts only rows under the fresh-use limit', async () => {
    now = T - 20;
    await store.addCredentials(['R']);
    await store.allocate();
    await store.allocate();

    now = T - 10;
    await store.addCredentials(['Q']);
    expect(await store.allocate()).toBe('Q');

    now = T;
    await store.addCredentials(['P']);
    expect(await store.countAvailable()).toBe(2);
  });

  it('ignores duplicate inserts and keeps the original usage', async () => {
    expect(await store.addCredentials(['A'])).toBe(1);
    await store.allocate();

    now = T + 50;
    expect(await store.addCredentials(['A', 'B', 'B'])).toBe(1);
    expect(await store.getCredentialRow('A')).toEqual({ param: 'A', useCount: 1, lastUsedAt: T });
    expect(await store.getCredentialRow('B')).toEqual({ param: 'B', useCount: 0, lastUsedAt: 0 });
  });

  it('hands each use out exactly once under concurrent allocation', async () => {
    await store.addCredentials(['a', 'b', 'c']);

    const results = await Promise.all(Array.from({ length: 6 }, () => store.allocate()));

    expect([...results].sort()).toEqual(['a', 'a', 'b', 'b', 'c', 'c']);
    expect(await store.allocate()).toBeNull();
    expect(await store.countAvailable()).toBe(0);
  });

  it('honours a custom fresh-use limit', async () => {
    const strict = new SqliteStore({ filename: ':memory:', now: () => now, freshUseLimit: 1 });
    try {
      await strict.addCredentials(['only']);
      expect(await strict.allocate()).toBe('only');
      expect(await strict.allocate()).toBeNull();
      expect(await strict.countAvailable()).toBe(0);
    } finally {
      strict.close();
    }
  });

  it('reports pool stats by row state', async () => {
    now = T - 7200;
    await store.addCredentials(['H']);
    await store.allocate();
    await store.allocate();

    now = T - 10;
    await store.addCredentials(['G']);
    await store.allocate();
    await store.allocate();

    now = T;
    await store.addCredentials(['F']);

    expect(await store.poolStats()).toEqual({ total: 3, available: 1, coolingDown: 1, reusable: 1 });
  });

  it('reports zeroes for an empty pool', async () => {
    expect(await store.poolStats()).toEqual({ total: 0, available: 0, coolingDown: 0, reusable: 0 });
    expect(await store.getCredentialRow('missing')).toBeNull();
  });
});

describe('SqliteStore cache', () => {
  let now: number;
  let store: SqliteStore;

  beforeEach(() => {
    now = T;
    store = new SqliteStore({ filename: ':memory:', now: () => now });
  });

  afterEach(() => {
    store.close();
  });

  it('returns a stored value until the TTL elapses', async () => {
    await store.setCache('k', '{"v":1}');
    expect(await store.getCache('k')).toBe('{"v":1}');

    now = T + 2999;
    expect(await store.getCache('k')).toBe('{"v":1}');

    now = T + 3000;
    expect(await store.getCache('k')).toBeNull();
  });

  it('overwrites an entry and restarts its TTL', async () => {
    await store.setCache('k', 'first');
    now = T + 2000;
    await store.setCache('k', 'second');

    now = T + 4000;
    expect(await store.getCache('k')).toBe('second');
  });

  it('returns null for unknown keys', async () => {
    expect(await store.getCache('nope')).toBeNull();
  });

  it('prunes only expired entries', async () => {
    await store.setCache('old', 'a');
    now = T + 3000;
    await store.setCache('new', 'b');

    expect(await store.pruneCache()).toBe(1);
    expect(await store.getCache('new')).toBe('b');
  });
});

describe('SqliteStore persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'camp-pool-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps pool state across reopen', async () => {
    const filename = path.join(dir, 'pool.db');
    const first = new SqliteStore({ filename, now: () => T });
    await first.addCredentials(['kept-1', 'kept-2']);
    await first.allocate();
    first.close();

    const second = new SqliteStore({ filename, now: () => T });
    try {
      expect(await second.poolStats()).toEqual({ total: 2, available: 2, coolingDown: 0, reusable: 0 });
      expect(await second.addCredentials(['kept-1'])).toBe(0);
    } finally {
      second.close();
    }
  });
});
