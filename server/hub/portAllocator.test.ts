import { beforeEach, describe, expect, it } from 'vitest';
import { openDb, type HubDatabase } from '../db/schema';
import { SqlitePortStore } from '../db/portStore';
import { PortAllocator } from './portAllocator';
import { isHubError } from './errors';
import type { ModelSpec } from './types';

function spec(name: string, port: number | null = null): ModelSpec {
  return { name, modelPath: `/models/${name}`, host: '127.0.0.1', port, jitEnabled: false, group: null, options: [] };
}

const allFree = async (): Promise<boolean> => true;

describe('SqlitePortStore', () => {
  it('replaces the whole table and reads it back by name', () => {
    const store = new SqlitePortStore(openDb(':memory:'));
    store.replaceAll([{ name: 'b', port: 5006, explicit: false }, { name: 'a', port: 7000, explicit: true }]);
    store.replaceAll([{ name: 'c', port: 5005, explicit: false }, { name: 'a', port: 7000, explicit: true }]);

    expect(store.loadAll()).toEqual([
      { name: 'a', port: 7000, explicit: true },
      { name: 'c', port: 5005, explicit: false },
    ]);
  });
});

describe('PortAllocator', () => {
  let db: HubDatabase;
  let store: SqlitePortStore;

  beforeEach(() => {
    db = openDb(':memory:');
    store = new SqlitePortStore(db);
  });

  it('hands out sequential ports from the starting port', async () => {
    const ports = new PortAllocator(5005, store, allFree);
    const resolved = await ports.resolveAll([spec('a'), spec('b'), spec('c')]);
    expect([...resolved]).toEqual([['a', 5005], ['b', 5006], ['c', 5007]]);
  });

  it('honours explicit ports and keeps automatic ones off them', async () => {
    const ports = new PortAllocator(5005, store, allFree);
    const resolved = await ports.resolveAll([spec('a'), spec('b', 5005)]);
    expect(resolved.get('b')).toBe(5005);
    expect(resolved.get('a')).toBe(5006);
  });

  it('skips reserved ports and ports the host reports busy', async () => {
    const busy = new Set([5006]);
    const ports = new PortAllocator(5005, store, async (_host, port) => !busy.has(port));
    const resolved = await ports.resolveAll([spec('a'), spec('b')], { reserved: [5005] });
    expect([...resolved]).toEqual([['a', 5007], ['b', 5008]]);
  });

  it('keeps assignments across restarts through the store', async () => {
    await new PortAllocator(5005, store, allFree).resolveAll([spec('a'), spec('b')]);

    // Same database, new allocator, reversed order: ports do not move.
    const reopened = new PortAllocator(5005, new SqlitePortStore(db), allFree);
    const resolved = await reopened.resolveAll([spec('b'), spec('a')]);
    expect(resolved.get('a')).toBe(5005);
    expect(resolved.get('b')).toBe(5006);
  });

  it('releases ports of removed workers for reuse', async () => {
    const ports = new PortAllocator(5005, store, allFree);
    await ports.resolveAll([spec('a'), spec('b')]);
    await ports.resolveAll([spec('b')]);
    expect(store.loadAll()).toEqual([{ name: 'b', port: 5006, explicit: false }]);

    const resolved = await ports.resolveAll([spec('b'), spec('c')]);
    expect(resolved.get('c')).toBe(5005);
    expect(store.loadAll().map(r => r.name)).toEqual(['b', 'c']);
  });

  it('moves an automatic port claimed by a new explicit one', async () => {
    const ports = new PortAllocator(5005, store, allFree);
    await ports.resolveAll([spec('a')]);
    const resolved = await ports.resolveAll([spec('a'), spec('b', 5005)]);
    expect(resolved.get('b')).toBe(5005);
    expect(resolved.get('a')).toBe(5006);
  });

  it('commits nothing when an explicit port is reserved', async () => {
    const ports = new PortAllocator(5005, store, allFree);
    await ports.resolveAll([spec('a')]);

    const failed = await ports.resolveAll([spec('a'), spec('b', 8000)], { reserved: [8000] }).catch((err: unknown) => err);
    expect(isHubError(failed, 'PortConflict')).toBe(true);
    expect(store.loadAll()).toEqual([{ name: 'a', port: 5005, explicit: false }]);
  });

  it('refuses two workers asking for the same explicit port', async () => {
    const ports = new PortAllocator(5005, store, allFree);
    await ports.resolveAll([spec('a')]);

    await expect(ports.resolveAll([spec('a'), spec('b', 6000), spec('c', 6000)]))
      .rejects.toMatchObject({ kind: 'PortConflict' });
    expect(store.loadAll()).toEqual([{ name: 'a', port: 5005, explicit: false }]);
  });
});
