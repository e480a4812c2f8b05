import { beforeEach, describe, expect, it } from 'vitest';
import type BetterSqlite3 from 'better-sqlite3';
import type { HistoryRecord } from '@shellsync/history';
import { openHistoryDatabase } from '../src/database';
import { SqliteHistoryStore } from '../src/SqliteHistoryStore';

const record = (
  id: string,
  timestamp: number,
  hostname: string
): HistoryRecord => ({
  id,
  timestamp,
  hostname,
  command: `git status # ${id}`,
  cwd: '/srv/repo',
  exitCode: 0,
  duration: -1,
  session: 'tty1',
});

const A = '00000000-0000-4000-8000-00000000000a';
const B = '00000000-0000-4000-8000-00000000000b';
const C = '00000000-0000-4000-8000-00000000000c';
const D = '00000000-0000-4000-8000-00000000000d';

describe('SqliteHistoryStore', () => {
  let db: BetterSqlite3.Database;
  let store: SqliteHistoryStore;

  beforeEach(async () => {
    db = openHistoryDatabase();
    store = new SqliteHistoryStore(db);
    for (const seeded of [
      record(C, 2000, 'laptop'),
      record(B, 1000, 'desktop'),
      record(A, 1000, 'laptop'),
      record(D, 3000, 'desktop'),
    ]) {
      await store.insertIfAbsent(seeded);
    }
  });

  it('inserts each id once', async () => {
    expect(await store.insertIfAbsent(record(A, 1000, 'laptop'))).toBe(false);
    expect(
      await store.insertIfAbsent(record(A, 9999, 'elsewhere'))
    ).toBe(false);
    expect(await store.count()).toBe(4);
  });

  it('keeps every field', async () => {
    const [first] = await store.recordsSince(0, { limit: 1 });
    expect(first).toEqual(record(A, 1000, 'laptop'));
  });

  it('lists records after a timestamp by (timestamp, id)', async () => {
    const all = await store.recordsSince(0);
    expect(all.map((r) => r.id)).toEqual([A, B, C, D]);

    const after = await store.recordsSince(1000);
    expect(after.map((r) => r.id)).toEqual([C, D]);
  });

  it('continues within a millisecond from afterId', async () => {
    const rest = await store.recordsSince(1000, { afterId: A });
    expect(rest.map((r) => r.id)).toEqual([B, C, D]);
  });

  it('filters by host', async () => {
    const own = await store.recordsSince(0, { host: 'laptop' });
    expect(own.map((r) => r.id)).toEqual([A, C]);

    const others = await store.recordsSince(0, { excludeHost: 'laptop' });
    expect(others.map((r) => r.id)).toEqual([B, D]);
  });

  it('applies the limit', async () => {
    const page = await store.recordsSince(0, { limit: 2 });
    expect(page.map((r) => r.id)).toEqual([A, B]);
  });

  it('reports counts and the newest timestamp', async () => {
    expect(await store.count()).toBe(4);
    expect(await store.maxTimestamp()).toBe(3000);

    const empty = new SqliteHistoryStore(openHistoryDatabase());
    expect(await empty.count()).toBe(0);
    expect(await empty.maxTimestamp()).toBeNull();
  });
});
