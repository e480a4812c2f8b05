import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { openHistoryDatabase } from '../src/database';
import { SqliteSyncLock } from '../src/SqliteSyncLock';

describe('SqliteSyncLock', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('lets one holder per host in at a time', () => {
    const lock = new SqliteSyncLock(openHistoryDatabase(), { now: () => 1000 });

    expect(lock.tryAcquire('laptop', 'first')).toBe(true);
    expect(lock.tryAcquire('laptop', 'second')).toBe(false);
    expect(lock.tryAcquire('desktop', 'second')).toBe(true);

    expect(lock.release('laptop', 'second')).toBe(false);
    expect(lock.release('laptop', 'first')).toBe(true);
    expect(lock.tryAcquire('laptop', 'second')).toBe(true);
  });

  it('is re-entrant for the same holder', () => {
    const lock = new SqliteSyncLock(openHistoryDatabase());

    expect(lock.tryAcquire('laptop', 'first')).toBe(true);
    expect(lock.tryAcquire('laptop', 'first')).toBe(true);
  });

  it('takes over a stale lock', () => {
    let now = 1000;
    const lock = new SqliteSyncLock(openHistoryDatabase(), {
      now: () => now,
      staleAfterMs: 500,
    });

    expect(lock.tryAcquire('laptop', 'crashed')).toBe(true);
    now = 1499;
    expect(lock.tryAcquire('laptop', 'next')).toBe(false);
    now = 1500;
    expect(lock.tryAcquire('laptop', 'next')).toBe(true);
    expect(lock.release('laptop', 'crashed')).toBe(false);
  });

  it('is shared between connections to the same file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shellsync-lock-'));
    dirs.push(dir);
    const file = path.join(dir, 'history.db');
    const first = openHistoryDatabase(file);
    const second = openHistoryDatabase(file);

    try {
      expect(new SqliteSyncLock(first).tryAcquire('laptop', 'a')).toBe(true);
      expect(new SqliteSyncLock(second).tryAcquire('laptop', 'b')).toBe(false);
    } finally {
      first.close();
      second.close();
    }
  });
});
