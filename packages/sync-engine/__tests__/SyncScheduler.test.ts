import { describe, expect, it, vi } from 'vitest';
import { CryptoError, CryptoErrorKinds } from '@shellsync/crypto';
import { SyncScheduler } from '../src/SyncScheduler';
import {
  SyncFailedError,
  TransportError,
  TransportErrorKinds,
} from '../src/errors';
import {
  EMPTY_CHECKPOINT,
  type SyncReport,
  type SyncRunner,
} from '../src/types';
import { MemoryCheckpointStore } from './fakes';

const report: SyncReport = {
  uploaded: 0,
  rejected: [],
  downloaded: 0,
  skipped: 0,
  pages: 1,
  remoteCount: 0,
  localCount: 0,
  drift: 0,
  recovered: false,
  checkpoint: EMPTY_CHECKPOINT,
};

const networkFailure = () =>
  new SyncFailedError(
    'negotiate',
    new TransportError(TransportErrorKinds.network, 'down')
  );

const makeScheduler = (
  sync: SyncRunner['sync'],
  overrides: Partial<ConstructorParameters<typeof SyncScheduler>[0]> = {}
) => {
  const checkpoints = new MemoryCheckpointStore();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const scheduler = new SyncScheduler({
    runner: { sync },
    checkpoints,
    hostname: 'laptop',
    sleep,
    random: () => 0.5,
    ...overrides,
  });
  return { scheduler, checkpoints, sleep };
};

describe('SyncScheduler', () => {
  it('is due when it never synced, or the frequency has elapsed', async () => {
    let now = 1_000_000;
    const { scheduler, checkpoints } = makeScheduler(vi.fn(), {
      now: () => now,
    });

    expect(await scheduler.isDue(300_000)).toBe(true);

    await checkpoints.write('laptop', {
      ...EMPTY_CHECKPOINT,
      lastSuccessAt: 1_000_000,
    });
    now = 1_299_999;
    expect(await scheduler.isDue(300_000)).toBe(false);
    now = 1_300_000;
    expect(await scheduler.isDue(300_000)).toBe(true);
    expect(await scheduler.isDue(0)).toBe(true);
    expect(await scheduler.isDue(-1)).toBe(false);
  });

  it('skips the run when not due', async () => {
    const sync = vi.fn<SyncRunner['sync']>();
    const { scheduler, checkpoints } = makeScheduler(sync, {
      now: () => 1_000,
    });
    await checkpoints.write('laptop', { ...EMPTY_CHECKPOINT, lastSuccessAt: 500 });

    await expect(scheduler.syncIfDue(60_000)).resolves.toBeNull();
    expect(sync).not.toHaveBeenCalled();
  });

  it('retries transport failures with growing backoff', async () => {
    const sync = vi
      .fn<SyncRunner['sync']>()
      .mockRejectedValueOnce(networkFailure())
      .mockRejectedValueOnce(networkFailure())
      .mockResolvedValueOnce(report);
    const { scheduler, sleep } = makeScheduler(sync);

    await expect(scheduler.syncIfDue(0)).resolves.toBe(report);

    expect(sync).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000, 2_000]);
  });

  it('does not retry crypto failures', async () => {
    const failure = new SyncFailedError(
      'download',
      new CryptoError(CryptoErrorKinds.authenticationFailure, 'bad blob')
    );
    const sync = vi.fn<SyncRunner['sync']>().mockRejectedValue(failure);
    const { scheduler, sleep } = makeScheduler(sync);

    await expect(scheduler.syncWithRetry()).rejects.toBe(failure);
    expect(sync).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after maxAttempts', async () => {
    const sync = vi.fn<SyncRunner['sync']>().mockRejectedValue(networkFailure());
    const { scheduler, sleep } = makeScheduler(sync, { maxAttempts: 2 });

    await expect(scheduler.syncWithRetry()).rejects.toBeInstanceOf(
      SyncFailedError
    );
    expect(sync).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('keeps backoff within bounds', () => {
    const low = makeScheduler(vi.fn(), { random: () => 0 }).scheduler;
    const high = makeScheduler(vi.fn(), { random: () => 1 }).scheduler;
    const mid = makeScheduler(vi.fn()).scheduler;

    expect(low.nextBackoffMs(0)).toBe(1_000);
    expect(high.nextBackoffMs(16_000)).toBe(20_000);
    expect(mid.nextBackoffMs(4_000)).toBe(8_000);
  });
});
