import { SyncFailedError } from './errors';
import type {
  SyncCheckpointStorePort,
  SyncReport,
  SyncRunOptions,
  SyncRunner,
} from './types';

const MIN_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 20_000;
const DEFAULT_MAX_ATTEMPTS = 3;

export type SyncSchedulerOptions = Readonly<{
  runner: SyncRunner;
  checkpoints: SyncCheckpointStorePort;
  hostname: string;
  maxAttempts?: number;
  minBackoffMs?: number;
  maxBackoffMs?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}>;

const defaultSleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });

/**
 * Decides when to sync and how to retry. Only transport failures that may
 * succeed on a second attempt are retried; the runner itself never retries.
 */
export class SyncScheduler {
  private readonly runner: SyncRunner;
  private readonly checkpoints: SyncCheckpointStorePort;
  private readonly hostname: string;
  private readonly maxAttempts: number;
  private readonly minBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(options: SyncSchedulerOptions) {
    this.runner = options.runner;
    this.checkpoints = options.checkpoints;
    this.hostname = options.hostname;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.minBackoffMs = options.minBackoffMs ?? MIN_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * `frequencyMs` of 0 means sync on every call; a negative value disables
   * scheduled syncs. Resolves `null` when no sync was due.
   */
  async syncIfDue(
    frequencyMs: number,
    options: SyncRunOptions = {}
  ): Promise<SyncReport | null> {
    if (!(await this.isDue(frequencyMs))) return null;
    return this.syncWithRetry(options);
  }

  async isDue(frequencyMs: number): Promise<boolean> {
    if (frequencyMs < 0) return false;
    if (frequencyMs === 0) return true;
    const checkpoint = await this.checkpoints.read(this.hostname);
    if (checkpoint.lastSuccessAt === null) return true;
    return this.now() - checkpoint.lastSuccessAt >= frequencyMs;
  }

  async syncWithRetry(options: SyncRunOptions = {}): Promise<SyncReport> {
    let backoffMs = 0;
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.runner.sync(options);
      } catch (error) {
        const retryable =
          error instanceof SyncFailedError &&
          error.retryable &&
          attempt < this.maxAttempts &&
          !options.signal?.aborted;
        if (!retryable) throw error;
        backoffMs = this.nextBackoffMs(backoffMs);
        await this.sleep(backoffMs, options.signal);
      }
    }
  }

  nextBackoffMs(current: number): number {
    const base =
      current === 0
        ? this.minBackoffMs
        : Math.min(current * 2, this.maxBackoffMs);
    const jittered = Math.round(base * (0.5 + this.random()));
    return Math.min(Math.max(jittered, this.minBackoffMs), this.maxBackoffMs);
  }
}
