import { randomUUID } from 'node:crypto';
import type { HistoryRecord, NewHistoryRecord } from './types';

export const UNKNOWN_DURATION = -1;
export const UNKNOWN_EXIT_CODE = -1;

const UUID_V4_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const isHistoryId = (value: string): boolean => UUID_V4_REGEX.test(value);

export const createHistoryRecord = (
  input: NewHistoryRecord,
  now: () => number = Date.now
): HistoryRecord => ({
  id: randomUUID(),
  timestamp: input.timestamp ?? now(),
  hostname: input.hostname,
  command: input.command,
  cwd: input.cwd,
  exitCode: input.exitCode ?? UNKNOWN_EXIT_CODE,
  duration: input.duration ?? UNKNOWN_DURATION,
  session: input.session ?? '',
});

/**
 * Total order used everywhere records are paged: timestamp first, id as the
 * tie-breaker for records created within the same millisecond.
 */
export const compareHistoryRecords = (
  a: Pick<HistoryRecord, 'timestamp' | 'id'>,
  b: Pick<HistoryRecord, 'timestamp' | 'id'>
): number => {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
};
