/**
 * One executed shell command. Records are immutable once created: the sync
 * protocol only ever appends them and deduplicates on `id`.
 */
export type HistoryRecord = Readonly<{
  id: string;
  /** Creation instant on the originating host, epoch milliseconds. */
  timestamp: number;
  hostname: string;
  command: string;
  cwd: string;
  exitCode: number;
  /** Execution time in milliseconds, `-1` when unknown. */
  duration: number;
  session: string;
}>;

export type NewHistoryRecord = Readonly<{
  command: string;
  cwd: string;
  hostname: string;
  exitCode?: number;
  duration?: number;
  session?: string;
  timestamp?: number;
}>;
