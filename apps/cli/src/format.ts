import { SyncFailedError, type SyncReport, type SyncStatus } from '@shellsync/sync-engine';

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`;

export function formatReport(report: SyncReport): string {
  const parts = [
    `uploaded ${plural(report.uploaded, 'record')}`,
    `downloaded ${plural(report.downloaded, 'record')}`,
  ];
  if (report.skipped > 0) {
    parts.push(`${report.skipped} already present`);
  }
  if (report.rejected.length > 0) {
    parts.push(`${plural(report.rejected.length, 'record')} too large to upload`);
  }
  return `Sync complete: ${parts.join(', ')} (${plural(report.pages, 'page')})`;
}

export function formatStatusChange(status: SyncStatus): string {
  switch (status.state) {
    case 'committed':
      return `committed at ${new Date(status.lastSuccessAt).toISOString()}`;
    case 'failed':
      return `failed in ${status.error.phase} (${status.error.code})`;
    default:
      return status.state;
  }
}

export function formatFailure(error: unknown): string {
  if (error instanceof SyncFailedError) {
    const hint = error.retryable ? ' The server may be unreachable; try again later.' : '';
    return `${error.message}${hint}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function formatTimestamp(value: number | null): string {
  return value === null ? 'never' : new Date(value).toISOString();
}
