import { describe, expect, it } from 'vitest';
import {
  EMPTY_CHECKPOINT,
  SyncFailedError,
  TransportError,
  type SyncReport,
} from '@shellsync/sync-engine';
import { formatFailure, formatReport, formatStatusChange } from '../src/format';

const report = (overrides: Partial<SyncReport> = {}): SyncReport => ({
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
  ...overrides,
});

describe('formatReport', () => {
  it('summarizes a run', () => {
    expect(formatReport(report({ uploaded: 1, downloaded: 12, pages: 2 }))).toBe(
      'Sync complete: uploaded 1 record, downloaded 12 records (2 pages)'
    );
  });

  it('mentions records that were already present', () => {
    expect(formatReport(report({ skipped: 3 }))).toBe(
      'Sync complete: uploaded 0 records, downloaded 0 records, 3 already present (1 page)'
    );
  });

  it('counts records too large to upload', () => {
    const rejected = {
      id: '00000000-0000-4000-8000-000000000001',
      timestamp: 0,
      hostname: 'laptop',
      dataLength: 70_000,
    };
    expect(formatReport(report({ uploaded: 2, rejected: [rejected] }))).toBe(
      'Sync complete: uploaded 2 records, downloaded 0 records, 1 record too large to upload (1 page)'
    );
  });
});

describe('formatStatusChange', () => {
  it('names the state', () => {
    expect(
      formatStatusChange({
        state: 'uploading',
        lastSuccessAt: null,
        lastError: null,
      })
    ).toBe('uploading');
    expect(
      formatStatusChange({
        state: 'failed',
        lastSuccessAt: null,
        error: {
          phase: 'download',
          code: 'protocol',
          message: 'Sync failed during download: bad page',
        },
      })
    ).toBe('failed in download (protocol)');
  });
});

describe('formatFailure', () => {
  it('adds a hint for retryable failures', () => {
    const error = new SyncFailedError(
      'negotiate',
      new TransportError('network', 'GET /sync/count could not reach the server: refused')
    );

    expect(formatFailure(error)).toBe(
      'Sync failed during negotiate: GET /sync/count could not reach the server: refused The server may be unreachable; try again later.'
    );
  });

  it('passes other errors through', () => {
    expect(formatFailure(new Error('disk full'))).toBe('disk full');
  });
});
