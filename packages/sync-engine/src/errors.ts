import { CryptoError } from '@shellsync/crypto';
import {
  SyncErrorCodes,
  type SyncErrorCode,
  type SyncFailure,
  type SyncPhase,
} from './types';

export const TransportErrorKinds = {
  timeout: 'timeout',
  network: 'network',
  status: 'status',
} as const;

export type TransportErrorKind =
  (typeof TransportErrorKinds)[keyof typeof TransportErrorKinds];

/**
 * The request did not complete: nothing it carried can be assumed applied or
 * rejected, so the whole sync is safe to retry.
 */
export class TransportError extends Error {
  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    readonly details: Readonly<{ status?: number; reason?: string }> = {},
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }

  get status(): number | undefined {
    return this.details.status;
  }

  get retryable(): boolean {
    if (this.kind !== TransportErrorKinds.status) return true;
    const status = this.details.status ?? 0;
    return status >= 500 || status === 408 || status === 429;
  }
}

/** The server answered with something this client does not understand. */
export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly context?: Readonly<Record<string, unknown>>,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** The local history store rejected a read or write. */
export class StoreError extends Error {
  constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export class SyncAbortedError extends Error {
  constructor(override readonly cause?: unknown) {
    super('Sync aborted');
    this.name = 'SyncAbortedError';
  }
}

export const classifySyncError = (error: unknown): SyncErrorCode => {
  if (error instanceof CryptoError) return SyncErrorCodes.crypto;
  if (error instanceof TransportError) return SyncErrorCodes.transport;
  if (error instanceof ProtocolError) return SyncErrorCodes.protocol;
  if (error instanceof StoreError) return SyncErrorCodes.store;
  if (error instanceof SyncAbortedError) return SyncErrorCodes.aborted;
  return SyncErrorCodes.unknown;
};

const errorContext = (
  error: unknown
): Readonly<Record<string, unknown>> | undefined => {
  if (error instanceof CryptoError) return { kind: error.kind, ...error.context };
  if (error instanceof TransportError) return { kind: error.kind, ...error.details };
  if (error instanceof ProtocolError) return error.context;
  return undefined;
};

/**
 * The only error `SyncClient.sync()` rejects with. Names the phase that failed;
 * the underlying error is kept as `cause`.
 */
export class SyncFailedError extends Error {
  readonly code: SyncErrorCode;

  constructor(
    readonly phase: SyncPhase,
    override readonly cause: unknown
  ) {
    super(
      `Sync failed during ${phase}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    this.name = 'SyncFailedError';
    this.code = classifySyncError(cause);
  }

  get retryable(): boolean {
    return this.cause instanceof TransportError && this.cause.retryable;
  }

  toFailure(): SyncFailure {
    return {
      phase: this.phase,
      code: this.code,
      message: this.message,
      context: errorContext(this.cause),
    };
  }
}
