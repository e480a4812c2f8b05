import {
  decodeBase64Url,
  encodeBase64Url,
  NONCE_LENGTH,
  TAG_LENGTH,
  type EncryptedBlob,
} from '@shellsync/crypto';
import { encodeHistoryPayload, type HistoryRecord } from '@shellsync/history';
import { z } from 'zod';
import { ProtocolError } from './errors';
import type { AddHistoryRequestV1, SyncHistoryBlobV1 } from './protocol';

export const BLOB_DATA_VERSION = 1;

const blobDataV1 = z.object({
  v: z.literal(BLOB_DATA_VERSION),
  nonce: z.string().min(1),
  ciphertext: z.string().min(1),
});

export const toIsoTimestamp = (timestamp: number): string =>
  new Date(timestamp).toISOString();

export const fromIsoTimestamp = (value: string): number => {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new ProtocolError(`Invalid timestamp: ${value}`);
  }
  return parsed;
};

/** The opaque `data` string the server stores for a blob. */
export const encodeBlobData = (blob: EncryptedBlob): string =>
  JSON.stringify({
    v: BLOB_DATA_VERSION,
    nonce: encodeBase64Url(blob.nonce),
    ciphertext: encodeBase64Url(blob.ciphertext),
  });

const base64UrlLength = (bytes: number): number => Math.ceil((bytes * 4) / 3);

const EMPTY_BLOB_DATA_LENGTH = JSON.stringify({
  v: BLOB_DATA_VERSION,
  nonce: '',
  ciphertext: '',
}).length;

/** Length of the `data` string `record` encrypts to, without encrypting it. */
export const encodedBlobDataLength = (record: HistoryRecord): number =>
  EMPTY_BLOB_DATA_LENGTH +
  base64UrlLength(NONCE_LENGTH) +
  base64UrlLength(encodeHistoryPayload(record).byteLength + TAG_LENGTH);

export const toAddHistoryRequest = (
  blob: EncryptedBlob
): AddHistoryRequestV1 => ({
  id: blob.id,
  timestamp: toIsoTimestamp(blob.timestamp),
  data: encodeBlobData(blob),
  hostname: blob.hostname,
});

export const parseSyncHistoryBlob = (wire: SyncHistoryBlobV1): EncryptedBlob => {
  const context = { id: wire.id, timestamp: wire.timestamp, hostname: wire.hostname };
  let parsed: unknown;
  try {
    parsed = JSON.parse(wire.data);
  } catch (error) {
    throw new ProtocolError('Blob data is not valid JSON', context, error);
  }
  const data = blobDataV1.safeParse(parsed);
  if (!data.success) {
    throw new ProtocolError(
      'Blob data does not match the v1 blob shape',
      context,
      data.error
    );
  }
  try {
    return {
      id: wire.id,
      timestamp: fromIsoTimestamp(wire.timestamp),
      hostname: wire.hostname,
      nonce: decodeBase64Url(data.data.nonce),
      ciphertext: decodeBase64Url(data.data.ciphertext),
    };
  } catch (error) {
    if (error instanceof ProtocolError) {
      throw new ProtocolError(error.message, context);
    }
    throw new ProtocolError('Blob data is not base64url encoded', context, error);
  }
};
