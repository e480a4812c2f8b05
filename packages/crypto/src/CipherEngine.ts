import {
  decodeHistoryPayload,
  encodeHistoryPayload,
  type HistoryRecord,
} from '@shellsync/history';
import { buildHistoryAad } from './aad';
import { CryptoError, CryptoErrorKinds } from './errors';
import { KEY_LENGTH, NodeAeadCipher } from './NodeAeadCipher';
import type { AeadCipherPort, EncryptedBlob, SymmetricKey } from './types';

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Converts history records to opaque blobs and back. Pure CPU work: the key is
 * handed in by the caller on every call and never stored.
 */
export class CipherEngine {
  constructor(private readonly cipher: AeadCipherPort = new NodeAeadCipher()) {}

  async encrypt(key: SymmetricKey, record: HistoryRecord): Promise<EncryptedBlob> {
    const context = {
      id: record.id,
      timestamp: record.timestamp,
      hostname: record.hostname,
    };
    this.assertKey(key, context);

    let plaintext: Uint8Array;
    try {
      plaintext = encodeHistoryPayload(record);
    } catch (error) {
      throw new CryptoError(
        CryptoErrorKinds.encodingFailure,
        `Failed to serialize history record ${record.id}: ${describeError(error)}`,
        context,
        error
      );
    }

    const sealed = this.cipher.seal(
      plaintext,
      key,
      buildHistoryAad(record.id, record.timestamp, record.hostname)
    );
    return {
      id: record.id,
      timestamp: record.timestamp,
      hostname: record.hostname,
      nonce: sealed.nonce,
      ciphertext: sealed.ciphertext,
    };
  }

  async decrypt(key: SymmetricKey, blob: EncryptedBlob): Promise<HistoryRecord> {
    const context = {
      id: blob.id,
      timestamp: blob.timestamp,
      hostname: blob.hostname,
    };
    this.assertKey(key, context);

    let record: HistoryRecord;
    try {
      const plaintext = this.cipher.open(
        { nonce: blob.nonce, ciphertext: blob.ciphertext },
        key,
        buildHistoryAad(blob.id, blob.timestamp, blob.hostname)
      );
      record = decodeHistoryPayload(plaintext);
    } catch (error) {
      throw new CryptoError(
        CryptoErrorKinds.authenticationFailure,
        `Failed to authenticate history blob ${blob.id} (host ${blob.hostname}, timestamp ${blob.timestamp})`,
        context,
        error
      );
    }

    if (
      record.id !== blob.id ||
      record.timestamp !== blob.timestamp ||
      record.hostname !== blob.hostname
    ) {
      throw new CryptoError(
        CryptoErrorKinds.authenticationFailure,
        `History blob ${blob.id} metadata does not match its payload`,
        context
      );
    }
    return record;
  }

  private assertKey(
    key: SymmetricKey,
    context: CryptoError['context']
  ): void {
    if (key.length !== KEY_LENGTH) {
      throw new CryptoError(
        CryptoErrorKinds.invalidKey,
        `Invalid key length: expected ${KEY_LENGTH} bytes, got ${key.length}`,
        context
      );
    }
  }
}
