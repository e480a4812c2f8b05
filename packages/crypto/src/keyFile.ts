import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { CryptoError, CryptoErrorKinds } from './errors';
import { KEY_LENGTH } from './NodeAeadCipher';
import type { SymmetricKey } from './types';

const KEY_FILE_MODE = 0o600;

export const generateKey = (): SymmetricKey =>
  new Uint8Array(randomBytes(KEY_LENGTH));

/** Standard base64, the form users copy between machines. */
export const encodeKey = (key: SymmetricKey): string =>
  Buffer.from(key).toString('base64');

export const decodeKey = (encoded: string): SymmetricKey => {
  const trimmed = encoded.trim();
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(trimmed)) {
    throw new CryptoError(
      CryptoErrorKinds.invalidKey,
      'Encryption key is not valid base64'
    );
  }
  const key = new Uint8Array(Buffer.from(trimmed, 'base64'));
  if (key.length !== KEY_LENGTH) {
    throw new CryptoError(
      CryptoErrorKinds.invalidKey,
      `Encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`
    );
  }
  return key;
};

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ENOENT';

export const loadKey = async (keyPath: string): Promise<SymmetricKey> => {
  const contents = await fs.readFile(keyPath, 'utf8');
  return decodeKey(contents);
};

export const writeKey = async (
  keyPath: string,
  key: SymmetricKey
): Promise<void> => {
  await fs.mkdir(path.dirname(keyPath), { recursive: true });
  await fs.writeFile(keyPath, `${encodeKey(key)}\n`, {
    encoding: 'utf8',
    mode: KEY_FILE_MODE,
  });
};

export const loadOrCreateKey = async (
  keyPath: string
): Promise<SymmetricKey> => {
  try {
    return await loadKey(keyPath);
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }
  const key = generateKey();
  await writeKey(keyPath, key);
  return key;
};
