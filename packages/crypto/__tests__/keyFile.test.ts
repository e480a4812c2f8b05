import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CryptoError,
  decodeKey,
  encodeKey,
  generateKey,
  loadKey,
  loadOrCreateKey,
  writeKey,
} from '../src';

describe('key material', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'shellsync-key-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('encodes keys as base64 and back', () => {
    const key = generateKey();
    expect(key).toHaveLength(32);
    expect(decodeKey(encodeKey(key))).toEqual(key);
  });

  it('rejects keys that are not 32 bytes', () => {
    expect(() => decodeKey(Buffer.alloc(16).toString('base64'))).toThrow(
      'Encryption key must be 32 bytes, got 16'
    );
  });

  it('rejects keys that are not base64', () => {
    expect(() => decodeKey('not a key!')).toThrow(CryptoError);
  });

  it('creates a key file once and reuses it', async () => {
    const keyPath = path.join(dir, 'nested', 'key');
    const created = await loadOrCreateKey(keyPath);
    const loaded = await loadOrCreateKey(keyPath);

    expect(loaded).toEqual(created);
    const info = await stat(keyPath);
    expect(info.mode & 0o777).toBe(0o600);
  });

  it('writes a key imported from another machine', async () => {
    const keyPath = path.join(dir, 'key');
    const key = generateKey();
    await writeKey(keyPath, key);

    expect(await readFile(keyPath, 'utf8')).toBe(`${encodeKey(key)}\n`);
    await expect(loadKey(keyPath)).resolves.toEqual(key);
  });

  it('does not overwrite a corrupt key file', async () => {
    const keyPath = path.join(dir, 'key');
    await writeFile(keyPath, 'garbage', 'utf8');

    await expect(loadOrCreateKey(keyPath)).rejects.toBeInstanceOf(CryptoError);
    expect(await readFile(keyPath, 'utf8')).toBe('garbage');
  });
});
