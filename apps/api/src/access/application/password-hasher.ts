import { Injectable } from '@nestjs/common';
import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

type ScryptParams = Readonly<{ N: number; r: number; p: number }>;

const DEFAULT_PARAMS: ScryptParams = { N: 16_384, r: 8, p: 1 };
const SALT_BYTES = 16;
const KEY_BYTES = 32;
const MAX_MEMORY_BYTES = 64 * 1024 * 1024;
// Verified against when the user does not exist, so both paths cost a derivation.
const PLACEHOLDER_SALT = Buffer.alloc(SALT_BYTES);

const derive = (
  password: string,
  salt: Buffer,
  params: ScryptParams
): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(
      password,
      salt,
      KEY_BYTES,
      { N: params.N, r: params.r, p: params.p, maxmem: MAX_MEMORY_BYTES },
      (error, derived) => {
        if (error) reject(error);
        else resolve(derived);
      }
    );
  });

const parseInteger = (value: string | undefined): number | null => {
  if (!value || !/^\d+$/.test(value)) return null;
  return Number(value);
};

type ParsedHash = Readonly<{ params: ScryptParams; salt: Buffer; hash: Buffer }>;

const parseHash = (stored: string): ParsedHash | null => {
  const [scheme, n, r, p, salt, hash, ...rest] = stored.split('$');
  if (scheme !== 'scrypt' || rest.length > 0 || !salt || !hash) return null;
  const N = parseInteger(n);
  const rValue = parseInteger(r);
  const pValue = parseInteger(p);
  if (N === null || rValue === null || pValue === null) return null;
  return {
    params: { N, r: rValue, p: pValue },
    salt: Buffer.from(salt, 'base64url'),
    hash: Buffer.from(hash, 'base64url'),
  };
};

/** Salted scrypt hashes stored as `scrypt$N$r$p$salt$hash`. */
@Injectable()
export class PasswordHasher {
  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const derived = await derive(password, salt, DEFAULT_PARAMS);
    const { N, r, p } = DEFAULT_PARAMS;
    return [
      'scrypt',
      N,
      r,
      p,
      salt.toString('base64url'),
      derived.toString('base64url'),
    ].join('$');
  }

  /** `stored` is null when there is no such user; the result is then false. */
  async verify(password: string, stored: string | null): Promise<boolean> {
    const parsed = stored === null ? null : parseHash(stored);
    if (!parsed) {
      await derive(password, PLACEHOLDER_SALT, DEFAULT_PARAMS);
      return false;
    }
    const derived = await derive(password, parsed.salt, parsed.params);
    return (
      derived.length === parsed.hash.length &&
      timingSafeEqual(derived, parsed.hash)
    );
  }
}
