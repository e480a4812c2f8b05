import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import type { AeadCipherPort, SealedBox, SymmetricKey } from './types';

export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
const AES_ALGO = 'aes-256-gcm';

const toBuffer = (input: Uint8Array): Buffer =>
  Buffer.isBuffer(input)
    ? input
    : Buffer.from(input.buffer, input.byteOffset, input.byteLength);

const assertKeyLength = (key: Uint8Array): void => {
  if (key.length !== KEY_LENGTH) {
    throw new Error(`Invalid key length: expected ${KEY_LENGTH} bytes`);
  }
};

/**
 * AES-256-GCM with a fresh 96-bit CSPRNG nonce per seal. The tag is appended
 * to the ciphertext.
 */
export class NodeAeadCipher implements AeadCipherPort {
  seal(plaintext: Uint8Array, key: SymmetricKey, aad: Uint8Array): SealedBox {
    assertKeyLength(key);
    const nonce = randomBytes(NONCE_LENGTH);
    const cipher = createCipheriv(AES_ALGO, toBuffer(key), nonce, {
      authTagLength: TAG_LENGTH,
    });
    cipher.setAAD(toBuffer(aad));

    const ciphertext = Buffer.concat([
      cipher.update(toBuffer(plaintext)),
      cipher.final(),
      cipher.getAuthTag(),
    ]);

    return {
      nonce: new Uint8Array(nonce),
      ciphertext: new Uint8Array(ciphertext),
    };
  }

  open(box: SealedBox, key: SymmetricKey, aad: Uint8Array): Uint8Array {
    assertKeyLength(key);
    if (box.nonce.length !== NONCE_LENGTH) {
      throw new Error('Invalid nonce length');
    }
    const data = toBuffer(box.ciphertext);
    if (data.length < TAG_LENGTH) {
      throw new Error('Ciphertext too short');
    }
    const tag = data.subarray(data.length - TAG_LENGTH);
    const payload = data.subarray(0, data.length - TAG_LENGTH);

    const decipher = createDecipheriv(AES_ALGO, toBuffer(key), toBuffer(box.nonce), {
      authTagLength: TAG_LENGTH,
    });
    decipher.setAAD(toBuffer(aad));
    decipher.setAuthTag(tag);

    const plaintext = Buffer.concat([decipher.update(payload), decipher.final()]);
    return new Uint8Array(plaintext);
  }
}
