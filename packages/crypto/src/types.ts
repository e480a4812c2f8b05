/** 256-bit key shared by every host of one user. */
export type SymmetricKey = Uint8Array;

/**
 * Server-storable form of a history record. Only `ciphertext` carries the
 * payload; `id`, `timestamp` and `hostname` stay in cleartext so the server can
 * index and filter without decrypting.
 */
export type EncryptedBlob = Readonly<{
  id: string;
  timestamp: number;
  hostname: string;
  nonce: Uint8Array;
  ciphertext: Uint8Array;
}>;

export type SealedBox = Readonly<{
  nonce: Uint8Array;
  ciphertext: Uint8Array;
}>;

/**
 * Authenticated encryption primitive. `seal` picks the nonce itself: callers
 * never supply one, so a nonce cannot be reused by accident.
 */
export interface AeadCipherPort {
  seal(
    plaintext: Uint8Array,
    key: SymmetricKey,
    aad: Uint8Array
  ): SealedBox;
  open(box: SealedBox, key: SymmetricKey, aad: Uint8Array): Uint8Array;
}
