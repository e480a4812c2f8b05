export type {
  AeadCipherPort,
  EncryptedBlob,
  SealedBox,
  SymmetricKey,
} from './types';
export { CipherEngine } from './CipherEngine';
export {
  NodeAeadCipher,
  KEY_LENGTH,
  NONCE_LENGTH,
  TAG_LENGTH,
} from './NodeAeadCipher';
export { buildHistoryAad } from './aad';
export {
  CryptoError,
  CryptoErrorKinds,
  type CryptoErrorContext,
  type CryptoErrorKind,
} from './errors';
export {
  decodeKey,
  encodeKey,
  generateKey,
  loadKey,
  loadOrCreateKey,
  writeKey,
} from './keyFile';
export { decodeBase64Url, encodeBase64Url } from './base64url';
