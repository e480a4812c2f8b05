const BASE64URL_REGEX = /^[A-Za-z0-9_-]*$/;

export const encodeBase64Url = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    'base64url'
  );

/**
 * Strict decoder: Buffer silently drops characters outside the alphabet, which
 * would let a mangled value decode to different bytes instead of failing.
 */
export const decodeBase64Url = (value: string): Uint8Array => {
  if (!BASE64URL_REGEX.test(value) || value.length % 4 === 1) {
    throw new Error('Value is not base64url encoded');
  }
  return new Uint8Array(Buffer.from(value, 'base64url'));
};
