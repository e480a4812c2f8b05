const AAD_PREFIX = 'shellsync:history:v1';

/**
 * Associated data for a history blob: binds the cleartext metadata the server
 * sees to the ciphertext, so metadata cannot be swapped between blobs.
 */
export const buildHistoryAad = (
  id: string,
  timestamp: number,
  hostname: string
): Uint8Array =>
  new TextEncoder().encode(
    `${AAD_PREFIX}:${id}:${timestamp}:${hostname.length}:${hostname}`
  );
