export const CryptoErrorKinds = {
  encodingFailure: 'encoding_failure',
  authenticationFailure: 'authentication_failure',
  invalidKey: 'invalid_key',
} as const;

export type CryptoErrorKind =
  (typeof CryptoErrorKinds)[keyof typeof CryptoErrorKinds];

export type CryptoErrorContext = Readonly<{
  id?: string;
  timestamp?: number;
  hostname?: string;
}>;

export class CryptoError extends Error {
  constructor(
    readonly kind: CryptoErrorKind,
    message: string,
    readonly context: CryptoErrorContext = {},
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CryptoError';
  }
}
