export type SessionRecord = Readonly<{
  tokenHash: string;
  userId: string;
  username: string;
  expiresAt: Date;
}>;

export type NewSession = Readonly<{
  tokenHash: string;
  userId: string;
  expiresAt: Date;
}>;

/** Sessions are looked up by the hash of their token, never the token itself. */
export abstract class SessionRepository {
  abstract create(session: NewSession): Promise<void>;

  abstract findByTokenHash(tokenHash: string): Promise<SessionRecord | null>;

  abstract delete(tokenHash: string): Promise<boolean>;
}
