export type UserRecord = Readonly<{
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: Date;
}>;

export type NewUser = Readonly<{
  username: string;
  email: string;
  passwordHash: string;
}>;

export class UserAlreadyExistsError extends Error {
  constructor(
    readonly field: 'username' | 'email',
    override readonly cause?: unknown
  ) {
    super(`A user with this ${field} already exists`);
    this.name = 'UserAlreadyExistsError';
  }
}

export abstract class UserRepository {
  /** Throws `UserAlreadyExistsError` when the username or email is taken. */
  abstract create(user: NewUser): Promise<UserRecord>;

  abstract findByUsername(username: string): Promise<UserRecord | null>;
}
