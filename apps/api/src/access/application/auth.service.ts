import { Inject, Injectable, Logger } from '@nestjs/common';
import { ServerConfig } from '../../platform/config/server-config';
import type { AuthenticatedUser } from './authenticated-user';
import {
  EmailTakenError,
  InvalidCredentialsError,
  InvalidSessionError,
  RegistrationClosedError,
  UserNotFoundError,
  UsernameTakenError,
} from './errors';
import { PasswordHasher } from './password-hasher';
import { SessionRepository } from './ports/session-repository';
import {
  UserAlreadyExistsError,
  UserRepository,
  type UserRecord,
} from './ports/user-repository';
import { generateSessionToken, hashSessionToken } from './session-token';

export type IssuedSession = Readonly<{ session: string }>;

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(UserRepository) private readonly users: UserRepository,
    @Inject(SessionRepository) private readonly sessions: SessionRepository,
    @Inject(PasswordHasher) private readonly hasher: PasswordHasher,
    @Inject(ServerConfig) private readonly config: ServerConfig
  ) {}

  async register(input: {
    email: string;
    username: string;
    password: string;
  }): Promise<IssuedSession> {
    if (!this.config.openRegistration) {
      throw new RegistrationClosedError();
    }
    if (await this.users.findByUsername(input.username)) {
      throw new UsernameTakenError();
    }

    const passwordHash = await this.hasher.hash(input.password);
    let user: UserRecord;
    try {
      user = await this.users.create({
        username: input.username,
        email: input.email.trim().toLowerCase(),
        passwordHash,
      });
    } catch (error) {
      if (error instanceof UserAlreadyExistsError) {
        throw error.field === 'username'
          ? new UsernameTakenError()
          : new EmailTakenError();
      }
      throw error;
    }

    this.logger.log(`Registered user ${user.username}`);
    return this.issueSession(user);
  }

  async login(input: {
    username: string;
    password: string;
  }): Promise<IssuedSession> {
    const user = await this.users.findByUsername(input.username);
    const valid = await this.hasher.verify(
      input.password,
      user?.passwordHash ?? null
    );
    if (!user || !valid) {
      this.logger.warn(`Rejected login for ${input.username}`);
      throw new InvalidCredentialsError();
    }
    return this.issueSession(user);
  }

  async logout(sessionToken: string): Promise<boolean> {
    return this.sessions.delete(hashSessionToken(sessionToken));
  }

  async validateSession(sessionToken: string): Promise<AuthenticatedUser> {
    const tokenHash = hashSessionToken(sessionToken);
    const session = await this.sessions.findByTokenHash(tokenHash);
    if (!session) {
      throw new InvalidSessionError();
    }
    if (session.expiresAt.getTime() <= Date.now()) {
      await this.sessions.delete(tokenHash);
      throw new InvalidSessionError();
    }
    return { id: session.userId, username: session.username };
  }

  async getUser(username: string): Promise<{ username: string }> {
    const user = await this.users.findByUsername(username);
    if (!user) {
      throw new UserNotFoundError(username);
    }
    return { username: user.username };
  }

  private async issueSession(user: UserRecord): Promise<IssuedSession> {
    const session = generateSessionToken();
    await this.sessions.create({
      tokenHash: hashSessionToken(session),
      userId: user.id,
      expiresAt: new Date(Date.now() + this.config.sessionTtlMs),
    });
    this.logger.debug(`Issued session for ${user.username}`);
    return { session };
  }
}
