import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  UserAlreadyExistsError,
  UserRepository,
  type NewUser,
  type UserRecord,
} from '../application/ports/user-repository';
import { AccessDatabaseService } from './database.service';
import { EMAIL_CONSTRAINT } from './migrations/access/0001_access_schema';

const UNIQUE_VIOLATION = '23505';

const uniqueViolationField = (error: unknown): 'username' | 'email' | null => {
  if (typeof error !== 'object' || error === null) return null;
  if (!('code' in error) || error.code !== UNIQUE_VIOLATION) return null;
  const constraint = 'constraint' in error ? error.constraint : undefined;
  return constraint === EMAIL_CONSTRAINT ? 'email' : 'username';
};

type UserRow = {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
};

const toRecord = (row: UserRow): UserRecord => ({
  id: row.id,
  username: row.username,
  email: row.email,
  passwordHash: row.password_hash,
  createdAt: row.created_at,
});

@Injectable()
export class KyselyUserRepository extends UserRepository {
  private readonly logger = new Logger(KyselyUserRepository.name);

  constructor(
    @Inject(AccessDatabaseService)
    private readonly database: AccessDatabaseService
  ) {
    super();
  }

  async create(user: NewUser): Promise<UserRecord> {
    try {
      const row = await this.database
        .getDb()
        .insertInto('access.users')
        .values({
          username: user.username,
          email: user.email,
          password_hash: user.passwordHash,
        })
        .returning(['id', 'username', 'email', 'password_hash', 'created_at'])
        .executeTakeFirstOrThrow();
      this.logger.debug(`Created user ${row.id}`);
      return toRecord(row);
    } catch (error) {
      const field = uniqueViolationField(error);
      if (field) throw new UserAlreadyExistsError(field, error);
      throw error;
    }
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const row = await this.database
      .getDb()
      .selectFrom('access.users')
      .select(['id', 'username', 'email', 'password_hash', 'created_at'])
      .where('username', '=', username)
      .executeTakeFirst();
    return row ? toRecord(row) : null;
  }
}
