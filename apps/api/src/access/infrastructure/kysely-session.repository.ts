import { Inject, Injectable } from '@nestjs/common';
import {
  SessionRepository,
  type NewSession,
  type SessionRecord,
} from '../application/ports/session-repository';
import { AccessDatabaseService } from './database.service';

@Injectable()
export class KyselySessionRepository extends SessionRepository {
  constructor(
    @Inject(AccessDatabaseService)
    private readonly database: AccessDatabaseService
  ) {
    super();
  }

  async create(session: NewSession): Promise<void> {
    await this.database
      .getDb()
      .insertInto('access.sessions')
      .values({
        token_hash: session.tokenHash,
        user_id: session.userId,
        expires_at: session.expiresAt,
      })
      .execute();
  }

  async findByTokenHash(tokenHash: string): Promise<SessionRecord | null> {
    const row = await this.database
      .getDb()
      .selectFrom('access.sessions as s')
      .innerJoin('access.users as u', 'u.id', 's.user_id')
      .select(['s.token_hash', 's.user_id', 's.expires_at', 'u.username'])
      .where('s.token_hash', '=', tokenHash)
      .executeTakeFirst();
    if (!row) return null;
    return {
      tokenHash: row.token_hash,
      userId: row.user_id,
      username: row.username,
      expiresAt: row.expires_at,
    };
  }

  async delete(tokenHash: string): Promise<boolean> {
    const result = await this.database
      .getDb()
      .deleteFrom('access.sessions')
      .where('token_hash', '=', tokenHash)
      .executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}
