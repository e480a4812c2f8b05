import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import { ServerConfig } from '../../config/server-config';

@Injectable()
export class DatabaseService<DB = unknown> implements OnModuleDestroy {
  private readonly db: Kysely<DB>;

  constructor(@Inject(ServerConfig) config: ServerConfig) {
    const dialect = new PostgresDialect({
      pool: new Pool({ connectionString: config.databaseUrl }),
    });

    this.db = new Kysely<DB>({ dialect });
  }

  getDb(): Kysely<DB> {
    return this.db;
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.destroy();
  }
}
