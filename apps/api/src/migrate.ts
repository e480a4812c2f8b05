import path from 'path';
import { config } from 'dotenv';
import { Logger } from '@nestjs/common';
import { runMigrations } from './platform/infrastructure/migrations/migrator';

config();

const MIGRATION_SETS = [
  {
    folder: path.join(__dirname, 'access/infrastructure/migrations/access'),
    table: 'access_migrations',
  },
  {
    folder: path.join(__dirname, 'history/infrastructure/migrations/history'),
    table: 'history_migrations',
  },
] as const;

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to run migrations');
  }
  const direction = process.argv[2] === 'down' ? 'down' : 'up';
  const sets =
    direction === 'down' ? [...MIGRATION_SETS].reverse() : MIGRATION_SETS;

  for (const set of sets) {
    await runMigrations({
      migrationsPath: set.folder,
      connectionString,
      migrationTableName: set.table,
      direction,
    });
  }
}

void main().catch((error: unknown) => {
  new Logger('Migrations').error(
    'Migration run failed',
    error instanceof Error ? error.stack : String(error)
  );
  process.exit(1);
});
