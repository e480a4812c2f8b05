import { promises as fs } from 'fs';
import path from 'path';
import { Logger } from '@nestjs/common';
import {
  FileMigrationProvider,
  Kysely,
  Migrator,
  PostgresDialect,
  type MigrationResultSet,
} from 'kysely';
import { Pool } from 'pg';

type MigratorConfig = {
  migrationsPath: string;
  connectionString: string;
  migrationTableName: string;
  direction: 'up' | 'down';
};

const logger = new Logger('Migrations');

export async function runMigrations({
  migrationsPath,
  connectionString,
  migrationTableName,
  direction,
}: MigratorConfig): Promise<void> {
  const db = new Kysely<unknown>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });

  try {
    const provider = new FileMigrationProvider({
      fs,
      path,
      migrationFolder: migrationsPath,
    });

    const migrator = new Migrator({
      db,
      provider,
      migrationTableName,
      migrationLockTableName: `${migrationTableName}_lock`,
    });

    const migrationResult: MigrationResultSet =
      direction === 'down'
        ? await migrator.migrateDown()
        : await migrator.migrateToLatest();

    migrationResult.results?.forEach((result) => {
      if (result.status === 'Success') {
        logger.log(`Migration ${result.migrationName} ${direction} succeeded`);
      } else if (result.status === 'Error') {
        logger.error(`Migration ${result.migrationName} failed`);
      }
    });

    if (migrationResult.error) {
      throw migrationResult.error;
    }
  } finally {
    await db.destroy();
  }
}
