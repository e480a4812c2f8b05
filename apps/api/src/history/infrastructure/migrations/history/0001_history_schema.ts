import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema.createSchema('history').ifNotExists().execute();

  await db.schema
    .createTable('history.blobs')
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('user_id', 'uuid', (col) => col.notNull())
    .addColumn('client_id', 'uuid', (col) => col.notNull())
    .addColumn('timestamp', 'timestamptz', (col) => col.notNull())
    .addColumn('hostname', 'varchar(255)', (col) => col.notNull())
    .addColumn('data', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addUniqueConstraint('history_blobs_user_client_key', [
      'user_id',
      'client_id',
    ])
    .execute();

  await db.schema
    .createIndex('history_blobs_user_timestamp_idx')
    .on('history.blobs')
    .columns(['user_id', 'timestamp', 'client_id'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('history.blobs').ifExists().execute();
  await db.schema.dropSchema('history').ifExists().execute();
}
