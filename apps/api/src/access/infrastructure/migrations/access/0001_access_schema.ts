import { Kysely, sql } from 'kysely';

export const USERNAME_CONSTRAINT = 'access_users_username_key';
export const EMAIL_CONSTRAINT = 'access_users_email_key';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema.createSchema('access').ifNotExists().execute();

  await db.schema
    .createTable('access.users')
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('username', 'varchar(64)', (col) => col.notNull())
    .addColumn('email', 'varchar(320)', (col) => col.notNull())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addUniqueConstraint(USERNAME_CONSTRAINT, ['username'])
    .addUniqueConstraint(EMAIL_CONSTRAINT, ['email'])
    .execute();

  await db.schema
    .createTable('access.sessions')
    .addColumn('token_hash', 'char(64)', (col) => col.primaryKey())
    .addColumn('user_id', 'uuid', (col) =>
      col.notNull().references('access.users.id').onDelete('cascade')
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('access_sessions_user_idx')
    .on('access.sessions')
    .column('user_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('access.sessions').ifExists().execute();
  await db.schema.dropTable('access.users').ifExists().execute();
  await db.schema.dropSchema('access').ifExists().execute();
}
