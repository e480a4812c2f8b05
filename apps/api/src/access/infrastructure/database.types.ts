import type { ColumnType, Generated } from 'kysely';

type TimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string
>;

export interface AccessUsersTable {
  id: Generated<string>;
  username: string;
  email: string;
  password_hash: string;
  created_at: TimestampColumn;
}

export interface AccessSessionsTable {
  token_hash: string;
  user_id: string;
  created_at: TimestampColumn;
  expires_at: ColumnType<Date, Date | string, Date | string>;
}

export interface AccessDatabase {
  'access.users': AccessUsersTable;
  'access.sessions': AccessSessionsTable;
}
