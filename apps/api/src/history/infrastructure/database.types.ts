import type { ColumnType, Generated } from 'kysely';

type TimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string
>;

export interface HistoryBlobsTable {
  id: Generated<string>;
  user_id: string;
  client_id: string;
  timestamp: ColumnType<Date, Date | string, Date | string>;
  hostname: string;
  data: string;
  created_at: TimestampColumn;
}

export interface HistoryDatabase {
  'history.blobs': HistoryBlobsTable;
}
