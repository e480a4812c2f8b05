export { openHistoryDatabase, IN_MEMORY } from './database';
export {
  HISTORY_MIGRATIONS,
  LATEST_SCHEMA_VERSION,
  migrateHistoryDatabase,
  readSchemaVersion,
} from './migrations';
export { SqliteHistoryStore } from './SqliteHistoryStore';
export { SqliteCheckpointStore } from './SqliteCheckpointStore';
export {
  SqliteSyncLock,
  type SqliteSyncLockOptions,
} from './SqliteSyncLock';
