import { randomUUID } from 'node:crypto';
import type BetterSqlite3 from 'better-sqlite3';
import { CryptoError, loadKey, type SymmetricKey } from '@shellsync/crypto';
import {
  openHistoryDatabase,
  SqliteCheckpointStore,
  SqliteHistoryStore,
  SqliteSyncLock,
} from '@shellsync/history-store';
import {
  HttpAuthClient,
  HttpSyncTransport,
  SyncClient,
  SyncScheduler,
  type SyncStatus,
} from '@shellsync/sync-engine';
import { CliError } from './errors';
import type { Output } from './output';
import { SessionFile } from './session';
import type { Settings } from './settings';

export type CliDeps = Readonly<{
  settings: Settings;
  output: Output;
  env: Readonly<Record<string, string | undefined>>;
  fetchImpl?: typeof fetch;
}>;

export type LocalState = Readonly<{
  db: BetterSqlite3.Database;
  store: SqliteHistoryStore;
  checkpoints: SqliteCheckpointStore;
}>;

export async function withLocalState<T>(
  settings: Settings,
  work: (local: LocalState) => Promise<T>
): Promise<T> {
  const db = openHistoryDatabase(settings.dbPath);
  try {
    return await work({
      db,
      store: new SqliteHistoryStore(db),
      checkpoints: new SqliteCheckpointStore(db),
    });
  } finally {
    db.close();
  }
}

export type LockedWork<T> =
  | Readonly<{ acquired: true; value: T }>
  | Readonly<{ acquired: false }>;

/** Runs `work` while holding this host's sync lock, unless another process holds it. */
export async function withSyncLock<T>(
  settings: Settings,
  local: LocalState,
  work: () => Promise<T>
): Promise<LockedWork<T>> {
  const lock = new SqliteSyncLock(local.db);
  const holder = randomUUID();
  if (!lock.tryAcquire(settings.hostname, holder)) {
    return { acquired: false };
  }
  try {
    return { acquired: true, value: await work() };
  } finally {
    lock.release(settings.hostname, holder);
  }
}

export const sessionFile = (settings: Settings): SessionFile =>
  new SessionFile(settings.sessionPath);

export const createAuthClient = (deps: CliDeps): HttpAuthClient =>
  new HttpAuthClient({
    baseUrl: deps.settings.syncAddress,
    timeoutMs: deps.settings.timeoutMs,
    fetchImpl: deps.fetchImpl,
  });

export async function requireSession(settings: Settings): Promise<string> {
  const session = await sessionFile(settings).read();
  if (!session) {
    throw new CliError('Not logged in. Run "shellsync login" first.');
  }
  return session;
}

export async function requireKey(settings: Settings): Promise<SymmetricKey> {
  try {
    return await loadKey(settings.keyPath);
  } catch (error) {
    if (error instanceof CryptoError) {
      throw new CliError(
        `The key at ${settings.keyPath} is invalid: ${error.message}`,
        error
      );
    }
    throw new CliError(
      `No encryption key at ${settings.keyPath}. Log in with --key to use an existing one.`,
      error
    );
  }
}

export const createTransport = (
  deps: CliDeps,
  session: string
): HttpSyncTransport =>
  new HttpSyncTransport({
    baseUrl: deps.settings.syncAddress,
    timeoutMs: deps.settings.timeoutMs,
    fetchImpl: deps.fetchImpl,
    sessionToken: session,
  });

export type SyncSetup = Readonly<{
  client: SyncClient;
  scheduler: SyncScheduler;
  transport: HttpSyncTransport;
}>;

export function createSync(
  deps: CliDeps,
  local: LocalState,
  credentials: Readonly<{ session: string; key: SymmetricKey }>,
  onStatusChange?: (status: SyncStatus) => void
): SyncSetup {
  const { settings } = deps;
  const transport = createTransport(deps, credentials.session);
  const client = new SyncClient({
    store: local.store,
    checkpoints: local.checkpoints,
    transport,
    context: { hostname: settings.hostname, key: credentials.key },
    onStatusChange,
  });
  const scheduler = new SyncScheduler({
    runner: client,
    checkpoints: local.checkpoints,
    hostname: settings.hostname,
  });
  return { client, scheduler, transport };
}
