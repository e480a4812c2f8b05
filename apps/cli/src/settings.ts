import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { CliError } from './errors';

export const SETTINGS_FILE = 'config.yaml';
export const DEFAULT_SYNC_ADDRESS = 'http://127.0.0.1:8888';
export const DEFAULT_SYNC_FREQUENCY = '1h';
export const DEFAULT_TIMEOUT_MS = 30_000;

const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * `0` syncs after every command, `never` turns scheduled syncs off, anything
 * else is a duration such as `30s`, `5m`, `1h` or `1d`.
 */
export function parseSyncFrequency(value: string): number {
  const trimmed = value.trim();
  if (trimmed === '0') return 0;
  if (trimmed === 'never') return -1;
  const match = /^(\d+)([smhd])$/.exec(trimmed);
  if (!match) {
    throw new Error(
      `Invalid sync_frequency "${value}". Use 0, never, or a duration like 30s, 5m, 1h, 1d`
    );
  }
  return Number(match[1]) * UNIT_MS[match[2]];
}

const SettingsFileSchema = z
  .object({
    sync_address: z.string().url().default(DEFAULT_SYNC_ADDRESS),
    db_path: z.string().min(1).optional(),
    key_path: z.string().min(1).optional(),
    session_path: z.string().min(1).optional(),
    hostname: z.string().min(1).optional(),
    auto_sync: z.boolean().default(true),
    sync_frequency: z
      .union([z.string(), z.number().int().nonnegative()])
      .default(DEFAULT_SYNC_FREQUENCY)
      .transform((value, ctx) => {
        try {
          return parseSyncFrequency(String(value));
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error instanceof Error ? error.message : String(error),
          });
          return z.NEVER;
        }
      }),
    timeout_ms: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  })
  .strict();

export type Settings = Readonly<{
  configDir: string;
  syncAddress: string;
  dbPath: string;
  keyPath: string;
  sessionPath: string;
  hostname: string;
  autoSync: boolean;
  /** Milliseconds; 0 means every command, negative means never. */
  syncFrequencyMs: number;
  timeoutMs: number;
}>;

export type SettingsEnvironment = Readonly<{
  env: Readonly<Record<string, string | undefined>>;
  homeDir: string;
  hostname: string;
}>;

const expandHome = (value: string, homeDir: string): string =>
  value === '~' || value.startsWith('~/')
    ? path.join(homeDir, value.slice(1))
    : value;

const readSettingsFile = (filePath: string): unknown => {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf-8');
  try {
    const parsed: unknown = YAML.parse(raw);
    return parsed ?? {};
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`Could not parse ${filePath}: ${message}`, error);
  }
};

export function loadSettings(
  environment: SettingsEnvironment = {
    env: process.env,
    homeDir: os.homedir(),
    hostname: os.hostname(),
  }
): Settings {
  const { env, homeDir } = environment;
  const configDir = expandHome(
    env.SHELLSYNC_CONFIG_DIR ?? path.join(homeDir, '.config', 'shellsync'),
    homeDir
  );
  const dataDir = expandHome(
    env.SHELLSYNC_DATA_DIR ??
      path.join(homeDir, '.local', 'share', 'shellsync'),
    homeDir
  );
  const filePath = path.join(configDir, SETTINGS_FILE);

  const parsed = SettingsFileSchema.safeParse(readSettingsFile(filePath));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
      .join('; ');
    throw new CliError(`Invalid settings in ${filePath}: ${issues}`);
  }
  const file = parsed.data;

  return {
    configDir,
    syncAddress: env.SHELLSYNC_SYNC_ADDRESS ?? file.sync_address,
    dbPath: expandHome(
      env.SHELLSYNC_DB_PATH ?? file.db_path ?? path.join(dataDir, 'history.db'),
      homeDir
    ),
    keyPath: expandHome(file.key_path ?? path.join(dataDir, 'key'), homeDir),
    sessionPath: expandHome(
      file.session_path ?? path.join(dataDir, 'session'),
      homeDir
    ),
    hostname: file.hostname ?? environment.hostname,
    autoSync: file.auto_sync,
    syncFrequencyMs: file.sync_frequency,
    timeoutMs: file.timeout_ms,
  };
}
