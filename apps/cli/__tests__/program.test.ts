import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  openHistoryDatabase,
  SqliteHistoryStore,
  SqliteSyncLock,
} from '@shellsync/history-store';
import type { CliDeps } from '../src/context';
import { CliError } from '../src/errors';
import { createOutput } from '../src/output';
import { createProgram } from '../src/program';
import { SessionFile } from '../src/session';
import { loadSettings, type Settings } from '../src/settings';

const makeResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

type Route = (url: URL, init?: RequestInit) => unknown;

const fakeServer = (routes: Record<string, Route>) =>
  vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(String(input));
    const route = routes[`${init?.method ?? 'GET'} ${url.pathname}`];
    if (!route) return makeResponse({ reason: 'not found' }, 404);
    return makeResponse(route(url, init));
  });

describe('shellsync program', () => {
  let tmp: string;
  let settings: Settings;
  let stdout: string[];
  let stderr: string[];

  const run = async (args: string[], fetchImpl?: typeof fetch) => {
    const deps: CliDeps = {
      settings,
      env: {},
      fetchImpl,
      output: createOutput({
        verbose: false,
        color: false,
        stdout: { write: (chunk: string) => stdout.push(chunk) },
        stderr: { write: (chunk: string) => stderr.push(chunk) },
      }),
    };
    await createProgram(deps).exitOverride().parseAsync(args, { from: 'user' });
  };

  const logIn = () => new SessionFile(settings.sessionPath).write('test-session');

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'shellsync-cli-'));
    settings = loadSettings({
      env: {
        SHELLSYNC_CONFIG_DIR: path.join(tmp, 'config'),
        SHELLSYNC_DATA_DIR: path.join(tmp, 'data'),
      },
      homeDir: tmp,
      hostname: 'laptop',
    });
    stdout = [];
    stderr = [];
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('records commands locally and reports them in status', async () => {
    await run(['record', '--no-sync', '--cwd', '/srv', '--exit', '0', 'git', 'status']);
    await run(['status']);

    expect(stdout).toEqual([
      'Host: laptop\n',
      'Server: http://127.0.0.1:8888\n',
      'Logged in: no\n',
      'Local records: 1\n',
      'Last sync: never\n',
    ]);
    expect(stderr).toEqual([]);
  });

  it('prints the same key on every call', async () => {
    await run(['key']);
    await run(['key']);

    expect(stdout).toHaveLength(2);
    expect(stdout[0]).toBe(stdout[1]);
    expect(stdout[0]).toMatch(/^[A-Za-z0-9+/]{43}=\n$/);
  });

  it('refuses to sync without a session', async () => {
    const sync = run(['sync']);

    await expect(sync).rejects.toThrow(CliError);
    await expect(run(['sync'])).rejects.toThrow(
      'Not logged in. Run "shellsync login" first.'
    );
  });

  it('logs in and stores the session', async () => {
    const fetchImpl = fakeServer({
      'POST /login': () => ({ session: 'test-session' }),
    });

    await run(
      ['login', '--username', 'alice', '--password', 'test-password'],
      fetchImpl
    );

    await expect(new SessionFile(settings.sessionPath).read()).resolves.toBe(
      'test-session'
    );
    expect(fs.existsSync(settings.keyPath)).toBe(true);
    expect(stdout).toEqual(['Logged in as alice.\n']);
    const [, init] = fetchImpl.mock.calls[0];
    expect(init?.body).toBe(
      JSON.stringify({ username: 'alice', password: 'test-password' })
    );
  });

  it('uploads local records and downloads nothing new', async () => {
    const uploads: unknown[] = [];
    const fetchImpl = fakeServer({
      'GET /sync/count': () => ({ count: 0 }),
      'POST /history': (_url, init) => {
        const batch: unknown = JSON.parse(String(init?.body));
        uploads.push(batch);
        return { stored: Array.isArray(batch) ? batch.length : 0 };
      },
      'GET /sync/history': () => ({ history: [] }),
    });
    await logIn();
    await run(['key']);
    stdout = [];
    await run(['record', '--no-sync', '--', 'ls', '-la']);

    await run(['sync'], fetchImpl);

    expect(stdout).toEqual([
      'Sync complete: uploaded 1 record, downloaded 0 records (1 page)\n',
    ]);
    expect(uploads).toHaveLength(1);
    const historyCall = fetchImpl.mock.calls.find(([input]) =>
      String(input).includes('/sync/history')
    );
    expect(new URL(String(historyCall?.[0])).searchParams.get('host')).toBe(
      'laptop'
    );
  });

  it('prints state changes in verbose mode', async () => {
    const fetchImpl = fakeServer({
      'GET /sync/count': () => ({ count: 0 }),
      'GET /sync/history': () => ({ history: [] }),
    });
    await logIn();
    await run(['key']);

    await run(['sync', '--verbose'], fetchImpl);

    expect(stderr.slice(0, 3)).toEqual([
      'sync: negotiating\n',
      'sync: uploading\n',
      'sync: downloading\n',
    ]);
    expect(stderr[3]).toMatch(/^sync: committed at \d{4}-\d{2}-\d{2}T/);
  });

  it('syncs after recording when a sync is due', async () => {
    const fetchImpl = fakeServer({
      'GET /sync/count': () => ({ count: 0 }),
      'POST /history': () => ({ stored: 1 }),
      'GET /sync/history': () => ({ history: [] }),
    });
    await logIn();
    await run(['key']);

    await run(['record', 'make', 'test'], fetchImpl);
    await run(['status', '--verbose'], fetchImpl);

    const posted = fetchImpl.mock.calls.filter(
      ([, init]) => init?.method === 'POST'
    );
    expect(posted).toHaveLength(1);
    expect(stdout).toContain('Logged in: yes\n');
    expect(stdout).toContain('Server records: 0\n');
    expect(stdout).not.toContain('Last sync: never\n');
  });

  it('logs out even when the server cannot be reached', async () => {
    const fetchImpl = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    await logIn();

    await run(['logout'], fetchImpl);

    await expect(
      new SessionFile(settings.sessionPath).read()
    ).resolves.toBeNull();
    expect(stdout).toEqual(['Logged out.\n']);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^warning: Could not revoke the session/);
  });

  it('refuses to sync while another process holds the lock', async () => {
    const fetchImpl = fakeServer({
      'GET /sync/count': () => ({ count: 0 }),
      'GET /sync/history': () => ({ history: [] }),
    });
    await logIn();
    await run(['key']);
    const db = openHistoryDatabase(settings.dbPath);
    const lock = new SqliteSyncLock(db);
    lock.tryAcquire('laptop', 'other-process');

    try {
      await expect(run(['sync'], fetchImpl)).rejects.toThrow(
        'Another sync is already running for this host.'
      );
      expect(fetchImpl).not.toHaveBeenCalled();

      lock.release('laptop', 'other-process');
      await run(['sync'], fetchImpl);
      expect(fetchImpl).toHaveBeenCalled();
    } finally {
      db.close();
    }
  });

  it('does not record commands too large to sync', async () => {
    await run(['record', '--no-sync', 'echo', 'x'.repeat(70_000)]);

    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(
      /^warning: Not recording a command of \d+ bytes once encrypted; the server accepts at most 65536\n$/
    );
    const db = openHistoryDatabase(settings.dbPath);
    try {
      await expect(new SqliteHistoryStore(db).count()).resolves.toBe(0);
    } finally {
      db.close();
    }
  });
});
