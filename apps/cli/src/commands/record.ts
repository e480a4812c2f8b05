import { Command } from 'commander';
import { createHistoryRecord } from '@shellsync/history';
import {
  encodedBlobDataLength,
  MAX_BLOB_DATA_LENGTH,
} from '@shellsync/sync-engine';
import {
  createSync,
  requireKey,
  sessionFile,
  withLocalState,
  withSyncLock,
  type CliDeps,
  type LocalState,
} from '../context';
import { formatFailure, formatReport } from '../format';
import { parseInteger } from './options';

type RecordOptions = {
  cwd: string;
  exit?: number;
  duration?: number;
  session?: string;
  sync: boolean;
};

async function autoSync(deps: CliDeps, local: LocalState): Promise<void> {
  const { settings, output } = deps;
  const session = await sessionFile(settings).read();
  if (!session) return;
  try {
    const key = await requireKey(settings);
    const { scheduler } = createSync(deps, local, { session, key });
    const locked = await withSyncLock(settings, local, () =>
      scheduler.syncIfDue(settings.syncFrequencyMs)
    );
    if (!locked.acquired) {
      output.debug('Skipped the background sync: another sync is running');
      return;
    }
    if (locked.value) output.debug(formatReport(locked.value));
  } catch (error) {
    output.warn(`Background sync failed: ${formatFailure(error)}`);
  }
}

export function createRecordCommand(deps: CliDeps): Command {
  return new Command('record')
    .description('add a command to the local history')
    .argument('<command...>', 'the command line that was run')
    .option('--cwd <dir>', 'directory the command ran in', process.cwd())
    .option('--exit <code>', 'exit status', parseInteger)
    .option('--duration <ms>', 'run time in milliseconds', parseInteger)
    .option('--session <id>', 'shell session id')
    .option('--no-sync', 'skip the automatic sync')
    .action(async (commandParts: string[], options: RecordOptions) => {
      const { settings, output } = deps;
      const record = createHistoryRecord({
        command: commandParts.join(' '),
        cwd: options.cwd,
        hostname: settings.hostname,
        exitCode: options.exit,
        duration: options.duration,
        session: options.session ?? deps.env.SHELLSYNC_SESSION,
      });

      const dataLength = encodedBlobDataLength(record);
      if (dataLength > MAX_BLOB_DATA_LENGTH) {
        output.warn(
          `Not recording a command of ${dataLength} bytes once encrypted; the server accepts at most ${MAX_BLOB_DATA_LENGTH}`
        );
        return;
      }

      await withLocalState(settings, async (local) => {
        await local.store.insertIfAbsent(record);
        output.debug(`Recorded ${record.id}`);
        if (settings.autoSync && options.sync) {
          await autoSync(deps, local);
        }
      });
    });
}
