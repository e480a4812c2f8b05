import { Command } from 'commander';
import { MAX_BLOB_DATA_LENGTH } from '@shellsync/sync-engine';
import {
  createSync,
  requireKey,
  requireSession,
  withLocalState,
  withSyncLock,
  type CliDeps,
} from '../context';
import { CliError } from '../errors';
import { formatFailure, formatReport, formatStatusChange } from '../format';

type SyncOptions = {
  force?: boolean;
  verbose?: boolean;
};

export function createSyncCommand(deps: CliDeps): Command {
  return new Command('sync')
    .description('sync with the configured server')
    .option('-f, --force', 're-download everything')
    .option('-v, --verbose', 'print every sync state change')
    .action(async (options: SyncOptions) => {
      const { settings, output } = deps;
      const session = await requireSession(settings);
      const key = await requireKey(settings);

      await withLocalState(settings, async (local) => {
        const { scheduler } = createSync(
          deps,
          local,
          { session, key },
          options.verbose
            ? (status) => output.info(`sync: ${formatStatusChange(status)}`)
            : undefined
        );
        const locked = await withSyncLock(settings, local, async () => {
          try {
            return await scheduler.syncWithRetry({
              force: options.force ?? false,
            });
          } catch (error) {
            throw new CliError(formatFailure(error), error);
          }
        });
        if (!locked.acquired) {
          throw new CliError('Another sync is already running for this host.');
        }

        const report = locked.value;
        output.success(formatReport(report));
        for (const rejected of report.rejected) {
          output.warn(
            `Record ${rejected.id} is too large to sync (${rejected.dataLength} of ${MAX_BLOB_DATA_LENGTH} bytes once encrypted)`
          );
        }
        if (report.drift !== 0) {
          output.debug(
            `Server held ${report.remoteCount} records, this machine ${report.localCount}`
          );
        }
        if (report.recovered) {
          output.debug('Rescanned the server history for late uploads');
        }
      });
    });
}
