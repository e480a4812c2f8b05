import { Command } from 'commander';
import {
  createTransport,
  sessionFile,
  withLocalState,
  type CliDeps,
} from '../context';
import { formatFailure, formatTimestamp } from '../format';

type StatusOptions = {
  verbose?: boolean;
};

export function createStatusCommand(deps: CliDeps): Command {
  return new Command('status')
    .description('show local history and sync state')
    .option('-v, --verbose', 'include sync cursors')
    .action(async (options: StatusOptions) => {
      const { settings, output } = deps;
      const session = await sessionFile(settings).read();

      await withLocalState(settings, async (local) => {
        const checkpoint = await local.checkpoints.read(settings.hostname);
        output.line(`Host: ${settings.hostname}`);
        output.line(`Server: ${settings.syncAddress}`);
        output.line(`Logged in: ${session ? 'yes' : 'no'}`);
        output.line(`Local records: ${await local.store.count()}`);
        output.line(`Last sync: ${formatTimestamp(checkpoint.lastSuccessAt)}`);

        if (options.verbose) {
          output.line(
            `Download cursor: ${formatTimestamp(
              checkpoint.lastSyncTimestamp || null
            )} ${checkpoint.lastSyncId ?? '-'}`
          );
          output.line(
            `Upload cursor: ${formatTimestamp(
              checkpoint.lastUploadTimestamp || null
            )} ${checkpoint.lastUploadId ?? '-'}`
          );
        }

        if (!session) return;
        try {
          const { count } = await createTransport(deps, session).count();
          output.line(`Server records: ${count}`);
        } catch (error) {
          output.warn(`Could not reach the server: ${formatFailure(error)}`);
        }
      });
    });
}
