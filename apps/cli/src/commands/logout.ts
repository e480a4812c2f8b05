import { Command } from 'commander';
import { createAuthClient, sessionFile, type CliDeps } from '../context';

export function createLogoutCommand(deps: CliDeps): Command {
  return new Command('logout')
    .description('end the session with the sync server')
    .action(async () => {
      const { settings, output } = deps;
      const file = sessionFile(settings);
      const session = await file.read();
      if (!session) {
        output.info('Not logged in.');
        return;
      }

      try {
        const { revoked } = await createAuthClient(deps).logout(session);
        if (!revoked) output.debug('Server had already dropped the session');
      } catch (error) {
        // The local session is removed either way.
        const message = error instanceof Error ? error.message : String(error);
        output.warn(`Could not revoke the session on the server: ${message}`);
      } finally {
        await file.clear();
      }
      output.success('Logged out.');
    });
}
