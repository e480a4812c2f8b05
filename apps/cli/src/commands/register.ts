import { Command } from 'commander';
import { loadOrCreateKey } from '@shellsync/crypto';
import { createAuthClient, sessionFile, type CliDeps } from '../context';
import { CliError } from '../errors';

type RegisterOptions = {
  username: string;
  email: string;
  password?: string;
};

export function resolvePassword(
  deps: CliDeps,
  password: string | undefined
): string {
  const resolved = password ?? deps.env.SHELLSYNC_PASSWORD;
  if (!resolved) {
    throw new CliError(
      'A password is required: pass --password or set SHELLSYNC_PASSWORD.'
    );
  }
  return resolved;
}

export function createRegisterCommand(deps: CliDeps): Command {
  return new Command('register')
    .description('register an account with the sync server')
    .requiredOption('-u, --username <username>', 'account name')
    .requiredOption('-e, --email <email>', 'account email')
    .option(
      '-p, --password <password>',
      'account password (defaults to $SHELLSYNC_PASSWORD)'
    )
    .action(async (options: RegisterOptions) => {
      const { settings, output } = deps;
      const { session } = await createAuthClient(deps).register({
        username: options.username,
        email: options.email,
        password: resolvePassword(deps, options.password),
      });
      await sessionFile(settings).write(session);
      await loadOrCreateKey(settings.keyPath);

      output.success(`Registered ${options.username}.`);
      output.info(
        `Your encryption key is at ${settings.keyPath}. Run "shellsync key" to copy it to your other machines.`
      );
    });
}
