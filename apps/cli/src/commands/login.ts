import { Command } from 'commander';
import {
  CryptoError,
  decodeKey,
  loadOrCreateKey,
  writeKey,
  type SymmetricKey,
} from '@shellsync/crypto';
import { createAuthClient, sessionFile, type CliDeps } from '../context';
import { CliError } from '../errors';
import { resolvePassword } from './register';

type LoginOptions = {
  username: string;
  password?: string;
  key?: string;
};

const parseKeyOption = (encoded: string): SymmetricKey => {
  try {
    return decodeKey(encoded);
  } catch (error) {
    if (error instanceof CryptoError) {
      throw new CliError(`Invalid --key: ${error.message}`, error);
    }
    throw error;
  }
};

export function createLoginCommand(deps: CliDeps): Command {
  return new Command('login')
    .description('log in to the sync server')
    .requiredOption('-u, --username <username>', 'account name')
    .option(
      '-p, --password <password>',
      'account password (defaults to $SHELLSYNC_PASSWORD)'
    )
    .option('-k, --key <key>', 'encryption key printed by "shellsync key"')
    .action(async (options: LoginOptions) => {
      const { settings, output } = deps;
      const key = options.key ? parseKeyOption(options.key) : null;

      const { session } = await createAuthClient(deps).login({
        username: options.username,
        password: resolvePassword(deps, options.password),
      });
      await sessionFile(settings).write(session);

      if (key) {
        await writeKey(settings.keyPath, key);
      } else {
        await loadOrCreateKey(settings.keyPath);
      }
      output.success(`Logged in as ${options.username}.`);
      if (!key) {
        output.info(
          `Using the key at ${settings.keyPath}. Records from machines with a different key will not decrypt.`
        );
      }
    });
}
