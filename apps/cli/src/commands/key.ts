import { Command } from 'commander';
import { encodeKey, loadOrCreateKey } from '@shellsync/crypto';
import type { CliDeps } from '../context';

export function createKeyCommand(deps: CliDeps): Command {
  return new Command('key')
    .description('print the encryption key for transfer to another machine')
    .action(async () => {
      const key = await loadOrCreateKey(deps.settings.keyPath);
      deps.output.line(encodeKey(key));
    });
}
