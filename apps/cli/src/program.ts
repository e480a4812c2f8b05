import { Command } from 'commander';
import { createKeyCommand } from './commands/key';
import { createLoginCommand } from './commands/login';
import { createLogoutCommand } from './commands/logout';
import { createRecordCommand } from './commands/record';
import { createStatusCommand } from './commands/status';
import { createSyncCommand } from './commands/sync';
import { createRegisterCommand } from './commands/register';
import type { CliDeps } from './context';

export const CLI_VERSION = '0.1.0';

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('shellsync')
    .version(CLI_VERSION)
    .description('End-to-end encrypted shell history, synced across machines');

  program.addCommand(createRegisterCommand(deps));
  program.addCommand(createLoginCommand(deps));
  program.addCommand(createLogoutCommand(deps));
  program.addCommand(createKeyCommand(deps));
  program.addCommand(createRecordCommand(deps));
  program.addCommand(createSyncCommand(deps));
  program.addCommand(createStatusCommand(deps));

  return program;
}
