import { CommanderError } from 'commander';
import { CryptoError } from '@shellsync/crypto';
import { ProtocolError, TransportError } from '@shellsync/sync-engine';
import { CliError } from './errors';
import { createOutput } from './output';
import { createProgram } from './program';
import { loadSettings } from './settings';

async function main(): Promise<void> {
  const output = createOutput();
  try {
    const settings = loadSettings();
    const program = createProgram({ settings, output, env: process.env });
    program.exitOverride();
    await program.parseAsync();
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version output end with a zero exit code
      process.exitCode = err.exitCode;
      return;
    }
    if (
      err instanceof CliError ||
      err instanceof CryptoError ||
      err instanceof TransportError ||
      err instanceof ProtocolError
    ) {
      output.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
