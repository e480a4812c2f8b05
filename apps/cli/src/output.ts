import chalk from 'chalk';

export type Output = Readonly<{
  line(msg: string): void;
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
}>;

type Writer = Readonly<{ write(chunk: string): unknown }>;

export type OutputOptions = Readonly<{
  verbose?: boolean;
  color?: boolean;
  stdout?: Writer;
  stderr?: Writer;
}>;

export function createOutput(options: OutputOptions = {}): Output {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const paint = new chalk.Instance({
    level: options.color === false ? 0 : chalk.level,
  });
  const verbose =
    options.verbose ?? process.env.SHELLSYNC_DEBUG === '1';

  return {
    line: (msg) => stdout.write(`${msg}\n`),
    info: (msg) => stderr.write(`${paint.blue(msg)}\n`),
    success: (msg) => stdout.write(`${paint.green(msg)}\n`),
    warn: (msg) => stderr.write(`${paint.yellow(`warning: ${msg}`)}\n`),
    error: (msg) => stderr.write(`${paint.red(`error: ${msg}`)}\n`),
    debug: (msg) => {
      if (verbose) stderr.write(`${paint.gray(`[debug] ${msg}`)}\n`);
    },
  };
}
