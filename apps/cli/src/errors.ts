/** A failure the user can act on; printed without a stack trace. */
export class CliError extends Error {
  constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CliError';
  }
}
