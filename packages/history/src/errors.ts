export class HistoryCodecError extends Error {
  constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'HistoryCodecError';
  }
}
