/**
 * Id of the authenticated user whose blobs a query touches.
 */
export class HistoryOwnerId {
  private constructor(private readonly value: string) {}

  static from(value: string): HistoryOwnerId {
    if (!value || value.trim().length === 0) {
      throw new Error('HistoryOwnerId cannot be empty');
    }
    return new HistoryOwnerId(value);
  }

  unwrap(): string {
    return this.value;
  }
}
