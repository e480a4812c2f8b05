const UUID_V4_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

/**
 * Client-assigned record id. Lowercase only: pages are ordered by the uuid
 * column, which has to agree with the string order clients compare with.
 */
export class HistoryBlobId {
  private constructor(private readonly value: string) {}

  static from(value: string): HistoryBlobId {
    if (!UUID_V4_REGEX.test(value)) {
      throw new Error(`HistoryBlobId must be a lowercase UUIDv4: ${value}`);
    }
    return new HistoryBlobId(value);
  }

  unwrap(): string {
    return this.value;
  }
}
