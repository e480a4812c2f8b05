import { z } from 'zod';
import { HistoryCodecError } from './errors';
import type { HistoryRecord } from './types';

export const HISTORY_PAYLOAD_VERSION = 1;

// Short keys keep the per-record ciphertext small; the payload is the whole
// record so a decrypted blob can be checked against its cleartext metadata.
const payloadV1 = z.object({
  v: z.literal(HISTORY_PAYLOAD_VERSION),
  i: z.string().min(1),
  t: z.number().int().nonnegative(),
  h: z.string(),
  c: z.string(),
  d: z.string(),
  e: z.number().int(),
  u: z.number().int(),
  s: z.string(),
});

type HistoryPayloadV1 = z.infer<typeof payloadV1>;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export const toHistoryPayload = (record: HistoryRecord): HistoryPayloadV1 => ({
  v: HISTORY_PAYLOAD_VERSION,
  i: record.id,
  t: record.timestamp,
  h: record.hostname,
  c: record.command,
  d: record.cwd,
  e: record.exitCode,
  u: record.duration,
  s: record.session,
});

export const encodeHistoryPayload = (record: HistoryRecord): Uint8Array => {
  const checked = payloadV1.safeParse(toHistoryPayload(record));
  if (!checked.success) {
    throw new HistoryCodecError(
      `History record ${record.id} cannot be serialized: ${checked.error.issues
        .map((issue) => `${issue.path.join('.')} ${issue.message}`)
        .join('; ')}`
    );
  }
  return encoder.encode(JSON.stringify(checked.data));
};

export const decodeHistoryPayload = (bytes: Uint8Array): HistoryRecord => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(bytes));
  } catch (error) {
    throw new HistoryCodecError('History payload is not valid JSON', error);
  }
  const result = payloadV1.safeParse(parsed);
  if (!result.success) {
    throw new HistoryCodecError(
      'History payload does not match the v1 record shape',
      result.error
    );
  }
  const payload = result.data;
  return {
    id: payload.i,
    timestamp: payload.t,
    hostname: payload.h,
    command: payload.c,
    cwd: payload.d,
    exitCode: payload.e,
    duration: payload.u,
    session: payload.s,
  };
};
