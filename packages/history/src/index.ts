export type { HistoryRecord, NewHistoryRecord } from './types';
export {
  createHistoryRecord,
  compareHistoryRecords,
  isHistoryId,
  UNKNOWN_DURATION,
  UNKNOWN_EXIT_CODE,
} from './record';
export {
  decodeHistoryPayload,
  encodeHistoryPayload,
  toHistoryPayload,
  HISTORY_PAYLOAD_VERSION,
} from './codec';
export { HistoryCodecError } from './errors';
