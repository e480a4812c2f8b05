import { z } from 'zod';

/**
 * Wire contract between the sync client and the relay server (v1). Field
 * names are the ones that travel in JSON; timestamps are ISO-8601 strings.
 */

/** Blobs per `sync_history` page. Fixed: a short page is how the client sees the end. */
export const HISTORY_PAGE_SIZE = 100;

/** Longest `data` string the server stores for one blob. */
export const MAX_BLOB_DATA_LENGTH = 64 * 1024;

/** Blobs accepted in one `add_history` request. */
export const MAX_UPLOAD_BATCH = 1000;

/** Largest `add_history` request body, in bytes. */
export const MAX_UPLOAD_BODY_BYTES = 4 * 1024 * 1024;

export const errorResponseSchema = z.object({
  reason: z.string(),
});

export const sessionResponseSchema = z.object({
  session: z.string().min(1),
});

export const logoutResponseSchema = z.object({
  revoked: z.boolean(),
});

export const userResponseSchema = z.object({
  username: z.string(),
});

export const countResponseSchema = z.object({
  count: z.number().int().nonnegative(),
  /** The server's clock at the time of the count, used as `sync_ts`. */
  server_time: z.string().min(1).optional(),
});

export const addHistoryResponseSchema = z.object({
  stored: z.number().int().nonnegative(),
});

export const syncHistoryBlobSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().min(1),
  data: z.string().min(1),
  hostname: z.string(),
});

export const syncHistoryResponseSchema = z.object({
  history: z.array(syncHistoryBlobSchema),
});

export type ErrorResponseV1 = z.infer<typeof errorResponseSchema>;
export type SessionResponseV1 = z.infer<typeof sessionResponseSchema>;
export type LogoutResponseV1 = z.infer<typeof logoutResponseSchema>;
export type UserResponseV1 = z.infer<typeof userResponseSchema>;
export type CountResponseV1 = z.infer<typeof countResponseSchema>;
export type AddHistoryResponseV1 = z.infer<typeof addHistoryResponseSchema>;
export type SyncHistoryBlobV1 = z.infer<typeof syncHistoryBlobSchema>;
export type SyncHistoryResponseV1 = z.infer<typeof syncHistoryResponseSchema>;

export type RegisterRequestV1 = Readonly<{
  email: string;
  username: string;
  password: string;
}>;

export type LoginRequestV1 = Readonly<{
  username: string;
  password: string;
}>;

export type AddHistoryRequestV1 = Readonly<{
  id: string;
  timestamp: string;
  data: string;
  hostname: string;
}>;

export type SyncHistoryRequestV1 = Readonly<{
  /** Server ingestion bound: only blobs recorded at or before this instant. */
  sync_ts: string;
  /** Download cursor: only blobs with a later timestamp. */
  history_ts: string;
  /** Tie-breaker for blobs sharing `history_ts`. */
  history_id?: string;
  /** Host to leave out of the results (the caller's own uploads). */
  host: string;
}>;
