import { HttpJsonClient, type HttpJsonClientOptions } from './httpClient';
import {
  addHistoryResponseSchema,
  countResponseSchema,
  syncHistoryResponseSchema,
  type AddHistoryRequestV1,
  type AddHistoryResponseV1,
  type CountResponseV1,
  type SyncHistoryRequestV1,
  type SyncHistoryResponseV1,
} from './protocol';
import type { SyncTransportPort, TransportCallOptions } from './types';

export type HttpSyncTransportOptions = HttpJsonClientOptions &
  Readonly<{ sessionToken: string }>;

export class HttpSyncTransport implements SyncTransportPort {
  private readonly client: HttpJsonClient;
  private readonly sessionToken: string;

  constructor(options: HttpSyncTransportOptions) {
    this.client = new HttpJsonClient(options);
    this.sessionToken = options.sessionToken;
  }

  async count(options: TransportCallOptions = {}): Promise<CountResponseV1> {
    return this.client.request(
      {
        method: 'GET',
        path: '/sync/count',
        sessionToken: this.sessionToken,
        signal: options.signal,
      },
      countResponseSchema
    );
  }

  async addHistory(
    requests: ReadonlyArray<AddHistoryRequestV1>,
    options: TransportCallOptions = {}
  ): Promise<AddHistoryResponseV1> {
    return this.client.request(
      {
        method: 'POST',
        path: '/history',
        body: requests,
        sessionToken: this.sessionToken,
        signal: options.signal,
      },
      addHistoryResponseSchema
    );
  }

  async syncHistory(
    request: SyncHistoryRequestV1,
    options: TransportCallOptions = {}
  ): Promise<SyncHistoryResponseV1> {
    return this.client.request(
      {
        method: 'GET',
        path: '/sync/history',
        query: {
          sync_ts: request.sync_ts,
          history_ts: request.history_ts,
          history_id: request.history_id,
          host: request.host,
        },
        sessionToken: this.sessionToken,
        signal: options.signal,
      },
      syncHistoryResponseSchema
    );
  }
}
