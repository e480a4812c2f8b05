import type { z } from 'zod';
import { ProtocolError, TransportError, TransportErrorKinds } from './errors';
import { errorResponseSchema } from './protocol';

export const DEFAULT_TIMEOUT_MS = 30_000;

export type HttpJsonClientOptions = Readonly<{
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}>;

export type HttpJsonRequest = Readonly<{
  method: 'GET' | 'POST';
  path: string;
  query?: Readonly<Record<string, string | undefined>>;
  body?: unknown;
  sessionToken?: string;
  signal?: AbortSignal;
}>;

const normalizeBaseUrl = (baseUrl: string): string =>
  baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

const parseBody = (text: string): unknown => {
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const extractReason = (payload: unknown): string | null => {
  const parsed = errorResponseSchema.safeParse(payload);
  if (parsed.success) return parsed.data.reason;
  if (typeof payload === 'string' && payload.length > 0) return payload;
  return null;
};

/**
 * JSON-over-HTTP with a bounded timeout per request. Every failure surfaces as
 * a `TransportError` (no response, or a non-2xx one) or a `ProtocolError`
 * (a 2xx body that does not match the expected schema). No retries.
 */
export class HttpJsonClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpJsonClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async request<T>(request: HttpJsonRequest, schema: z.ZodType<T>): Promise<T> {
    const operation = `${request.method} ${request.path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new TransportError(
          TransportErrorKinds.timeout,
          `${operation} timed out after ${this.timeoutMs}ms`
        )
      );
    }, this.timeoutMs);
    const callerSignal = request.signal;
    const forwardAbort = () => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) {
      forwardAbort();
    } else {
      callerSignal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const headers: Record<string, string> = { accept: 'application/json' };
      if (request.body !== undefined) {
        headers['content-type'] = 'application/json';
      }
      if (request.sessionToken) {
        headers.authorization = `Token ${request.sessionToken}`;
      }

      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(this.buildUrl(request), {
          method: request.method,
          headers,
          body:
            request.body === undefined ? undefined : JSON.stringify(request.body),
          signal: controller.signal,
        });
        text = await response.text();
      } catch (error) {
        throw this.toTransportError(operation, controller.signal, error);
      }

      const payload = parseBody(text);
      if (!response.ok) {
        const reason = extractReason(payload) ?? response.statusText;
        throw new TransportError(
          TransportErrorKinds.status,
          `${operation} failed with status ${response.status}: ${reason}`,
          { status: response.status, reason }
        );
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        throw new ProtocolError(
          `Invalid response from ${operation}`,
          {
            issues: parsed.error.issues.map(
              (issue) => `${issue.path.join('.')}: ${issue.message}`
            ),
          },
          parsed.error
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', forwardAbort);
    }
  }

  private buildUrl(request: HttpJsonRequest): string {
    const url = `${this.baseUrl}${request.path}`;
    if (!request.query) return url;
    const query = new URLSearchParams();
    for (const [name, value] of Object.entries(request.query)) {
      if (value !== undefined) query.set(name, value);
    }
    const encoded = query.toString();
    return encoded ? `${url}?${encoded}` : url;
  }

  private toTransportError(
    operation: string,
    signal: AbortSignal,
    error: unknown
  ): unknown {
    if (signal.aborted) {
      const reason: unknown = signal.reason;
      // Caller aborts propagate untouched so the engine can tell them apart.
      return reason instanceof TransportError ? reason : reason ?? error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(
      TransportErrorKinds.network,
      `${operation} could not reach the server: ${message}`,
      {},
      error
    );
  }
}
