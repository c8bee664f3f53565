/**
 * HTTP transport for the zone API
 *
 * Sends JSON requests with a static bearer token, unwraps the v4 response
 * envelope and turns every failure into a RemoteApiError with a kind the
 * reconciler can act on. Transient failures are retried here.
 */

import { z } from 'zod';
import { type RemoteErrorKind, RemoteApiError } from '../errors.js';
import { type RetryPolicy, type Sleep, withRetry } from './retry.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH';

export interface FetchRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchRequestInit) => Promise<FetchResponseLike>;

export interface RequestEvent {
  method: HttpMethod;
  path: string;
  attempt: number;
  /** Absent when the request never produced a response */
  status?: number;
  durationMs: number;
}

export interface TransportOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  retry: RetryPolicy;
  fetch?: FetchLike;
  sleep?: Sleep;
  onRequest?: (event: RequestEvent) => void;
}

export interface RequestOptions {
  body?: unknown;
  /** Set false for calls that must not be retried */
  retry?: boolean;
}

const apiMessageSchema = z
  .object({
    code: z.number().optional(),
    message: z.string(),
  })
  .passthrough();

const envelopeSchema = z
  .object({
    success: z.boolean(),
    errors: z.array(apiMessageSchema).default([]),
    result: z.unknown(),
  })
  .passthrough();

export function kindForStatus(status: number): RemoteErrorKind {
  if (status === 401 || status === 403) return 'Unauthorized';
  if (status === 404) return 'NotFound';
  if (status === 429 || status >= 500) return 'Transient';
  return 'RemoteRejected';
}

function parseJson(text: string): unknown {
  if (text.trim().length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class ApiTransport {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: TransportOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Performs the request and returns the envelope's `result`
   * @throws {RemoteApiError}
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const policy: RetryPolicy =
      options.retry === false ? { ...this.options.retry, attempts: 1 } : this.options.retry;
    return withRetry((attempt) => this.send(method, path, options.body, attempt), policy, {
      sleep: this.options.sleep,
    });
  }

  private async send(
    method: HttpMethod,
    path: string,
    body: unknown,
    attempt: number
  ): Promise<unknown> {
    const url = `${this.options.baseUrl}${path}`;
    const started = Date.now();
    const details = { method, path };

    let response: FetchResponseLike;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      this.options.onRequest?.({ method, path, attempt, durationMs: Date.now() - started });
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteApiError('Transient', `${method} ${path} failed: ${reason}`, details, {
        cause: error,
      });
    }

    this.options.onRequest?.({
      method,
      path,
      attempt,
      status: response.status,
      durationMs: Date.now() - started,
    });

    const envelope = envelopeSchema.safeParse(parseJson(text));
    const apiErrors = envelope.success
      ? envelope.data.errors.map((e) => (e.code ? `${e.code}: ${e.message}` : e.message))
      : [];

    if (!response.ok) {
      const summary = apiErrors.length > 0 ? apiErrors.join('; ') : `HTTP ${response.status}`;
      throw new RemoteApiError(
        kindForStatus(response.status),
        `${method} ${path} returned ${response.status}: ${summary}`,
        { ...details, status: response.status, apiErrors }
      );
    }

    if (!envelope.success) {
      throw new RemoteApiError('RemoteRejected', `${method} ${path} returned an unreadable body`, {
        ...details,
        status: response.status,
      });
    }

    if (!envelope.data.success) {
      throw new RemoteApiError(
        'RemoteRejected',
        `${method} ${path} was not successful: ${apiErrors.join('; ') || 'no error detail'}`,
        { ...details, status: response.status, apiErrors }
      );
    }

    return envelope.data.result;
  }
}
