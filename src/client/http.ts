import { Agent, fetch as undiciFetch } from 'undici';

import { ClientError, asError, isAbortError, makeClientError } from './error-utils.js';
import type { ByteReader } from './stream-parsers.js';

// Keep-alive pool shared by every provider request.
const pooledAgent = new Agent({
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 120_000,
  connections: 16,
  pipelining: 1,
  connect: {
    rejectUnauthorized: true,
  },
});

/** The slice of a fetch Response the adapters read. */
export type StreamingResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  body: { getReader(): ByteReader } | null;
  text(): Promise<string>;
};

/** A response still chained to the caller's abort signal until released. */
export type PostedResponse = StreamingResponse & {
  /** Detach from the caller's signal. Safe to call more than once. */
  release(): void;
};

export type FetchInit = {
  method: 'POST' | 'GET';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
};

export type FetchLike = (url: string, init: FetchInit) => Promise<StreamingResponse>;

export const defaultFetch: FetchLike = (url, init) =>
  undiciFetch(url, { ...init, dispatcher: pooledAgent });

export const DEFAULT_CONNECTION_TIMEOUT_MS = 30_000;

export type PostOptions = {
  fetchImpl: FetchLike;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** Time allowed until response headers arrive. */
  connTimeoutMs: number;
  /** Request label used in error messages, e.g. `POST /api/chat`. */
  label: string;
};

/**
 * POST JSON and return the response once headers arrive.
 * - Headers not received within connTimeoutMs: retryable ClientError.
 * - Non-2xx: ClientError carrying the status and a clipped body.
 * The caller's signal stays chained to the request until `release()`, which
 * the reader of the body calls once it is done with it.
 */
export async function postStream(opts: PostOptions): Promise<PostedResponse> {
  const ac = new AbortController();
  const callerSignal = opts.signal;
  const forwardAbort = () => ac.abort(callerSignal?.reason);
  const release = () => callerSignal?.removeEventListener('abort', forwardAbort);
  if (callerSignal?.aborted) ac.abort(callerSignal.reason);
  else callerSignal?.addEventListener('abort', forwardAbort, { once: true });

  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    ac.abort();
  }, opts.connTimeoutMs);

  let res: StreamingResponse;
  try {
    res = await opts.fetchImpl(opts.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...opts.headers },
      body: JSON.stringify(opts.body),
      signal: ac.signal,
    });
  } catch (e: unknown) {
    release();
    // Distinguish connection timeout from caller abort.
    if (timedOut && !callerSignal?.aborted) {
      throw makeClientError(`Connection timeout (${opts.connTimeoutMs}ms) to ${opts.url}`, undefined, true);
    }
    if (isAbortError(e) || callerSignal?.aborted) throw asError(e, 'aborted');
    const err = asError(e, `connection failure to ${opts.url}`);
    throw new ClientError(`${opts.label} failed: ${err.message}`, undefined, true, { cause: err });
  } finally {
    clearTimeout(timer);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    release();
    throw makeClientError(
      `${opts.label} failed: ${res.status} ${res.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
      res.status,
      res.status === 429 || res.status >= 500
    );
  }
  return {
    ok: res.ok,
    status: res.status,
    statusText: res.statusText,
    body: res.body,
    text: () => res.text(),
    release,
  };
}
