const RE_CONN_REFUSED = /ECONNREFUSED|fetch failed/i;
const RE_CONN_TIMEOUT = /Connection timeout \(\d+ms\)/i;

/** Transport-level failure: connection, HTTP status, or a malformed stream. */
export class ClientError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly retryable: boolean = false,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ClientError';
  }
}

export function makeClientError(msg: string, status?: number, retryable?: boolean): ClientError {
  return new ClientError(msg, status, retryable ?? false);
}

function errorCode(e: unknown): string | undefined {
  if (!(e instanceof Error)) return undefined;
  if ('code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

export function isConnRefused(e: unknown): boolean {
  if (!(e instanceof Error)) return false;
  return errorCode(e.cause) === 'ECONNREFUSED' || RE_CONN_REFUSED.test(e.message);
}

export function isConnTimeout(e: unknown): boolean {
  return e instanceof ClientError && e.retryable && RE_CONN_TIMEOUT.test(e.message);
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || errorCode(e) === 'ABORT_ERR');
}

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}
