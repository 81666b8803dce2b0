import type { StreamChunk } from '../types.js';

import { asError, makeClientError } from './error-utils.js';
import type { PostedResponse } from './http.js';
import type { ByteReader } from './stream-parsers.js';

export type TurnStreamOptions = {
  open: () => Promise<PostedResponse>;
  frames: (reader: ByteReader, signal?: AbortSignal) => AsyncGenerator<string>;
  /** Decode one frame. Throwing ends the stream with an error chunk. A `done` chunk ends it normally. */
  decode: (frame: string) => StreamChunk[];
  /** finish_reason for the trailing `done` chunk when the body ends without one. */
  finishReason?: () => string | undefined;
  signal?: AbortSignal;
  log: (msg: string) => void;
};

/**
 * Drive one streamed provider response.
 *
 * Every failure (connect, HTTP status, malformed fragment, read error) is
 * delivered as a single final `error` chunk; the generator never throws.
 * When the signal aborts, it returns without yielding anything further.
 */
export async function* turnStream(opts: TurnStreamOptions): AsyncGenerator<StreamChunk> {
  const { signal } = opts;

  let res: PostedResponse;
  try {
    res = await opts.open();
  } catch (e: unknown) {
    if (signal?.aborted) return;
    yield { type: 'error', error: asError(e) };
    return;
  }

  try {
    yield* readBody(res, opts);
  } finally {
    res.release();
  }
}

async function* readBody(res: PostedResponse, opts: TurnStreamOptions): AsyncGenerator<StreamChunk> {
  const { signal } = opts;
  if (!res.body) {
    yield { type: 'error', error: makeClientError('No response body to read (stream)') };
    return;
  }

  const reader = res.body.getReader();
  try {
    for await (const frame of opts.frames(reader, signal)) {
      for (const chunk of opts.decode(frame)) {
        if (signal?.aborted) return;
        yield chunk;
        if (chunk.type === 'done') return;
      }
    }
  } catch (e: unknown) {
    if (signal?.aborted) return;
    yield { type: 'error', error: asError(e) };
    return;
  } finally {
    await reader.cancel().catch((e: unknown) => opts.log(`stream cancel failed: ${asError(e).message}`));
  }

  if (signal?.aborted) return;
  yield { type: 'done', finish_reason: opts.finishReason?.() };
}
