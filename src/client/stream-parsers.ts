/**
 * Incremental framing for streamed response bodies.
 *
 * Both readers pull from a body reader one chunk at a time and stop as soon
 * as the signal aborts; the reader is cancelled and nothing more is yielded.
 */

export type ByteReader = {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
};

async function* decodeChunks(reader: ByteReader, signal?: AbortSignal): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  for (;;) {
    if (signal?.aborted) {
      await reader.cancel(signal.reason);
      return;
    }
    const { done, value } = await reader.read();
    if (signal?.aborted) {
      await reader.cancel(signal.reason);
      return;
    }
    if (done) break;
    if (value) yield decoder.decode(value, { stream: true });
  }
  const tail = decoder.decode();
  if (tail) yield tail;
}

/** Complete lines, `\r\n` or `\n` terminated; a final unterminated line is flushed. */
export async function* readLines(reader: ByteReader, signal?: AbortSignal): AsyncGenerator<string> {
  let buf = '';
  for await (const text of decodeChunks(reader, signal)) {
    buf += text;
    for (;;) {
      const idx = buf.indexOf('\n');
      if (idx === -1) break;
      const line = buf.slice(0, idx).replace(/\r$/, '');
      buf = buf.slice(idx + 1);
      yield line;
    }
  }
  if (signal?.aborted) return;
  if (buf) yield buf.replace(/\r$/, '');
}

/**
 * Server-sent events: yields the `data:` payload of each event. Multi-line
 * data is joined with `\n`. `event:`/`id:`/`retry:` fields and `:` comments
 * are ignored. `[DONE]` ends the stream. Bare JSON lines are accepted as data.
 */
export async function* readSseData(reader: ByteReader, signal?: AbortSignal): AsyncGenerator<string> {
  let data: string[] = [];
  for await (const raw of readLines(reader, signal)) {
    const line = raw.trim();
    if (!line) {
      if (data.length) yield data.join('\n');
      data = [];
      continue;
    }
    if (line.startsWith('data:')) {
      const payload = line.slice(5).trimStart();
      if (payload === '[DONE]') {
        await reader.cancel();
        return;
      }
      data.push(payload);
    } else if (line.startsWith('{')) {
      data.push(line);
    }
  }
  if (signal?.aborted) return;
  if (data.length) yield data.join('\n');
}
