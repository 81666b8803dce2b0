/**
 * Pure text helpers used by tool implementations.
 */

/** NUL byte in the first 512 bytes means binary. */
export function looksBinary(buf: Buffer): boolean {
  const n = Math.min(buf.length, 512);
  for (let i = 0; i < n; i++) {
    if (buf[i] === 0) return true;
  }
  return false;
}

/**
 * Cut a buffer to at most `maxBytes` without splitting a UTF-8 sequence.
 */
export function truncateBytes(buf: Buffer, maxBytes: number): { text: string; shown: number; truncated: boolean } {
  if (buf.length <= maxBytes) return { text: buf.toString('utf8'), shown: buf.length, truncated: false };
  let end = maxBytes;
  // back off continuation bytes (10xxxxxx)
  while (end > 0 && (buf[end] & 0xc0) === 0x80) end--;
  return { text: buf.subarray(0, end).toString('utf8'), shown: end, truncated: true };
}

export function countLines(text: string): number {
  if (!text) return 0;
  const n = text.split('\n').length;
  return text.endsWith('\n') ? n - 1 : n;
}

/** 1-based line number of each occurrence of `needle` in `text`, overlapping ones included. */
export function occurrenceLines(text: string, needle: string): number[] {
  const out: number[] = [];
  if (!needle) return out;
  let from = 0;
  for (;;) {
    const idx = text.indexOf(needle, from);
    if (idx < 0) break;
    out.push(text.slice(0, idx).split('\n').length);
    from = idx + 1;
  }
  return out;
}

/** Strict UTF-8 decode; undefined when the bytes are not valid UTF-8. */
export function decodeUtf8(buf: Buffer): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buf);
  } catch {
    return undefined;
  }
}

/** Clip a line for display in search results. */
export function snippet(line: string, max = 200): string {
  const t = line.trim();
  return t.length > max ? t.slice(0, max) + '…' : t;
}
