import fs from 'node:fs/promises';
import path from 'node:path';

import type { ToolContext } from '../tools.js';

import { displayPath, guardPath } from './path-safety.js';
import { countLines, looksBinary, truncateBytes } from './text-utils.js';
import { ToolError } from './tool-error.js';

/** Files above this size report no line_count in file_info. */
const LINE_COUNT_MAX_BYTES = 8 * 1024 * 1024;

async function statOrThrow(tool: string, abs: string, shown: string) {
  return fs.stat(abs).catch((e: unknown) => {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new ToolError('not_found', `${tool}: ${shown} not found`);
    }
    throw ToolError.fromError(e);
  });
}

async function readHead(abs: string, bytes: number): Promise<Buffer> {
  const fh = await fs.open(abs, 'r');
  try {
    const buf = Buffer.alloc(bytes);
    const { bytesRead } = await fh.read(buf, 0, bytes, 0);
    return buf.subarray(0, bytesRead);
  } finally {
    await fh.close();
  }
}

export async function readFileTool(ctx: ToolContext, args: Record<string, unknown>): Promise<string> {
  const abs = guardPath(ctx, args.path, 'read_file');
  const shown = displayPath(abs, ctx.cwd);

  const st = await statOrThrow('read_file', abs, shown);
  if (st.isDirectory()) {
    throw new ToolError(
      'invalid_args',
      `read_file: ${shown} is a directory`,
      false,
      'use list_directory to see its contents'
    );
  }

  // One extra byte lets truncateBytes back off a split UTF-8 sequence.
  const head = await readHead(abs, Math.min(st.size, ctx.maxReadBytes + 1));
  if (looksBinary(head)) {
    return `[binary file: ${shown}, ${st.size} bytes]`;
  }

  const { text, shown: shownBytes, truncated } = truncateBytes(head, ctx.maxReadBytes);
  const out = [`# ${shown} (${st.size} bytes)`, text];
  if (truncated || st.size > shownBytes) {
    out.push(`[truncated: showing ${shownBytes} of ${st.size} bytes]`);
  }
  return out.join('\n');
}

export async function fileInfoTool(ctx: ToolContext, args: Record<string, unknown>): Promise<string> {
  const abs = guardPath(ctx, args.path, 'file_info');
  const shown = displayPath(abs, ctx.cwd);
  const st = await statOrThrow('file_info', abs, shown);

  const type = st.isFile() ? 'file' : st.isDirectory() ? 'directory' : 'other';
  const readonly = await fs.access(abs, fs.constants.W_OK).then(
    () => false,
    () => true
  );

  const lines = [
    `path: ${shown}`,
    `type: ${type}`,
    `size: ${st.size}`,
    `readonly: ${readonly}`,
    `modified: ${st.mtime.toISOString()}`,
    `created: ${st.birthtime.toISOString()}`,
  ];

  if (type === 'file') {
    lines.push(`extension: ${path.extname(abs) || '(none)'}`);
    const isText = !looksBinary(await readHead(abs, 512));
    lines.push(`is_text: ${isText}`);
    if (isText && st.size <= LINE_COUNT_MAX_BYTES) {
      lines.push(`line_count: ${countLines(await fs.readFile(abs, 'utf8'))}`);
    }
  }
  return lines.join('\n');
}
