import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { ToolContext } from '../tools.js';
import { plural } from '../utils.js';

import { displayPath, guardPath } from './path-safety.js';
import { SKIP_DIRS, compilePattern, globishMatch } from './search-utils.js';
import { looksBinary, snippet } from './text-utils.js';
import { ToolError } from './tool-error.js';

const LIST_MAX_ENTRIES = 200;
const LIST_MAX_DEPTH = 3;
const SEARCH_MAX_DEPTH = 10;
const SEARCH_HARD_CAP = 500;
/** Larger files are skipped by search_files. */
const SEARCH_MAX_FILE_BYTES = 2 * 1024 * 1024;

async function readDirSorted(dir: string, tool: string, shown: string): Promise<Dirent[]> {
  const ents = await fs.readdir(dir, { withFileTypes: true }).catch((e: unknown) => {
    const te = ToolError.fromError(e);
    throw new ToolError(te.code, `${tool}: cannot read ${shown}: ${te.message}`, te.retryable);
  });
  return ents.sort((a, b) => a.name.localeCompare(b.name));
}

async function requireDirectory(tool: string, abs: string, shown: string) {
  const st = await fs.stat(abs).catch(() => null);
  if (!st) throw new ToolError('not_found', `${tool}: ${shown} not found`);
  return st;
}

export async function listDirectoryTool(ctx: ToolContext, args: Record<string, unknown>): Promise<string> {
  const abs = guardPath(ctx, args.path ?? '.', 'list_directory');
  const shown = displayPath(abs, ctx.cwd);
  const recursive = args.recursive === true;
  const showHidden = args.show_hidden === true;

  const st = await requireDirectory('list_directory', abs, shown);
  if (!st.isDirectory()) {
    throw new ToolError('invalid_args', `list_directory: ${shown} is not a directory`, false, 'use file_info or read_file');
  }

  const lines: string[] = [];
  let truncated = false;

  async function walk(dir: string, depth: number) {
    for (const ent of await readDirSorted(dir, 'list_directory', displayPath(dir, ctx.cwd))) {
      if (lines.length >= LIST_MAX_ENTRIES) {
        truncated = true;
        return;
      }
      if (!showHidden && ent.name.startsWith('.')) continue;
      const full = path.join(dir, ent.name);
      if (!ctx.guard.isAllowed(full)) continue;

      const lst = await fs.lstat(full).catch(() => null);
      const kind = ent.isDirectory() ? 'dir' : ent.isSymbolicLink() ? 'link' : ent.isFile() ? 'file' : 'other';
      lines.push(`${kind}\t${lst?.size ?? 0}\t${displayPath(full, ctx.cwd)}`);

      if (recursive && ent.isDirectory() && depth < LIST_MAX_DEPTH && !SKIP_DIRS.has(ent.name)) {
        await walk(full, depth + 1);
      }
    }
  }

  await walk(abs, 1);
  if (!lines.length) return `[empty directory: ${shown}]`;
  if (truncated) lines.push(`[truncated after ${LIST_MAX_ENTRIES} entries]`);
  return lines.join('\n');
}

function clampResults(raw: unknown, fallback: number): number {
  const n = typeof raw === 'number' && Number.isFinite(raw) ? Math.floor(raw) : fallback;
  return Math.max(1, Math.min(SEARCH_HARD_CAP, n));
}

export async function searchFilesTool(ctx: ToolContext, args: Record<string, unknown>): Promise<string> {
  const pattern = typeof args.pattern === 'string' ? args.pattern : '';
  if (!pattern) throw new ToolError('invalid_args', 'search_files: missing pattern');

  // Models often name the root `directory` or `path`.
  const rootArg = args.root ?? args.directory ?? args.path ?? '.';
  const root = guardPath(ctx, rootArg, 'search_files');
  const shownRoot = displayPath(root, ctx.cwd);
  const filePattern = typeof args.file_pattern === 'string' && args.file_pattern ? args.file_pattern : undefined;
  const maxResults = clampResults(args.max_results, ctx.maxSearchResults);
  const { re, literal } = compilePattern(pattern, args.case_sensitive === true);

  const results: string[] = [];
  let total = 0;
  let filesMatched = 0;

  async function searchFile(abs: string) {
    if (filePattern && !globishMatch(path.basename(abs), filePattern)) return;
    if (!ctx.guard.isAllowed(abs)) return;
    const st = await fs.stat(abs).catch(() => null);
    if (!st?.isFile() || st.size > SEARCH_MAX_FILE_BYTES) return;
    const buf = await fs.readFile(abs).catch(() => null);
    if (!buf || looksBinary(buf)) return;

    const lines = buf.toString('utf8').split(/\r?\n/);
    let hit = false;
    for (let i = 0; i < lines.length; i++) {
      if (!re.test(lines[i])) continue;
      hit = true;
      total++;
      if (results.length < maxResults) {
        results.push(`${displayPath(abs, ctx.cwd)}:${i + 1}:${snippet(lines[i])}`);
      }
    }
    if (hit) filesMatched++;
  }

  async function walk(dir: string, depth: number) {
    for (const ent of await readDirSorted(dir, 'search_files', displayPath(dir, ctx.cwd))) {
      const full = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        if (SKIP_DIRS.has(ent.name) || depth >= SEARCH_MAX_DEPTH) continue;
        if (!ctx.guard.isAllowed(full)) continue;
        await walk(full, depth + 1);
      } else if (ent.isFile() || ent.isSymbolicLink()) {
        await searchFile(full);
      }
    }
  }

  const st = await requireDirectory('search_files', root, shownRoot);
  if (st.isDirectory()) await walk(root, 1);
  else await searchFile(root);

  const note = literal ? ' (invalid regex, matched literally)' : '';
  if (total === 0) return `no matches for ${JSON.stringify(pattern)} in ${shownRoot}${note}`;

  const out = [`${plural(total, 'match', 'matches')} in ${plural(filesMatched, 'file')}${note}`, ...results];
  if (total > results.length) out.push(`[truncated after ${results.length} results]`);
  return out.join('\n');
}
