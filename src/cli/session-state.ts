/**
 * Session file locations and listing.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

export type SavedSession = { name: string; path: string; mtimeMs: number };

/** Plain names live in the sessions dir; anything path-like is taken as a path. */
export function resolveSessionPath(arg: string, sessionsDir: string, cwd = process.cwd()): string {
  const name = arg.trim();
  if (!name) throw new Error('session name must not be empty');
  if (name.includes('/') || name.includes(path.sep) || name.endsWith('.json') || name.startsWith('.')) {
    return path.resolve(cwd, name);
  }
  return path.join(sessionsDir, `${name}.json`);
}

export function autoSavePath(sessionsDir: string, sessionId: string): string {
  return path.join(sessionsDir, `session_${sessionId}.json`);
}

/** Saved sessions, newest first. A missing directory means none. */
export async function listSavedSessions(sessionsDir: string): Promise<SavedSession[]> {
  let names: string[];
  try {
    names = await fs.readdir(sessionsDir);
  } catch (e: unknown) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return [];
    throw e;
  }
  const out: SavedSession[] = [];
  for (const name of names) {
    if (!name.endsWith('.json')) continue;
    const p = path.join(sessionsDir, name);
    const st = await fs.stat(p);
    if (!st.isFile()) continue;
    out.push({ name: name.replace(/\.json$/, ''), path: p, mtimeMs: st.mtimeMs });
  }
  return out.sort((a, b) => b.mtimeMs - a.mtimeMs || a.name.localeCompare(b.name));
}
