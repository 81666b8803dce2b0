/**
 * Shared utility functions.
 */

import { randomBytes, randomUUID } from 'node:crypto';
import { readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/** Package version read once at startup. Falls back to '0.0.0'. */
export const PKG_VERSION: string = (() => {
  try {
    const parsed: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf8')
    );
    if (isRecord(parsed) && typeof parsed.version === 'string') return parsed.version;
  } catch {
    // not installed as a package (e.g. bundled)
  }
  return '0.0.0';
})();

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Escape special regex metacharacters in a string so it can be used as a
 * literal match inside a `new RegExp(...)` expression.
 */
export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * XDG-compatible state directory for persistent app data.
 * `~/.local/state/parley`
 */
export function stateDir(): string {
  if (process.env.XDG_STATE_HOME) return path.join(process.env.XDG_STATE_HOME, 'parley');
  const base =
    process.platform === 'win32'
      ? process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local')
      : path.join(os.homedir(), '.local', 'state');
  return path.join(base, 'parley');
}

/**
 * XDG-compatible config directory.
 * `~/.config/parley`, overridable with PARLEY_CONFIG_DIR.
 */
export function configDir(): string {
  if (process.env.PARLEY_CONFIG_DIR) return process.env.PARLEY_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'parley');
  const base =
    process.platform === 'win32'
      ? process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming')
      : path.join(os.homedir(), '.config');
  return path.join(base, 'parley');
}

/**
 * Generate a short random hex ID.
 * @param bytes - Number of random bytes (default 6 = 12 hex chars)
 */
export function randomId(bytes = 6): string {
  return randomBytes(bytes).toString('hex');
}

export function newSessionId(): string {
  return randomUUID();
}

export function nowIso(): string {
  return new Date().toISOString();
}

/** `YYYYMMDD_HHMMSS` in UTC, used for backup file suffixes. */
export function compactTimestamp(d = new Date()): string {
  const p = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getUTCFullYear()}${p(d.getUTCMonth() + 1)}${p(d.getUTCDate())}_` +
    `${p(d.getUTCHours())}${p(d.getUTCMinutes())}${p(d.getUTCSeconds())}`
  );
}

/** Pluralize a count: `plural(1, 'match', 'matches')` → "1 match". */
export function plural(n: number, one: string, many = `${one}s`): string {
  return `${n} ${n === 1 ? one : many}`;
}
