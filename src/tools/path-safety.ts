/**
 * Path helpers for tool operations.
 * Every path a tool touches goes through guardPath() first; handlers do their
 * I/O on the canonical path it returns.
 */

import path from 'node:path';

import type { ToolContext } from '../tools.js';

import { ToolError } from './tool-error.js';

/**
 * Check if a resolved target path resides within a directory.
 * When dir is `/`, every absolute path is inside it.
 */
export function isWithinDir(target: string, dir: string): boolean {
  if (dir === path.parse(dir).root) return path.isAbsolute(target);
  const rel = path.relative(dir, target);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/** Paths within cwd are shown relative, everything else absolute. */
export function displayPath(absPath: string, cwd: string): string {
  const absCwd = path.resolve(cwd);
  if (isWithinDir(absPath, absCwd)) return path.relative(absCwd, absPath) || '.';
  return absPath;
}

/**
 * Canonicalize a tool argument path and check it against the permission guard.
 * Throws ToolError('permission') when the guard denies it.
 */
export function guardPath(ctx: ToolContext, p: unknown, tool: string): string {
  if (typeof p !== 'string' || !p.trim()) {
    throw new ToolError('invalid_args', `${tool}: missing path`);
  }
  const verdict = ctx.guard.check(p);
  if (!verdict.allowed) {
    throw new ToolError(
      'permission',
      `${tool}: permission denied for ${displayPath(verdict.path, ctx.cwd)}`,
      false,
      'ask the operator to allow this directory',
      verdict.reason ? { reason: verdict.reason } : undefined
    );
  }
  return verdict.path;
}
