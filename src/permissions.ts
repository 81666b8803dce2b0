/**
 * Permission guard: directory allow/deny list for agent file tools.
 *
 * - Paths are canonicalized (absolute, symlinks resolved) before matching.
 * - The deepest matching root wins; a forbidden root wins at equal depth.
 * - No allowed ancestor means denied.
 * - Forbidden roots may use `*` for a single path segment (`/home/*\/.ssh`).
 *
 * The two sets live in one frozen snapshot. allow()/forbid() build a new
 * snapshot and swap the reference, so a query running alongside a mutation
 * sees either the old sets or the new ones.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { PermissionStatus } from './types.js';

type RootEntry = Readonly<{
  path: string;
  segments: readonly string[];
}>;

type PermissionSets = Readonly<{
  allowed: readonly RootEntry[];
  forbidden: readonly RootEntry[];
}>;

export type PathVerdict = {
  allowed: boolean;
  /** Canonical absolute path the verdict applies to. Tools must do I/O on this path. */
  path: string;
  reason?: string;
};

function splitSegments(p: string): string[] {
  return p.split(/[\\/]+/).filter(Boolean);
}

function makeEntry(p: string): RootEntry {
  return Object.freeze({
    path: p,
    segments: Object.freeze(splitSegments(p)),
  });
}

/** Depth of `root` if it contains `target`, else -1. */
function matchDepth(target: readonly string[], root: RootEntry): number {
  if (root.segments.length > target.length) return -1;
  for (let i = 0; i < root.segments.length; i++) {
    const seg = root.segments[i];
    if (seg !== '*' && seg !== target[i]) return -1;
  }
  return root.segments.length;
}

function deepest(
  target: readonly string[],
  roots: readonly RootEntry[]
): { depth: number; root?: RootEntry } {
  let best: { depth: number; root?: RootEntry } = { depth: -1 };
  for (const root of roots) {
    const d = matchDepth(target, root);
    if (d > best.depth) best = { depth: d, root };
  }
  return best;
}

/**
 * Resolve `p` against `base` and follow symlinks on the deepest existing
 * ancestor. Missing trailing segments are re-appended as-is, so the path of a
 * file about to be created still canonicalizes.
 */
export function canonicalizePath(p: string, base: string): string {
  const abs = path.resolve(base, p);
  const tail: string[] = [];
  let cur = abs;
  for (;;) {
    try {
      const real = fs.realpathSync.native(cur);
      return tail.length ? path.join(real, ...tail.reverse()) : real;
    } catch {
      const parent = path.dirname(cur);
      if (parent === cur) return abs;
      tail.push(path.basename(cur));
      cur = parent;
    }
  }
}

export class PermissionGuard {
  private sets: PermissionSets = Object.freeze({ allowed: [], forbidden: [] });

  constructor(
    readonly baseDir: string,
    init?: { allowed?: string[]; forbidden?: string[] }
  ) {
    for (const root of init?.forbidden ?? []) this.forbid(root);
    for (const root of init?.allowed ?? []) this.allow(root);
  }

  canonicalize(p: string): string {
    return canonicalizePath(p, this.baseDir);
  }

  /** Grant `root` and everything below it. Returns the canonical root. */
  allow(root: string): string {
    const entry = this.entryFor(root);
    const cur = this.sets;
    this.sets = Object.freeze({
      allowed: Object.freeze([...cur.allowed.filter((e) => e.path !== entry.path), entry]),
      forbidden: cur.forbidden.filter((e) => e.path !== entry.path),
    });
    return entry.path;
  }

  /** Deny `root` and everything below it, including inside an allowed root. */
  forbid(root: string): string {
    const entry = this.entryFor(root);
    const cur = this.sets;
    this.sets = Object.freeze({
      allowed: cur.allowed.filter((e) => e.path !== entry.path),
      forbidden: Object.freeze([...cur.forbidden.filter((e) => e.path !== entry.path), entry]),
    });
    return entry.path;
  }

  check(p: string): PathVerdict {
    const sets = this.sets;
    const canonical = this.canonicalize(p);
    const target = splitSegments(canonical);

    const allow = deepest(target, sets.allowed);
    const deny = deepest(target, sets.forbidden);

    if (deny.root && deny.depth >= allow.depth) {
      return {
        allowed: false,
        path: canonical,
        reason: `"${canonical}" is under forbidden root "${deny.root.path}"`,
      };
    }
    if (!allow.root) {
      return { allowed: false, path: canonical, reason: `no allowed root contains "${canonical}"` };
    }
    return { allowed: true, path: canonical };
  }

  isAllowed(p: string): boolean {
    return this.check(p).allowed;
  }

  status(enabled = true): PermissionStatus {
    const sets = this.sets;
    return {
      enabled,
      allowed: sets.allowed.map((e) => e.path),
      forbidden: sets.forbidden.map((e) => e.path),
    };
  }

  private entryFor(root: string): RootEntry {
    if (typeof root !== 'string' || !root.trim()) throw new Error('permission root must be a non-empty path');
    if (splitSegments(root).includes('*')) {
      return makeEntry(path.resolve(this.baseDir, root));
    }
    return makeEntry(this.canonicalize(root));
  }
}
