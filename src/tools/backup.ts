/**
 * Atomic writes and pre-overwrite backups for the mutating file tools.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { compactTimestamp, randomId } from '../utils.js';

/** Write via temp file + rename, keeping the original file's mode bits. */
export async function atomicWrite(absPath: string, data: string | Buffer): Promise<void> {
  const dir = path.dirname(absPath);
  const origStat = await fs.stat(absPath).catch(() => null);

  const tmp = path.join(dir, `.${path.basename(absPath)}.parley.tmp.${process.pid}.${randomId(4)}`);
  await fs.writeFile(tmp, data);
  try {
    if (origStat) await fs.chmod(tmp, origStat.mode & 0o7777);
    await fs.rename(tmp, absPath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

export function backupPathFor(absPath: string, at = new Date()): string {
  return `${absPath}.backup_${compactTimestamp(at)}`;
}

/**
 * Copy an existing file to `<file>.backup_<YYYYMMDD_HHMMSS>`.
 * Returns the backup path, or undefined when there was nothing to back up.
 * A second backup within the same second gets a `_N` suffix.
 */
export async function backupFile(absPath: string): Promise<string | undefined> {
  const st = await fs.stat(absPath).catch(() => null);
  if (!st?.isFile()) return undefined;

  const base = backupPathFor(absPath);
  let target = base;
  for (let n = 1; await exists(target); n++) target = `${base}_${n}`;
  await fs.copyFile(absPath, target);
  return target;
}

async function exists(p: string): Promise<boolean> {
  return fs.access(p).then(
    () => true,
    () => false
  );
}
