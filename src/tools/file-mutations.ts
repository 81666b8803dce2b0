import fs from 'node:fs/promises';
import path from 'node:path';

import type { ToolContext } from '../tools.js';

import { atomicWrite, backupFile } from './backup.js';
import { displayPath, guardPath } from './path-safety.js';
import { decodeUtf8, looksBinary, occurrenceLines } from './text-utils.js';
import { ToolError, ValidationError } from './tool-error.js';

export type UpdateOperation = 'replace' | 'append' | 'prepend' | 'insert_at_line';

export const UPDATE_OPERATIONS: readonly UpdateOperation[] = ['replace', 'append', 'prepend', 'insert_at_line'];

function isUpdateOperation(v: unknown): v is UpdateOperation {
  return typeof v === 'string' && UPDATE_OPERATIONS.some((op) => op === v);
}

async function backupNote(ctx: ToolContext, abs: string): Promise<string> {
  if (!ctx.autoBackup) return '';
  const backup = await backupFile(abs);
  return backup ? `\nbackup: ${displayPath(backup, ctx.cwd)}` : '';
}

export async function writeFileTool(ctx: ToolContext, args: Record<string, unknown>): Promise<string> {
  const abs = guardPath(ctx, args.path, 'write_file');
  const shown = displayPath(abs, ctx.cwd);
  const content = typeof args.content === 'string' ? args.content : '';
  const createDirs = args.create_dirs === true;
  const bytes = Buffer.byteLength(content, 'utf8');

  const parent = path.dirname(abs);
  const parentStat = await fs.stat(parent).catch(() => null);
  if (!parentStat && !createDirs) {
    throw new ToolError(
      'not_found',
      `write_file: parent directory ${displayPath(parent, ctx.cwd)} does not exist`,
      false,
      'pass create_dirs=true to create it'
    );
  }
  if (parentStat && !parentStat.isDirectory()) {
    throw new ToolError('conflict', `write_file: ${displayPath(parent, ctx.cwd)} is not a directory`);
  }

  const existing = await fs.stat(abs).catch(() => null);
  if (existing?.isDirectory()) {
    throw new ToolError('conflict', `write_file: ${shown} is a directory`);
  }

  if (ctx.dryRun) {
    return `dry-run: would ${existing ? 'overwrite' : 'create'} ${shown} (${bytes} bytes)`;
  }

  if (!parentStat) await fs.mkdir(parent, { recursive: true });
  const note = existing ? await backupNote(ctx, abs) : '';
  await atomicWrite(abs, content);
  return `wrote ${shown} (${bytes} bytes)${note}`;
}

function requireText(args: Record<string, unknown>, field: string, op: string): string {
  const v = args[field];
  if (typeof v !== 'string') {
    throw new ValidationError([{ field, message: `${field} is required for ${op}`, value: v }]);
  }
  return v;
}

function applyUpdate(
  original: string,
  op: UpdateOperation,
  args: Record<string, unknown>,
  shown: string
): string {
  switch (op) {
    case 'replace': {
      const search = requireText(args, 'search', op);
      if (!search) throw new ValidationError([{ field: 'search', message: 'search must not be empty' }]);
      const replacement = typeof args.replacement === 'string' ? args.replacement : '';
      const lines = occurrenceLines(original, search);
      if (lines.length === 0) {
        throw new ToolError(
          'not_found',
          `update_file: search text not found in ${shown}`,
          false,
          'read the file and copy the exact text to replace'
        );
      }
      if (lines.length > 1) {
        throw new ToolError(
          'conflict',
          `update_file: search text occurs ${lines.length} times in ${shown} (lines ${lines.join(', ')})`,
          false,
          'include more surrounding text so it matches exactly once',
          { occurrences: lines.length, lines }
        );
      }
      const idx = original.indexOf(search);
      return original.slice(0, idx) + replacement + original.slice(idx + search.length);
    }
    case 'append': {
      const text = requireText(args, 'replacement', op);
      if (!original) return text;
      return original.endsWith('\n') ? original + text : `${original}\n${text}`;
    }
    case 'prepend': {
      const text = requireText(args, 'replacement', op);
      if (!original) return text;
      return text.endsWith('\n') ? text + original : `${text}\n${original}`;
    }
    case 'insert_at_line': {
      const text = requireText(args, 'replacement', op);
      const lineNumber = args.line_number;
      if (typeof lineNumber !== 'number' || !Number.isInteger(lineNumber)) {
        throw new ValidationError([
          { field: 'line_number', message: 'line_number is required for insert_at_line', value: lineNumber },
        ]);
      }
      const trailingNewline = original.endsWith('\n');
      const lines = original ? (trailingNewline ? original.slice(0, -1) : original).split('\n') : [];
      if (lineNumber < 1 || lineNumber > lines.length + 1) {
        throw new ValidationError([
          {
            field: 'line_number',
            message: `line_number ${lineNumber} is out of range (1-${lines.length + 1})`,
            value: lineNumber,
          },
        ]);
      }
      lines.splice(lineNumber - 1, 0, text);
      return lines.join('\n') + (trailingNewline ? '\n' : '');
    }
  }
}

export async function updateFileTool(ctx: ToolContext, args: Record<string, unknown>): Promise<string> {
  const abs = guardPath(ctx, args.path, 'update_file');
  const shown = displayPath(abs, ctx.cwd);
  const op = args.operation;
  if (!isUpdateOperation(op)) {
    throw new ValidationError([
      { field: 'operation', message: `operation must be one of ${UPDATE_OPERATIONS.join(', ')}`, value: op },
    ]);
  }

  const st = await fs.stat(abs).catch(() => null);
  if (!st) throw new ToolError('not_found', `update_file: ${shown} not found`, false, 'use write_file to create it');
  if (!st.isFile()) throw new ToolError('conflict', `update_file: ${shown} is not a regular file`);

  const raw = await fs.readFile(abs);
  const original = looksBinary(raw) ? undefined : decodeUtf8(raw);
  if (original === undefined) {
    throw new ToolError(
      'invalid_args',
      `update_file: ${shown} is not a UTF-8 text file`,
      false,
      'use write_file to replace it as a whole'
    );
  }
  const next = applyUpdate(original, op, args, shown);
  const before = Buffer.byteLength(original, 'utf8');
  const after = Buffer.byteLength(next, 'utf8');

  if (ctx.dryRun) {
    return `dry-run: would update ${shown} (${op}): ${before} -> ${after} bytes`;
  }

  const note = await backupNote(ctx, abs);
  await atomicWrite(abs, next);
  return `updated ${shown} (${op}): ${before} -> ${after} bytes${note}`;
}
