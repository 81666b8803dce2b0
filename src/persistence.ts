/**
 * Session files: versioned JSON snapshots of a conversation.
 *
 * Loading validates the whole document before anything is returned, so a
 * caller either gets a complete snapshot or a PersistenceError naming the
 * first offending field.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import type { ConversationSession } from './session.js';
import { atomicWrite } from './tools/backup.js';
import type { AssistantMessage, ChatMessage, ProviderKind, SessionSnapshot, ToolCall, ToolResult } from './types.js';
import { isRecord } from './utils.js';

export const SESSION_FORMAT_VERSION = 1;

export class PersistenceError extends Error {
  constructor(
    message: string,
    /** Field path of the offending value, e.g. `messages[3].timestamp`. */
    readonly field?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export function serializeSession(snap: SessionSnapshot): string {
  return JSON.stringify({ version: SESSION_FORMAT_VERSION, ...snap }, null, 2) + '\n';
}

function fail(field: string, problem: string): never {
  throw new PersistenceError(`invalid session file: ${field} ${problem}`, field);
}

function reqString(obj: Record<string, unknown>, key: string, at: string, nonEmpty = false): string {
  const v = obj[key];
  if (typeof v !== 'string') fail(`${at}${key}`, v === undefined ? 'is missing' : 'must be a string');
  if (nonEmpty && !v) fail(`${at}${key}`, 'must not be empty');
  return v;
}

function reqTimestamp(obj: Record<string, unknown>, key: string, at: string): string {
  const v = reqString(obj, key, at);
  if (Number.isNaN(Date.parse(v))) fail(`${at}${key}`, 'is not a valid timestamp');
  return v;
}

function readProvider(v: unknown): ProviderKind {
  if (v === 'gemini' || v === 'ollama') return v;
  fail('provider', v === undefined ? 'is missing' : 'must be "gemini" or "ollama"');
}

function readToolCall(v: unknown, at: string): ToolCall {
  if (!isRecord(v)) fail(at, 'must be an object');
  const args = v.arguments;
  if (!isRecord(args)) fail(`${at}.arguments`, 'must be an object');
  const call: ToolCall = {
    id: reqString(v, 'id', `${at}.`, true),
    name: reqString(v, 'name', `${at}.`, true),
    arguments: args,
  };
  if (v.invalid_arguments !== undefined) call.invalid_arguments = reqString(v, 'invalid_arguments', `${at}.`);
  return call;
}

function readToolResult(v: unknown, at: string): ToolResult {
  if (!isRecord(v)) fail(at, 'must be an object');
  const call_id = reqString(v, 'call_id', `${at}.`, true);
  const name = reqString(v, 'name', `${at}.`, true);
  if (typeof v.success !== 'boolean') fail(`${at}.success`, 'must be a boolean');
  return v.success
    ? { call_id, name, success: true, output: reqString(v, 'output', `${at}.`) }
    : { call_id, name, success: false, error: reqString(v, 'error', `${at}.`) };
}

function readMessage(v: unknown, i: number): ChatMessage {
  const at = `messages[${i}]`;
  if (!isRecord(v)) fail(at, 'must be an object');
  const timestamp = reqTimestamp(v, 'timestamp', `${at}.`);

  const role = v.role;
  switch (role) {
    case 'system':
    case 'user':
      return { role, content: reqString(v, 'content', `${at}.`), timestamp };
    case 'assistant': {
      const msg: AssistantMessage = { role: 'assistant', content: reqString(v, 'content', `${at}.`), timestamp };
      if (v.tool_calls !== undefined) {
        if (!Array.isArray(v.tool_calls)) fail(`${at}.tool_calls`, 'must be an array');
        msg.tool_calls = v.tool_calls.map((c: unknown, j: number) => readToolCall(c, `${at}.tool_calls[${j}]`));
      }
      return msg;
    }
    case 'tool':
      return { role: 'tool', content: readToolResult(v.content, `${at}.content`), timestamp };
    default:
      fail(`${at}.role`, role === undefined ? 'is missing' : `has unknown value ${JSON.stringify(role)}`);
  }
}

/** Every assistant tool call must be answered, in order, by the messages right after it. */
function checkToolPairs(messages: ChatMessage[]): void {
  messages.forEach((m, i) => {
    if (m.role !== 'assistant' || !m.tool_calls?.length) return;
    m.tool_calls.forEach((call, j) => {
      const next = messages[i + 1 + j];
      if (!next || next.role !== 'tool' || next.content.call_id !== call.id) {
        fail(`messages[${i}].tool_calls[${j}]`, `has no tool result for call ${call.id}`);
      }
    });
  });
}

export function deserializeSession(text: string): SessionSnapshot {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e: unknown) {
    throw new PersistenceError(`invalid session file: not JSON (${e instanceof Error ? e.message : String(e)})`, undefined, {
      cause: e,
    });
  }
  if (!isRecord(doc)) fail('(root)', 'must be an object');

  if (doc.version === undefined) fail('version', 'is missing');
  if (doc.version !== SESSION_FORMAT_VERSION) {
    throw new PersistenceError(
      `unsupported session format version ${JSON.stringify(doc.version)} (expected ${SESSION_FORMAT_VERSION})`,
      'version'
    );
  }

  const rawMessages = doc.messages;
  if (!Array.isArray(rawMessages)) fail('messages', rawMessages === undefined ? 'is missing' : 'must be an array');

  const snap: SessionSnapshot = {
    id: reqString(doc, 'id', '', true),
    provider: readProvider(doc.provider),
    model: reqString(doc, 'model', '', true),
    created_at: reqTimestamp(doc, 'created_at', ''),
    updated_at: reqTimestamp(doc, 'updated_at', ''),
    messages: rawMessages.map((m: unknown, i: number) => readMessage(m, i)),
  };
  if (doc.system_instruction !== undefined && doc.system_instruction !== null) {
    snap.system_instruction = reqString(doc, 'system_instruction', '');
  }
  checkToolPairs(snap.messages);
  return snap;
}

/** Write the session atomically. Rejects with SessionBusyError while a turn runs. */
export async function saveSessionFile(session: ConversationSession, filePath: string): Promise<void> {
  session.assertIdle('save the session');
  const text = serializeSession(session.snapshot());
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await atomicWrite(filePath, text);
}

export async function loadSessionFile(filePath: string): Promise<SessionSnapshot> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e: unknown) {
    throw new PersistenceError(`cannot read session file ${filePath}: ${e instanceof Error ? e.message : String(e)}`, undefined, {
      cause: e,
    });
  }
  return deserializeSession(text);
}
