import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

import {
  deserializeSession,
  loadSessionFile,
  PersistenceError,
  saveSessionFile,
  serializeSession,
  SESSION_FORMAT_VERSION,
} from '../src/persistence.js';
import { ConversationSession } from '../src/session.js';
import type { SessionSnapshot } from '../src/types.js';

let tmpDir: string;

before(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'parley-persist-'));
});

after(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function sample(): SessionSnapshot {
  return {
    id: 'abc',
    provider: 'gemini',
    model: 'gemini-2.5-flash',
    system_instruction: 'Be brief.',
    created_at: '2026-03-01T10:00:00.000Z',
    updated_at: '2026-03-01T10:05:00.000Z',
    messages: [
      { role: 'user', content: 'what is in notes.txt?', timestamp: '2026-03-01T10:00:00.000Z' },
      {
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'c1', name: 'read_file', arguments: { path: 'notes.txt' } }],
        timestamp: '2026-03-01T10:00:01.000Z',
      },
      {
        role: 'tool',
        content: { call_id: 'c1', name: 'read_file', success: true, output: 'buy milk' },
        timestamp: '2026-03-01T10:00:02.000Z',
      },
      { role: 'assistant', content: 'It says to buy milk.', timestamp: '2026-03-01T10:00:03.000Z' },
    ],
  };
}

function mutate(edit: (doc: Record<string, unknown>) => void): string {
  const doc: Record<string, unknown> = JSON.parse(serializeSession(sample()));
  edit(doc);
  return JSON.stringify(doc);
}

describe('serializeSession', () => {
  it('writes the format version first and ends with a newline', () => {
    const text = serializeSession(sample());
    assert.ok(text.startsWith(`{\n  "version": ${SESSION_FORMAT_VERSION},\n  "id": "abc",`));
    assert.ok(text.endsWith('}\n'));
  });

  it('reads back what it wrote', () => {
    assert.deepEqual(deserializeSession(serializeSession(sample())), sample());
  });
});

describe('deserializeSession', () => {
  it('rejects text that is not JSON', () => {
    assert.throws(() => deserializeSession('{nope'), (e: unknown) => {
      assert.ok(e instanceof PersistenceError);
      assert.match(e.message, /^invalid session file: not JSON \(/);
      return true;
    });
  });

  it('rejects a missing or unsupported version', () => {
    assert.throws(
      () => deserializeSession(mutate((d) => delete d.version)),
      { message: 'invalid session file: version is missing' }
    );
    assert.throws(
      () => deserializeSession(mutate((d) => (d.version = 2))),
      { message: 'unsupported session format version 2 (expected 1)' }
    );
  });

  it('names the first offending field', () => {
    const text = mutate((d) => {
      const messages = d.messages;
      if (!Array.isArray(messages)) throw new Error('fixture has no messages');
      messages[3] = { role: 'assistant', content: 'x', timestamp: 'yesterday' };
    });
    assert.throws(
      () => deserializeSession(text),
      (e: unknown) => {
        assert.ok(e instanceof PersistenceError);
        assert.equal(e.message, 'invalid session file: messages[3].timestamp is not a valid timestamp');
        assert.equal(e.field, 'messages[3].timestamp');
        return true;
      }
    );
  });

  it('rejects an unknown provider and role', () => {
    assert.throws(
      () => deserializeSession(mutate((d) => (d.provider = 'openai'))),
      { message: 'invalid session file: provider must be "gemini" or "ollama"' }
    );
    const badRole = mutate((d) => {
      const messages = d.messages;
      if (!Array.isArray(messages)) throw new Error('fixture has no messages');
      messages[0] = { role: 'narrator', content: 'x', timestamp: '2026-03-01T10:00:00.000Z' };
    });
    assert.throws(() => deserializeSession(badRole), {
      message: 'invalid session file: messages[0].role has unknown value "narrator"',
    });
  });

  it('rejects a tool call with no matching result', () => {
    const text = mutate((d) => {
      const messages = d.messages;
      if (!Array.isArray(messages)) throw new Error('fixture has no messages');
      messages.splice(2, 1);
    });
    assert.throws(() => deserializeSession(text), {
      message: 'invalid session file: messages[1].tool_calls[0] has no tool result for call c1',
    });
  });

  it('accepts a file without a system instruction', () => {
    const snap = deserializeSession(mutate((d) => delete d.system_instruction));
    assert.equal('system_instruction' in snap, false);
  });
});

describe('session files', () => {
  it('saves and loads a session', async () => {
    const session = ConversationSession.fromSnapshot(sample());
    const file = path.join(tmpDir, 'nested', 'dir', 'chat.json');
    await saveSessionFile(session, file);
    assert.deepEqual(await loadSessionFile(file), sample());
    const leftovers = (await fs.readdir(path.dirname(file))).filter((f) => f !== 'chat.json');
    assert.deepEqual(leftovers, []);
  });

  it('refuses to save while a turn is in progress', async () => {
    const session = ConversationSession.fromSnapshot(sample());
    const lease = session.beginTurn();
    await assert.rejects(saveSessionFile(session, path.join(tmpDir, 'busy.json')), {
      name: 'SessionBusyError',
      message: 'cannot save the session while a turn is in progress',
    });
    lease.release();
    await assert.rejects(fs.stat(path.join(tmpDir, 'busy.json')), { code: 'ENOENT' });
  });

  it('reports an unreadable file with its path', async () => {
    const missing = path.join(tmpDir, 'missing.json');
    await assert.rejects(loadSessionFile(missing), (e: unknown) => {
      assert.ok(e instanceof PersistenceError);
      assert.ok(e.message.startsWith(`cannot read session file ${missing}: ENOENT`));
      return true;
    });
  });
});
