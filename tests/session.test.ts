import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConversationSession, SessionBusyError } from '../src/session.js';
import type { ChatMessage, SessionSnapshot } from '../src/types.js';

const TS = '2026-01-01T00:00:00.000Z';

function user(content: string): ChatMessage {
  return { role: 'user', content, timestamp: TS };
}

function assistant(content: string): ChatMessage {
  return { role: 'assistant', content, timestamp: TS };
}

describe('ConversationSession', () => {
  it('starts empty with a fresh id', () => {
    const a = new ConversationSession({ provider: 'gemini', model: 'gemini-2.5-flash' });
    const b = new ConversationSession({ provider: 'gemini', model: 'gemini-2.5-flash' });
    assert.equal(a.messages.length, 0);
    assert.notEqual(a.id, b.id);
    assert.equal(a.busy, false);
    assert.equal(a.createdAt, a.updatedAt);
    assert.equal(a.systemInstruction, undefined);
  });

  it('treats an empty system instruction as none', () => {
    const s = new ConversationSession({ provider: 'ollama', model: 'llama3.1', systemInstruction: '' });
    assert.equal(s.systemInstruction, undefined);
    assert.equal('system_instruction' in s.snapshot(), false);
  });

  it('appends a committed turn in order', () => {
    const s = new ConversationSession({ provider: 'gemini', model: 'm' });
    const lease = s.beginTurn();
    assert.equal(s.busy, true);
    lease.commit([user('hi'), assistant('hello')]);
    assert.equal(s.busy, false);
    assert.deepEqual(
      s.messages.map((m) => m.content),
      ['hi', 'hello']
    );
  });

  it('a released lease appends nothing', () => {
    const s = new ConversationSession({ provider: 'gemini', model: 'm' });
    s.beginTurn().release();
    assert.equal(s.messages.length, 0);
    assert.equal(s.busy, false);
  });

  it('ignores commits after the lease has ended', () => {
    const s = new ConversationSession({ provider: 'gemini', model: 'm' });
    const lease = s.beginTurn();
    lease.release();
    lease.commit([user('late')]);
    assert.equal(s.messages.length, 0);

    const next = s.beginTurn();
    lease.commit([user('stale')]);
    assert.equal(s.busy, true);
    next.commit([user('fresh')]);
    assert.deepEqual(
      s.messages.map((m) => m.content),
      ['fresh']
    );
  });

  it('rejects a second turn and mutations while busy', () => {
    const s = new ConversationSession({ provider: 'gemini', model: 'm' });
    const lease = s.beginTurn();
    assert.throws(() => s.beginTurn(), { name: 'SessionBusyError', message: 'cannot start a turn while a turn is in progress' });
    assert.throws(() => s.clear(), SessionBusyError);
    assert.throws(() => s.setModel('x'), /cannot change the model while a turn is in progress/);
    assert.throws(() => s.setSystemInstruction('x'), SessionBusyError);
    assert.throws(() => s.restore(s.snapshot()), /cannot load a session/);
    lease.release();
    s.setModel('x');
    assert.equal(s.model, 'x');
  });

  it('clear empties the transcript but keeps settings', () => {
    const s = new ConversationSession({ provider: 'ollama', model: 'm', systemInstruction: 'Be brief.' });
    s.beginTurn().commit([user('a')]);
    s.clear();
    assert.equal(s.messages.length, 0);
    assert.equal(s.systemInstruction, 'Be brief.');
    assert.equal(s.provider, 'ollama');
  });

  it('snapshots are detached copies', () => {
    const s = new ConversationSession({ provider: 'gemini', model: 'm' });
    s.beginTurn().commit([
      { role: 'assistant', content: '', tool_calls: [{ id: 'c1', name: 'file_info', arguments: { path: 'a' } }], timestamp: TS },
      { role: 'tool', content: { call_id: 'c1', name: 'file_info', success: true, output: 'ok' }, timestamp: TS },
    ]);
    const snap = s.snapshot();
    const first = snap.messages[0];
    if (first.role !== 'assistant' || !first.tool_calls) assert.fail('expected an assistant tool call');
    first.tool_calls[0].arguments.path = 'changed';
    snap.messages.push(user('extra'));

    const again = s.snapshot();
    assert.equal(again.messages.length, 2);
    const call = again.messages[0];
    if (call.role !== 'assistant' || !call.tool_calls) assert.fail('expected an assistant tool call');
    assert.equal(call.tool_calls[0].arguments.path, 'a');
  });

  it('restores identity, settings and transcript from a snapshot', () => {
    const snap: SessionSnapshot = {
      id: 'saved-1',
      provider: 'ollama',
      model: 'llama3.1',
      system_instruction: 'Answer in French.',
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-02T00:00:00.000Z',
      messages: [user('bonjour'), assistant('salut')],
    };
    const s = new ConversationSession({ provider: 'gemini', model: 'm' });
    s.restore(snap);
    assert.deepEqual(s.snapshot(), snap);

    const copy = ConversationSession.fromSnapshot(snap);
    assert.equal(copy.id, 'saved-1');
    assert.equal(copy.updatedAt, '2026-01-02T00:00:00.000Z');
    assert.deepEqual(copy.snapshot(), snap);
  });

  it('setProvider switches provider and model together', () => {
    const s = new ConversationSession({ provider: 'gemini', model: 'gemini-2.5-flash' });
    s.setProvider('ollama', 'llama3.1');
    assert.equal(s.provider, 'ollama');
    assert.equal(s.model, 'llama3.1');
  });
});
