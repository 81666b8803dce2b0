import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { AgentOrchestrator, iterationCapMessage, type AgentHooks } from '../src/agent.js';
import { canTransition, IllegalTransitionError, transition } from '../src/agent/state.js';
import { OllamaAdapter, type ProviderAdapter, type TurnRequest } from '../src/client.js';
import { PermissionGuard } from '../src/permissions.js';
import { ConversationSession } from '../src/session.js';
import { createToolRegistry, ToolRegistry } from '../src/tools.js';
import type { ChatMessage, StreamChunk, ToolCall } from '../src/types.js';

import { fakeFetch, ndjson } from './helpers/fake-fetch.js';

type Round = StreamChunk[] | ((signal?: AbortSignal) => AsyncGenerator<StreamChunk>);

/** Provider that plays back one scripted round per startTurn() call. */
class ScriptedProvider implements ProviderAdapter {
  readonly kind = 'gemini' as const;
  readonly requests: TurnRequest[] = [];
  private readonly rounds: Round[];

  constructor(
    rounds: Round[],
    private readonly supportsTools = true
  ) {
    this.rounds = [...rounds];
  }

  async functionCalling(): Promise<boolean> {
    return this.supportsTools;
  }

  async *startTurn(req: TurnRequest, signal?: AbortSignal): AsyncGenerator<StreamChunk> {
    this.requests.push({ ...req, messages: [...req.messages] });
    const round = this.rounds.shift();
    if (!round) throw new Error(`unexpected provider round ${this.requests.length}`);
    if (Array.isArray(round)) {
      for (const c of round) yield c;
    } else {
      yield* round(signal);
    }
  }
}

async function* textThenHang(text: string, signal?: AbortSignal): AsyncGenerator<StreamChunk> {
  yield { type: 'text', text };
  if (!signal || signal.aborted) return;
  await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

const done: StreamChunk = { type: 'done', finish_reason: 'STOP' };

function toolCall(id: string, name: string, args: Record<string, unknown>): StreamChunk {
  const call: ToolCall = { id, name, arguments: args };
  return { type: 'tool_call', call };
}

function setup(opts: { rounds: Round[]; toolsEnabled?: boolean; supportsTools?: boolean; maxIterations?: number }) {
  const session = new ConversationSession({ provider: 'gemini', model: 'gemini-2.5-flash' });
  const provider = new ScriptedProvider(opts.rounds, opts.supportsTools ?? true);
  const tools = new ToolRegistry({ cwd: os.tmpdir(), guard: new PermissionGuard(os.tmpdir()), enabled: opts.toolsEnabled ?? true });
  tools.register({
    name: 'echo',
    description: 'Echo the text back',
    parameters: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
    handler: async (_ctx, args) => `echo: ${String(args.text)}`,
  });
  const orchestrator = new AgentOrchestrator({ session, provider, tools, maxIterations: opts.maxIterations });
  return { session, provider, tools, orchestrator };
}

function roles(messages: readonly ChatMessage[]): string[] {
  return messages.map((m) => m.role);
}

describe('AgentOrchestrator', () => {
  it('plain chat streams tokens and commits the user message and answer', async () => {
    const { session, provider, orchestrator } = setup({
      toolsEnabled: false,
      rounds: [[{ type: 'text', text: 'Hel' }, { type: 'text', text: 'lo' }, done]],
    });
    session.setSystemInstruction('Be brief.');
    const tokens: string[] = [];

    const outcome = await orchestrator.runTurn('hi', { onToken: (t) => tokens.push(t) });

    assert.deepEqual(outcome, { state: 'completed', text: 'Hello', iterations: 0, toolCalls: 0 });
    assert.deepEqual(tokens, ['Hel', 'lo']);
    assert.deepEqual(roles(session.messages), ['user', 'assistant']);
    assert.deepEqual(
      session.messages.map((m) => m.content),
      ['hi', 'Hello']
    );
    assert.equal(provider.requests[0].tools, undefined);
    assert.equal(provider.requests[0].systemInstruction, 'Be brief.');
    assert.deepEqual(roles(provider.requests[0].messages), ['user']);
  });

  it('runs tool calls and sends their results back before the final answer', async () => {
    const { session, provider, tools, orchestrator } = setup({
      rounds: [[toolCall('c1', 'echo', { text: 'ping' }), done], [{ type: 'text', text: 'It said ping.' }, done]],
    });
    const states: string[] = [];
    const calls: string[] = [];
    const results: string[] = [];
    const hooks: AgentHooks = {
      onStateChange: (s) => states.push(s),
      onToolCall: (c) => calls.push(`${c.id} ${c.name} ${JSON.stringify(c.args)}`),
      onToolResult: (r) => {
        results.push(`${r.id} ${r.success ? 'ok' : 'failed'} ${r.summary}`);
      },
    };

    const outcome = await orchestrator.runTurn('echo ping', hooks);

    assert.equal(outcome.state, 'completed');
    assert.equal(outcome.text, 'It said ping.');
    assert.equal(outcome.iterations, 1);
    assert.equal(outcome.toolCalls, 1);
    assert.deepEqual(calls, ['c1 echo {"text":"ping"}']);
    assert.deepEqual(results, ['c1 ok echo: ping']);
    assert.deepEqual(states, ['streaming', 'executing_tool', 'streaming', 'completed', 'idle']);
    assert.equal(orchestrator.state, 'idle');
    assert.equal(orchestrator.running, false);

    assert.deepEqual(roles(session.messages), ['user', 'assistant', 'tool', 'assistant']);
    const toolMsg = session.messages[2];
    if (toolMsg.role !== 'tool') assert.fail('expected a tool message');
    assert.deepEqual(toolMsg.content, { call_id: 'c1', name: 'echo', success: true, output: 'echo: ping' });

    assert.equal(provider.requests.length, 2);
    assert.deepEqual(
      provider.requests[0].tools?.map((t) => t.function.name),
      ['echo']
    );
    assert.deepEqual(roles(provider.requests[1].messages), ['user', 'assistant', 'tool']);
    assert.equal(tools.status().tools_executed, 1);
  });

  it('on a transport error keeps the user message and completed tool pairs', async () => {
    const { session, orchestrator } = setup({
      rounds: [
        [toolCall('c1', 'echo', { text: 'a' }), done],
        [{ type: 'text', text: 'par' }, { type: 'error', error: new Error('POST /api/chat failed: 503 Service Unavailable') }],
      ],
    });

    const outcome = await orchestrator.runTurn('go');

    assert.equal(outcome.state, 'aborted');
    assert.equal(outcome.reason, 'transport');
    assert.equal(outcome.text, 'par');
    assert.equal(outcome.error?.message, 'POST /api/chat failed: 503 Service Unavailable');
    assert.deepEqual(roles(session.messages), ['user', 'assistant', 'tool']);
    assert.equal(session.busy, false);
  });

  it('a transport error on the first round commits only the user message', async () => {
    const { session, orchestrator } = setup({ rounds: [[{ type: 'error', error: new Error('fetch failed') }]] });
    const outcome = await orchestrator.runTurn('hello?');
    assert.equal(outcome.reason, 'transport');
    assert.deepEqual(
      session.messages.map((m) => m.content),
      ['hello?']
    );
  });

  it('cancelling mid-stream commits nothing', async () => {
    const { session, orchestrator } = setup({ rounds: [(signal) => textThenHang('partial', signal)] });
    const ac = new AbortController();

    const outcome = await orchestrator.runTurn('long question', { signal: ac.signal, onToken: () => ac.abort() });

    assert.equal(outcome.state, 'aborted');
    assert.equal(outcome.reason, 'cancelled');
    assert.equal(outcome.text, 'partial');
    assert.equal(session.messages.length, 0);
    assert.equal(session.busy, false);
    assert.equal(orchestrator.state, 'idle');
  });

  it('cancelling during tool execution stops before the next call and commits nothing', async () => {
    const { session, tools, orchestrator } = setup({
      rounds: [[toolCall('c1', 'echo', { text: 'one' }), toolCall('c2', 'echo', { text: 'two' }), done]],
    });

    const outcome = await orchestrator.runTurn('two echoes', { onToolResult: () => orchestrator.cancel() });

    assert.equal(outcome.reason, 'cancelled');
    assert.equal(outcome.toolCalls, 1);
    assert.deepEqual(
      tools.history().map((h) => h.call_id),
      ['c1']
    );
    assert.equal(session.messages.length, 0);
  });

  it('an already aborted signal ends the turn before any request', async () => {
    const { session, provider, orchestrator } = setup({ rounds: [] });
    const ac = new AbortController();
    ac.abort();
    const outcome = await orchestrator.runTurn('never sent', { signal: ac.signal });
    assert.equal(outcome.reason, 'cancelled');
    assert.equal(provider.requests.length, 0);
    assert.equal(session.messages.length, 0);
  });

  it('stops at the iteration cap with a diagnostic message', async () => {
    const loop: Round = [toolCall('c', 'echo', { text: 'again' }), done];
    const { session, provider, orchestrator } = setup({ maxIterations: 2, rounds: [loop, loop, loop] });

    const outcome = await orchestrator.runTurn('loop forever');

    assert.equal(outcome.state, 'aborted');
    assert.equal(outcome.reason, 'iteration_cap');
    assert.equal(outcome.iterations, 2);
    assert.equal(outcome.toolCalls, 2);
    assert.equal(provider.requests.length, 3);
    assert.deepEqual(roles(session.messages), ['user', 'assistant', 'tool', 'assistant', 'tool', 'system']);
    const last = session.messages[5];
    assert.equal(last.content, '[agent] stopped after 2 tool iterations without a final answer');
    assert.equal(iterationCapMessage(1), '[agent] stopped after 1 tool iteration without a final answer');
  });

  it('gives repeated call ids a fresh id', async () => {
    const { session, orchestrator } = setup({
      rounds: [[toolCall('dup', 'echo', { text: 'a' }), toolCall('dup', 'echo', { text: 'b' }), done], [done]],
    });
    await orchestrator.runTurn('twice');

    const assistant = session.messages[1];
    if (assistant.role !== 'assistant' || !assistant.tool_calls) assert.fail('expected tool calls');
    const [first, second] = assistant.tool_calls;
    assert.equal(first.id, 'dup');
    assert.notEqual(second.id, 'dup');
    const toolIds = session.messages.flatMap((m) => (m.role === 'tool' ? [m.content.call_id] : []));
    assert.deepEqual(toolIds, [first.id, second.id]);
  });

  it('feeds a failed tool result back to the model', async () => {
    const { session, orchestrator } = setup({
      rounds: [[toolCall('c1', 'delete_everything', {}), done], [{ type: 'text', text: 'That tool does not exist.' }, done]],
    });
    const outcome = await orchestrator.runTurn('try it');
    assert.equal(outcome.state, 'completed');
    const result = session.messages[2];
    if (result.role !== 'tool' || result.content.success) assert.fail('expected a failed tool result');
    assert.match(result.content.error, /unknown tool: delete_everything/);
  });

  it('ignores tool calls when agent mode is off', async () => {
    const { session, provider, orchestrator } = setup({
      toolsEnabled: false,
      rounds: [[{ type: 'text', text: 'ok' }, toolCall('c1', 'echo', { text: 'x' }), done]],
    });
    const outcome = await orchestrator.runTurn('hi');
    assert.equal(outcome.state, 'completed');
    assert.equal(provider.requests.length, 1);
    assert.deepEqual(roles(session.messages), ['user', 'assistant']);
  });

  it('offers no tools to a model without function calling', async () => {
    const { provider, orchestrator } = setup({ supportsTools: false, rounds: [[{ type: 'text', text: 'ok' }, done]] });
    await orchestrator.runTurn('hi');
    assert.equal(provider.requests[0].tools, undefined);
  });

  it('includes earlier turns in later requests', async () => {
    const { provider, orchestrator } = setup({
      rounds: [
        [{ type: 'text', text: 'first answer' }, done],
        [{ type: 'text', text: 'second answer' }, done],
      ],
    });
    await orchestrator.runTurn('one');
    await orchestrator.runTurn('two');
    assert.deepEqual(
      provider.requests[1].messages.map((m) => m.content),
      ['one', 'first answer', 'two']
    );
  });

  it('refuses to start while the session is held by another turn', async () => {
    const { session, orchestrator } = setup({ rounds: [] });
    const lease = session.beginTurn();
    await assert.rejects(orchestrator.runTurn('hi'), { name: 'SessionBusyError' });
    lease.release();
  });
});

describe('agent turn over Ollama with the file tools', () => {
  let dir: string;

  before(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'parley-agent-')));
    await fs.writeFile(path.join(dir, 'a.ts'), 'export const a = 1;\n// TODO fix\n');
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('runs a streamed search_files call and commits the summary', async () => {
    const fetch = fakeFetch(
      {
        chunks: [
          ndjson(
            {
              message: {
                role: 'assistant',
                content: '',
                tool_calls: [{ function: { name: 'search_files', arguments: { pattern: 'TODO', root: '.' } } }],
              },
            },
            { message: { role: 'assistant', content: '' }, done: true, done_reason: 'stop' }
          ),
        ],
      },
      {
        chunks: [
          ndjson(
            { message: { role: 'assistant', content: 'One TODO, in a.ts line 2.' } },
            { message: { role: 'assistant', content: '' }, done: true, done_reason: 'stop' }
          ),
        ],
      }
    );
    const session = new ConversationSession({ provider: 'ollama', model: 'llama3.1' });
    const tools = createToolRegistry({ cwd: dir, guard: new PermissionGuard(dir, { allowed: [dir] }), enabled: true });
    const provider = new OllamaAdapter({ functionCalling: 'on', fetch });
    const orchestrator = new AgentOrchestrator({ session, provider, tools });

    const outcome = await orchestrator.runTurn('find the TODOs');

    assert.equal(outcome.state, 'completed');
    assert.equal(outcome.text, 'One TODO, in a.ts line 2.');
    assert.equal(outcome.toolCalls, 1);
    assert.deepEqual(roles(session.messages), ['user', 'assistant', 'tool', 'assistant']);

    const toolMsg = session.messages[2];
    if (toolMsg.role !== 'tool') assert.fail('expected a tool message');
    const result = toolMsg.content;
    if (!result.success) assert.fail(`search_files failed:\n${result.error}`);
    assert.equal(result.name, 'search_files');
    assert.equal(result.output, '1 match in 1 file\na.ts:2:// TODO fix');

    const answer = session.messages[3];
    assert.equal(answer.role, 'assistant');
    assert.equal(answer.content, 'One TODO, in a.ts line 2.');

    assert.equal(fetch.requests.length, 2);
    assert.deepEqual(fetch.requests[1].body, {
      model: 'llama3.1',
      messages: [
        { role: 'user', content: 'find the TODOs' },
        {
          role: 'assistant',
          content: '',
          tool_calls: [{ type: 'function', function: { name: 'search_files', arguments: { pattern: 'TODO', root: '.' } } }],
        },
        {
          role: 'tool',
          tool_name: 'search_files',
          content: JSON.stringify({ call_id: result.call_id, output: '1 match in 1 file\na.ts:2:// TODO fix' }),
        },
      ],
      stream: true,
      tools: tools.schemas(),
    });
  });
});

describe('agent state machine', () => {
  it('allows the turn lifecycle and rejects shortcuts', () => {
    assert.equal(canTransition('idle', 'streaming'), true);
    assert.equal(canTransition('executing_tool', 'streaming'), true);
    assert.equal(canTransition('idle', 'executing_tool'), false);
    assert.equal(canTransition('completed', 'streaming'), false);
    assert.throws(() => transition('idle', 'completed'), (e: unknown) => {
      assert.ok(e instanceof IllegalTransitionError);
      assert.equal(e.message, 'illegal agent state transition: idle -> completed');
      return true;
    });
  });
});
