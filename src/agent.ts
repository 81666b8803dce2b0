/**
 * Agent orchestrator: drives one user turn through provider rounds and tool
 * execution until the model answers without calling tools.
 *
 * Messages produced during a turn are staged locally and sent as
 * `[...transcript, ...staged]`. They reach the session only through the turn
 * lease:
 * - completed: staged messages + the final assistant message
 * - transport error: staged messages (user message and complete tool pairs)
 * - iteration cap: staged messages + a diagnostic system message
 * - cancelled: nothing
 */

import { newCallId } from './agent/tool-calls.js';
import { AgentState, type AbortReason, isTerminal, transition } from './agent/state.js';
import type { ProviderAdapter, TurnRequest } from './client.js';
import { asError } from './client/error-utils.js';
import type { ConversationSession } from './session.js';
import type { ToolRegistry } from './tools.js';
import type {
  AssistantMessage,
  ChatMessage,
  ToolCall,
  ToolCallEvent,
  ToolMessage,
  ToolResult,
  ToolResultEvent,
  ToolSchema,
  TurnEndEvent,
} from './types.js';
import { nowIso, plural } from './utils.js';

export { AgentState } from './agent/state.js';

export const DEFAULT_MAX_ITERATIONS = 6;

export type AgentHooks = {
  signal?: AbortSignal;
  onToken?: (t: string) => void;
  onToolCall?: (call: ToolCallEvent) => void;
  onToolResult?: (result: ToolResultEvent) => void | Promise<void>;
  onStateChange?: (state: AgentState) => void;
  onTurnEnd?: (stats: TurnEndEvent) => void | Promise<void>;
};

export type TurnOutcome = {
  state: 'completed' | 'aborted';
  reason?: AbortReason;
  /** Final answer when completed; text streamed so far in the last round otherwise. */
  text: string;
  /** Tool rounds executed. */
  iterations: number;
  toolCalls: number;
  error?: Error;
};

export type OrchestratorOptions = {
  session: ConversationSession;
  provider: ProviderAdapter;
  tools: ToolRegistry;
  maxIterations?: number;
  verbose?: boolean;
};

type RoundResult = { text: string; calls: ToolCall[]; error?: Error };

function summarize(result: ToolResult): string {
  const text = result.success ? result.output : result.error;
  const first = text.split('\n').find((l) => l.trim()) ?? '';
  return first.length > 120 ? first.slice(0, 119) + '…' : first;
}

export function iterationCapMessage(max: number): string {
  return `[agent] stopped after ${plural(max, 'tool iteration')} without a final answer`;
}

export class AgentOrchestrator {
  readonly session: ConversationSession;
  provider: ProviderAdapter;
  readonly tools: ToolRegistry;
  maxIterations: number;
  verbose: boolean;

  private _state: AgentState = AgentState.Idle;
  private inFlight: AbortController | null = null;
  private hooks: AgentHooks = {};

  constructor(opts: OrchestratorOptions) {
    this.session = opts.session;
    this.provider = opts.provider;
    this.tools = opts.tools;
    this.maxIterations = Math.max(1, opts.maxIterations ?? DEFAULT_MAX_ITERATIONS);
    this.verbose = opts.verbose ?? false;
  }

  get state(): AgentState {
    return this._state;
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  /** Stop the current turn. A tool already running finishes; nothing else starts. */
  cancel(): void {
    this.inFlight?.abort();
  }

  private log(msg: string) {
    if (this.verbose) console.error(`[parley] ${msg}`);
  }

  private setState(next: AgentState) {
    this._state = transition(this._state, next);
    this.hooks.onStateChange?.(next);
  }

  async runTurn(input: string, hooks: AgentHooks = {}): Promise<TurnOutcome> {
    const lease = this.session.beginTurn();
    const ac = new AbortController();
    this.inFlight = ac;
    this.hooks = hooks;

    const callerSignal = hooks.signal;
    const onCallerAbort = () => ac.abort();
    if (callerSignal?.aborted) ac.abort();
    else callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const started = Date.now();
    const staged: ChatMessage[] = [{ role: 'user', content: input, timestamp: nowIso() }];
    const counters = { iterations: 0, toolCalls: 0 };

    const end = async (
      outcome: Omit<TurnOutcome, 'iterations' | 'toolCalls'>,
      commit: readonly ChatMessage[] | null
    ): Promise<TurnOutcome> => {
      if (commit) lease.commit(commit);
      else lease.release();
      this.setState(outcome.state === 'completed' ? AgentState.Completed : AgentState.Aborted);
      const result: TurnOutcome = { ...outcome, ...counters };
      this.log(
        `turn ${result.state}${result.reason ? ` (${result.reason})` : ''}: ` +
          `${plural(result.iterations, 'iteration')}, ${plural(result.toolCalls, 'tool call')}`
      );
      await hooks.onTurnEnd?.({
        state: result.state,
        iterations: result.iterations,
        toolCalls: result.toolCalls,
        durationMs: Date.now() - started,
      });
      return result;
    };

    try {
      const tools = await this.offeredTools(ac.signal);
      if (ac.signal.aborted) return await end({ state: 'aborted', reason: 'cancelled', text: '' }, null);

      const seenIds = new Set<string>();
      for (;;) {
        this.setState(AgentState.Streaming);
        const round = await this.streamRound(staged, tools, ac.signal, seenIds);

        if (ac.signal.aborted) {
          return await end({ state: 'aborted', reason: 'cancelled', text: round.text }, null);
        }
        if (round.error) {
          this.log(`provider error: ${round.error.message}`);
          return await end({ state: 'aborted', reason: 'transport', text: round.text, error: round.error }, staged);
        }
        if (!round.calls.length) {
          const answer: AssistantMessage = { role: 'assistant', content: round.text, timestamp: nowIso() };
          return await end({ state: 'completed', text: round.text }, [...staged, answer]);
        }
        if (counters.iterations >= this.maxIterations) {
          const note: ChatMessage = {
            role: 'system',
            content: iterationCapMessage(this.maxIterations),
            timestamp: nowIso(),
          };
          return await end({ state: 'aborted', reason: 'iteration_cap', text: round.text }, [...staged, note]);
        }

        counters.iterations++;
        const pending = await this.executeCalls(round, ac.signal, counters);
        if (!pending) return await end({ state: 'aborted', reason: 'cancelled', text: round.text }, null);
        staged.push(...pending);
      }
    } catch (e: unknown) {
      // A hook threw or the state machine rejected a step: nothing is committed.
      lease.release();
      if (!isTerminal(this._state) && this._state !== AgentState.Idle) this._state = AgentState.Aborted;
      throw asError(e);
    } finally {
      callerSignal?.removeEventListener('abort', onCallerAbort);
      this.inFlight = null;
      if (isTerminal(this._state)) this.setState(AgentState.Idle);
      this.hooks = {};
    }
  }

  private async offeredTools(signal: AbortSignal): Promise<ToolSchema[] | undefined> {
    if (!this.tools.enabled) return undefined;
    const supported = await this.provider.functionCalling(this.session.model, signal);
    if (!supported) {
      this.log(`model ${this.session.model} has no function calling; tools not offered`);
      return undefined;
    }
    return this.tools.schemas();
  }

  /** Drain one provider stream completely. Tool calls are collected, not run. */
  private async streamRound(
    staged: readonly ChatMessage[],
    tools: ToolSchema[] | undefined,
    signal: AbortSignal,
    seenIds: Set<string>
  ): Promise<RoundResult> {
    const req: TurnRequest = {
      model: this.session.model,
      messages: [...this.session.messages, ...staged],
      systemInstruction: this.session.systemInstruction,
      tools,
    };
    const round: RoundResult = { text: '', calls: [] };

    for await (const chunk of this.provider.startTurn(req, signal)) {
      switch (chunk.type) {
        case 'text':
          round.text += chunk.text;
          this.hooks.onToken?.(chunk.text);
          break;
        case 'tool_call': {
          if (!tools) {
            this.log(`ignoring tool call ${chunk.call.name}: tools were not offered`);
            break;
          }
          const call = seenIds.has(chunk.call.id) ? { ...chunk.call, id: newCallId() } : chunk.call;
          seenIds.add(call.id);
          round.calls.push(call);
          break;
        }
        case 'error':
          round.error = chunk.error;
          break;
        case 'done':
          break;
      }
    }
    return round;
  }

  /**
   * Run the round's calls in order. Returns the assistant message and one tool
   * message per call, or null when cancelled before every call ran.
   */
  private async executeCalls(
    round: RoundResult,
    signal: AbortSignal,
    counters: { toolCalls: number }
  ): Promise<ChatMessage[] | null> {
    this.setState(AgentState.ExecutingTool);
    const out: ChatMessage[] = [
      { role: 'assistant', content: round.text, tool_calls: round.calls, timestamp: nowIso() },
    ];

    for (const call of round.calls) {
      if (signal.aborted) return null;
      this.hooks.onToolCall?.({ id: call.id, name: call.name, args: call.arguments });
      const t0 = Date.now();
      const result = await this.tools.execute(call);
      counters.toolCalls++;
      const msg: ToolMessage = { role: 'tool', content: result, timestamp: nowIso() };
      out.push(msg);
      this.log(`${call.name} ${result.success ? 'ok' : 'failed'} (${Date.now() - t0}ms)`);
      await this.hooks.onToolResult?.({
        id: call.id,
        name: call.name,
        success: result.success,
        summary: summarize(result),
        durationMs: Date.now() - t0,
      });
    }
    return signal.aborted ? null : out;
  }
}
