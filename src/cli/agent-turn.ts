/**
 * Shared helper: run one agent turn with spinner and hooks, print how it
 * ended, and auto-save when configured.
 *
 * Used by the REPL loop (index.ts) and one-shot mode (oneshot.ts).
 */

import { iterationCapMessage, type AgentHooks, type AgentOrchestrator, type TurnOutcome } from '../agent.js';
import { saveSessionFile } from '../persistence.js';
import { CliSpinner, type SpinnerOutput } from '../spinner.js';
import { err, warn, type Styler } from '../term.js';
import type { ParleyConfig } from '../types.js';

import { friendlyError } from './args.js';
import { autoSavePath } from './session-state.js';

export type AgentTurnDeps = {
  orchestrator: AgentOrchestrator;
  config: Pick<ParleyConfig, 'auto_save' | 'sessions_dir' | 'verbose'>;
  S: Styler;
  /** Streamed answer text. */
  stdout?: SpinnerOutput;
  /** Spinner, tool summaries and diagnostics. */
  stderr?: SpinnerOutput;
  spinner?: boolean;
};

/** Print the end-of-turn line for anything but a clean completion. */
export function describeOutcome(outcome: TurnOutcome, maxIterations: number, S: Styler): string | null {
  if (outcome.state === 'completed') return null;
  switch (outcome.reason) {
    case 'cancelled':
      return S.dim('[cancelled]');
    case 'iteration_cap':
      return warn(iterationCapMessage(maxIterations), S);
    case 'transport':
      return err(friendlyError(outcome.error ?? 'request failed'), S);
    default:
      return S.dim('[aborted]');
  }
}

export async function runAgentTurn(deps: AgentTurnDeps, input: string, signal?: AbortSignal): Promise<TurnOutcome> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const spinner = new CliSpinner({ styler: deps.S, enabled: deps.spinner, out: stderr });
  let streamed = false;

  const hooks: AgentHooks = {
    signal,
    onToken: (t) => {
      spinner.onFirstDelta();
      streamed = true;
      stdout.write(t);
    },
    onToolCall: (e) => {
      if (streamed) stdout.write('\n');
      streamed = false;
      spinner.onToolCall(e);
    },
    onToolResult: (e) => spinner.onToolResult(e),
  };

  spinner.start();
  let outcome: TurnOutcome;
  try {
    outcome = await deps.orchestrator.runTurn(input, hooks);
  } finally {
    spinner.stop();
  }
  if (streamed) stdout.write('\n');

  const note = describeOutcome(outcome, deps.orchestrator.maxIterations, deps.S);
  if (note) stderr.write(note + '\n');

  if (deps.config.auto_save && outcome.reason !== 'cancelled') {
    const session = deps.orchestrator.session;
    const file = autoSavePath(deps.config.sessions_dir, session.id);
    try {
      await saveSessionFile(session, file);
    } catch (e: unknown) {
      stderr.write(warn(`auto-save to ${file} failed: ${friendlyError(e)}`, deps.S) + '\n');
    }
  }
  return outcome;
}
