/**
 * One-shot mode: run a single prompt and report through the exit code.
 * 0 when the turn completed, 1 when it was aborted.
 */

import { runAgentTurn, type AgentTurnDeps } from './agent-turn.js';

export async function runOneShot(deps: AgentTurnDeps, prompt: string): Promise<number> {
  const ac = new AbortController();
  const onSigint = () => ac.abort();
  process.once('SIGINT', onSigint);
  try {
    const outcome = await runAgentTurn({ ...deps, spinner: deps.spinner ?? false }, prompt, ac.signal);
    return outcome.state === 'completed' ? 0 : 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

/** Whole of a piped stdin, trimmed. */
export async function readStdin(stream: AsyncIterable<string | Buffer> = process.stdin): Promise<string> {
  const parts: Buffer[] = [];
  for await (const chunk of stream) parts.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  return Buffer.concat(parts).toString('utf8').trim();
}
