export const AgentState = {
  Idle: 'idle',
  Streaming: 'streaming',
  ExecutingTool: 'executing_tool',
  Completed: 'completed',
  Aborted: 'aborted',
} as const;

export type AgentState = (typeof AgentState)[keyof typeof AgentState];

export type AbortReason = 'cancelled' | 'transport' | 'iteration_cap';

const TRANSITIONS: Record<AgentState, readonly AgentState[]> = {
  idle: ['streaming', 'aborted'],
  streaming: ['executing_tool', 'completed', 'aborted'],
  executing_tool: ['streaming', 'aborted'],
  completed: ['idle'],
  aborted: ['idle'],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: AgentState,
    readonly to: AgentState
  ) {
    super(`illegal agent state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: AgentState, to: AgentState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Returns `to`, or throws IllegalTransitionError. */
export function transition(from: AgentState, to: AgentState): AgentState {
  if (!canTransition(from, to)) throw new IllegalTransitionError(from, to);
  return to;
}

export function isTerminal(state: AgentState): boolean {
  return state === AgentState.Completed || state === AgentState.Aborted;
}
