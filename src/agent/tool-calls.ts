import type { ToolCall } from '../types.js';
import { isRecord, randomId } from '../utils.js';

export function newCallId(): string {
  return `call_${randomId()}`;
}

/**
 * Normalize provider-sent arguments into an object.
 * - object: used as-is
 * - string: JSON-parsed; empty or whitespace means `{}`
 * - anything that does not end up an object is kept raw in `invalid_arguments`
 */
export function normalizeArguments(raw: unknown): Pick<ToolCall, 'arguments' | 'invalid_arguments'> {
  if (raw === undefined || raw === null) return { arguments: {} };
  if (isRecord(raw)) return { arguments: raw };
  if (typeof raw === 'string') {
    if (!raw.trim()) return { arguments: {} };
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isRecord(parsed)) return { arguments: parsed };
    } catch {
      // fall through: keep the raw text for the failed result
    }
    return { arguments: {}, invalid_arguments: raw };
  }
  return { arguments: {}, invalid_arguments: JSON.stringify(raw) };
}

/** Build a ToolCall from loosely-typed provider fields. Returns null without a usable name. */
export function toToolCall(id: unknown, name: unknown, args: unknown): ToolCall | null {
  if (typeof name !== 'string' || !name.trim()) return null;
  return {
    id: typeof id === 'string' && id ? id : newCallId(),
    name: name.trim(),
    ...normalizeArguments(args),
  };
}

/** One-line summary of call arguments for spinners and /agent history. */
export function summarizeArgs(args: Record<string, unknown>, max = 80): string {
  const s = Object.entries(args)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? JSON.stringify(v.length > 40 ? v.slice(0, 40) + '…' : v) : JSON.stringify(v)}`)
    .join(' ');
  return s.length > max ? s.slice(0, max - 1) + '…' : s;
}
