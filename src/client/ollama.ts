/**
 * Local variant: Ollama `/api/chat` streaming NDJSON.
 *
 * Function calling depends on the model, so it is a runtime flag: forced on or
 * off by config, or queried once per model through `/api/show` in auto mode.
 */

import { toToolCall } from '../agent/tool-calls.js';
import type { FunctionCallingMode, StreamChunk, ToolSchema } from '../types.js';
import { isRecord } from '../utils.js';

import type { ProviderAdapter, TurnRequest } from '../client.js';
import { asError, makeClientError } from './error-utils.js';
import { DEFAULT_CONNECTION_TIMEOUT_MS, defaultFetch, postStream, type FetchLike } from './http.js';
import { readLines } from './stream-parsers.js';
import { turnStream } from './turn-stream.js';

export const OLLAMA_DEFAULT_ENDPOINT = 'http://localhost:11434';

export type OllamaMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string;
      tool_calls?: Array<{ type: 'function'; function: { name: string; arguments: Record<string, unknown> } }>;
    }
  | { role: 'tool'; tool_name: string; content: string };

export type OllamaChatRequest = {
  model: string;
  messages: OllamaMessage[];
  stream: true;
  tools?: ToolSchema[];
};

export type OllamaAdapterOptions = {
  endpoint?: string;
  functionCalling?: FunctionCallingMode;
  fetch?: FetchLike;
  connectionTimeoutMs?: number;
  verbose?: boolean;
};

export function toOllamaMessages(req: TurnRequest): OllamaMessage[] {
  const out: OllamaMessage[] = [];
  if (req.systemInstruction?.trim()) out.push({ role: 'system', content: req.systemInstruction });

  for (const m of req.messages) {
    switch (m.role) {
      case 'system':
        // operator-facing diagnostics stay out of the prompt
        continue;
      case 'user':
        out.push({ role: 'user', content: m.content });
        break;
      case 'assistant':
        out.push({
          role: 'assistant',
          content: m.content,
          ...(m.tool_calls?.length
            ? {
                tool_calls: m.tool_calls.map((c) => ({
                  type: 'function' as const,
                  function: { name: c.name, arguments: c.arguments },
                })),
              }
            : {}),
        });
        break;
      case 'tool': {
        const r = m.content;
        out.push({
          role: 'tool',
          tool_name: r.name,
          content: JSON.stringify(r.success ? { call_id: r.call_id, output: r.output } : { call_id: r.call_id, error: r.error }),
        });
        break;
      }
    }
  }
  return out;
}

/** Decode one NDJSON line. Blank lines yield nothing. */
export function decodeOllamaLine(line: string, allowToolCalls: boolean): StreamChunk[] {
  if (!line.trim()) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw makeClientError(`malformed stream fragment: ${line.slice(0, 200)}`);
  }
  if (!isRecord(parsed)) throw makeClientError(`malformed stream fragment: ${line.slice(0, 200)}`);
  if (typeof parsed.error === 'string') throw makeClientError(`Ollama error: ${parsed.error}`);

  const chunks: StreamChunk[] = [];
  const msg = parsed.message;
  if (isRecord(msg)) {
    if (typeof msg.content === 'string' && msg.content) chunks.push({ type: 'text', text: msg.content });
    if (allowToolCalls && Array.isArray(msg.tool_calls)) {
      for (const tc of msg.tool_calls) {
        if (!isRecord(tc) || !isRecord(tc.function)) continue;
        const call = toToolCall(tc.id, tc.function.name, tc.function.arguments);
        if (call) chunks.push({ type: 'tool_call', call });
      }
    }
  }
  if (parsed.done === true) {
    chunks.push({ type: 'done', finish_reason: typeof parsed.done_reason === 'string' ? parsed.done_reason : undefined });
  }
  return chunks;
}

export class OllamaAdapter implements ProviderAdapter {
  readonly kind = 'ollama' as const;
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;
  private readonly capabilityCache = new Map<string, boolean>();

  constructor(private readonly opts: OllamaAdapterOptions = {}) {
    this.endpoint = (opts.endpoint ?? OLLAMA_DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.fetchImpl = opts.fetch ?? defaultFetch;
  }

  private log(msg: string) {
    if (this.opts.verbose) console.error(`[parley] ${msg}`);
  }

  private get connTimeoutMs(): number {
    return this.opts.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;
  }

  async functionCalling(model: string, signal?: AbortSignal): Promise<boolean> {
    const mode = this.opts.functionCalling ?? 'auto';
    if (mode !== 'auto') return mode === 'on';

    const cached = this.capabilityCache.get(model);
    if (cached !== undefined) return cached;

    const supported = await this.queryToolSupport(model, signal);
    // An aborted query says nothing about the model.
    if (!signal?.aborted) this.capabilityCache.set(model, supported);
    return supported;
  }

  private async queryToolSupport(model: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const res = await postStream({
        fetchImpl: this.fetchImpl,
        url: `${this.endpoint}/api/show`,
        body: { model },
        signal,
        connTimeoutMs: this.connTimeoutMs,
        label: 'POST /api/show',
      });
      let text: string;
      try {
        text = await res.text();
      } finally {
        res.release();
      }
      const info: unknown = JSON.parse(text);
      const caps = isRecord(info) && Array.isArray(info.capabilities) ? info.capabilities : [];
      const supported = caps.includes('tools');
      this.log(`model ${model}: function calling ${supported ? 'supported' : 'not supported'}`);
      return supported;
    } catch (e: unknown) {
      this.log(`capability check for ${model} failed, assuming no function calling: ${asError(e).message}`);
      return false;
    }
  }

  async *startTurn(req: TurnRequest, signal?: AbortSignal): AsyncGenerator<StreamChunk> {
    const withTools = req.tools?.length ? await this.functionCalling(req.model, signal) : false;
    if (signal?.aborted) return;

    const body: OllamaChatRequest = {
      model: req.model,
      messages: toOllamaMessages(req),
      stream: true,
      ...(withTools && { tools: req.tools }),
    };
    const url = `${this.endpoint}/api/chat`;
    this.log(`POST ${url} (${body.messages.length} messages, tools ${withTools ? 'on' : 'off'})`);

    yield* turnStream({
      open: () =>
        postStream({
          fetchImpl: this.fetchImpl,
          url,
          body,
          signal,
          connTimeoutMs: this.connTimeoutMs,
          label: 'POST /api/chat',
        }),
      frames: readLines,
      decode: (line) => decodeOllamaLine(line, withTools),
      signal,
      log: (msg) => this.log(msg),
    });
  }
}
