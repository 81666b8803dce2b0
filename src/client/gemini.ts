/**
 * Cloud variant: Gemini `streamGenerateContent` over server-sent events.
 */

import { toToolCall } from '../agent/tool-calls.js';
import type { ChatMessage, JsonSchema, StreamChunk, ToolSchema } from '../types.js';
import { isRecord } from '../utils.js';

import type { ProviderAdapter, TurnRequest } from '../client.js';
import { makeClientError } from './error-utils.js';
import { DEFAULT_CONNECTION_TIMEOUT_MS, defaultFetch, postStream, type FetchLike } from './http.js';
import { readSseData } from './stream-parsers.js';
import { turnStream } from './turn-stream.js';

export const GEMINI_DEFAULT_ENDPOINT = 'https://generativelanguage.googleapis.com/v1beta';

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: Record<string, unknown> } };

type GeminiContent = { role: 'user' | 'model'; parts: GeminiPart[] };

export type GeminiRequest = {
  contents: GeminiContent[];
  system_instruction?: { parts: [{ text: string }] };
  tools?: [{ functionDeclarations: Array<{ name: string; description?: string; parameters: JsonSchema }> }];
};

export type GeminiAdapterOptions = {
  apiKey?: string;
  endpoint?: string;
  fetch?: FetchLike;
  connectionTimeoutMs?: number;
  verbose?: boolean;
};

/**
 * Map the transcript onto Gemini contents.
 * System messages are dropped; consecutive tool results share one `user` content.
 */
export function toGeminiContents(messages: readonly ChatMessage[]): GeminiContent[] {
  const out: GeminiContent[] = [];
  let prevWasTool = false;

  for (const m of messages) {
    switch (m.role) {
      case 'system':
        continue;
      case 'user':
        out.push({ role: 'user', parts: [{ text: m.content }] });
        prevWasTool = false;
        break;
      case 'assistant': {
        const parts: GeminiPart[] = [];
        if (m.content) parts.push({ text: m.content });
        for (const call of m.tool_calls ?? []) {
          parts.push({ functionCall: { name: call.name, args: call.arguments } });
        }
        if (!parts.length) parts.push({ text: '' });
        out.push({ role: 'model', parts });
        prevWasTool = false;
        break;
      }
      case 'tool': {
        const r = m.content;
        const part: GeminiPart = {
          functionResponse: {
            name: r.name,
            response: r.success ? { call_id: r.call_id, output: r.output } : { call_id: r.call_id, error: r.error },
          },
        };
        const last = out[out.length - 1];
        if (prevWasTool && last) last.parts.push(part);
        else out.push({ role: 'user', parts: [part] });
        prevWasTool = true;
        break;
      }
    }
  }
  return out;
}

/** Gemini rejects `additionalProperties`; strip it at every level. */
export function toGeminiSchema(schema: JsonSchema): JsonSchema {
  const out: JsonSchema = {};
  if (schema.type !== undefined) out.type = schema.type;
  if (schema.description !== undefined) out.description = schema.description;
  if (schema.enum !== undefined) out.enum = [...schema.enum];
  if (schema.required !== undefined) out.required = [...schema.required];
  if (schema.minimum !== undefined) out.minimum = schema.minimum;
  if (schema.maximum !== undefined) out.maximum = schema.maximum;
  if (schema.items !== undefined) out.items = toGeminiSchema(schema.items);
  if (schema.properties !== undefined) {
    out.properties = Object.fromEntries(
      Object.entries(schema.properties).map(([k, v]) => [k, toGeminiSchema(v)])
    );
  }
  return out;
}

export function buildGeminiRequest(req: TurnRequest): GeminiRequest {
  const body: GeminiRequest = { contents: toGeminiContents(req.messages) };
  if (req.systemInstruction?.trim()) {
    body.system_instruction = { parts: [{ text: req.systemInstruction }] };
  }
  if (req.tools?.length) {
    body.tools = [
      {
        functionDeclarations: req.tools.map((t: ToolSchema) => ({
          name: t.function.name,
          description: t.function.description,
          parameters: toGeminiSchema(t.function.parameters),
        })),
      },
    ];
  }
  return body;
}

/** Decode one SSE data payload into chunks. Throws on error payloads and malformed JSON. */
export function decodeGeminiFrame(data: string, onFinish: (reason: string) => void): StreamChunk[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    throw makeClientError(`malformed stream fragment: ${data.slice(0, 200)}`);
  }
  if (!isRecord(parsed)) throw makeClientError(`malformed stream fragment: ${data.slice(0, 200)}`);

  if (isRecord(parsed.error)) {
    const e = parsed.error;
    const status = typeof e.code === 'number' ? e.code : undefined;
    const msg = typeof e.message === 'string' ? e.message : JSON.stringify(e);
    throw makeClientError(`Gemini API error: ${msg}`, status, status === 429 || (status ?? 0) >= 500);
  }

  if (isRecord(parsed.promptFeedback) && typeof parsed.promptFeedback.blockReason === 'string') {
    throw makeClientError(`prompt blocked: ${parsed.promptFeedback.blockReason}`);
  }

  const chunks: StreamChunk[] = [];
  const candidates = Array.isArray(parsed.candidates) ? parsed.candidates : [];
  const first: unknown = candidates[0];
  if (!isRecord(first)) return chunks;

  const content = first.content;
  const parts: unknown[] = isRecord(content) && Array.isArray(content.parts) ? content.parts : [];
  for (const part of parts) {
    if (!isRecord(part) || part.thought === true) continue;
    if (typeof part.text === 'string' && part.text) {
      chunks.push({ type: 'text', text: part.text });
    } else if (isRecord(part.functionCall)) {
      const fc = part.functionCall;
      const call = toToolCall(fc.id, fc.name, fc.args);
      if (call) chunks.push({ type: 'tool_call', call });
    }
  }
  if (typeof first.finishReason === 'string') onFinish(first.finishReason);
  return chunks;
}

export class GeminiAdapter implements ProviderAdapter {
  readonly kind = 'gemini' as const;
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: GeminiAdapterOptions = {}) {
    this.endpoint = (opts.endpoint ?? GEMINI_DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.fetchImpl = opts.fetch ?? defaultFetch;
  }

  private log(msg: string) {
    if (this.opts.verbose) console.error(`[parley] ${msg}`);
  }

  async functionCalling(): Promise<boolean> {
    return true;
  }

  async *startTurn(req: TurnRequest, signal?: AbortSignal): AsyncGenerator<StreamChunk> {
    if (!this.opts.apiKey) {
      yield {
        type: 'error',
        error: makeClientError('missing API key: set GEMINI_API_KEY or PARLEY_API_KEY', undefined, false),
      };
      return;
    }
    const apiKey = this.opts.apiKey;
    const url = `${this.endpoint}/models/${encodeURIComponent(req.model)}:streamGenerateContent?alt=sse`;
    const body = buildGeminiRequest(req);
    this.log(`POST ${url} (${body.contents.length} contents, ${req.tools?.length ?? 0} tools)`);

    let finishReason: string | undefined;
    yield* turnStream({
      open: () =>
        postStream({
          fetchImpl: this.fetchImpl,
          url,
          body,
          headers: { 'x-goog-api-key': apiKey, 'Cache-Control': 'no-cache' },
          signal,
          connTimeoutMs: this.opts.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS,
          label: 'POST streamGenerateContent',
        }),
      frames: readSseData,
      decode: (data) =>
        decodeGeminiFrame(data, (reason) => {
          finishReason = reason;
        }),
      finishReason: () => finishReason,
      signal,
      log: (msg) => this.log(msg),
    });
  }
}
