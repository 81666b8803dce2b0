import { GeminiAdapter } from './client/gemini.js';
import type { FetchLike } from './client/http.js';
import { OllamaAdapter } from './client/ollama.js';
import type { ChatMessage, ParleyConfig, ProviderKind, StreamChunk, ToolSchema } from './types.js';

export { ClientError, asError, isConnRefused, isConnTimeout, makeClientError } from './client/error-utils.js';
export { defaultFetch, type FetchInit, type FetchLike, type StreamingResponse } from './client/http.js';
export { GeminiAdapter } from './client/gemini.js';
export { OllamaAdapter } from './client/ollama.js';

export type TurnRequest = {
  model: string;
  messages: readonly ChatMessage[];
  systemInstruction?: string;
  /** Offered only when the orchestrator has agent mode on. */
  tools?: ToolSchema[];
};

/**
 * One streaming provider. startTurn() yields chunks in arrival order and
 * never throws: failures arrive as a final `error` chunk, and an aborted
 * signal ends the stream silently.
 */
export interface ProviderAdapter {
  readonly kind: ProviderKind;
  /** Whether the model can be offered tools. */
  functionCalling(model: string, signal?: AbortSignal): Promise<boolean>;
  startTurn(req: TurnRequest, signal?: AbortSignal): AsyncGenerator<StreamChunk>;
}

export function createProvider(
  config: Pick<ParleyConfig, 'provider' | 'api_key' | 'gemini_endpoint' | 'ollama' | 'connection_timeout' | 'verbose'>,
  opts: { fetch?: FetchLike } = {}
): ProviderAdapter {
  const connectionTimeoutMs = config.connection_timeout * 1000;
  switch (config.provider) {
    case 'gemini':
      return new GeminiAdapter({
        apiKey: config.api_key,
        endpoint: config.gemini_endpoint,
        fetch: opts.fetch,
        connectionTimeoutMs,
        verbose: config.verbose,
      });
    case 'ollama':
      return new OllamaAdapter({
        endpoint: config.ollama.endpoint,
        functionCalling: config.ollama.function_calling,
        fetch: opts.fetch,
        connectionTimeoutMs,
        verbose: config.verbose,
      });
  }
}
