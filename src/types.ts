export type ProviderKind = 'gemini' | 'ollama';

export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type JsonSchema = {
  type?: string;
  description?: string;
  enum?: string[];
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: string[];
  additionalProperties?: boolean;
  minimum?: number;
  maximum?: number;
};

export type ToolSchema = {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters: JsonSchema;
  };
};

export type ToolCall = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Raw argument text the provider sent that did not parse into a JSON object. */
  invalid_arguments?: string;
};

export type ToolResult =
  | { call_id: string; name: string; success: true; output: string }
  | { call_id: string; name: string; success: false; error: string };

export type SystemMessage = { role: 'system'; content: string; timestamp: string };
export type UserMessage = { role: 'user'; content: string; timestamp: string };
export type AssistantMessage = {
  role: 'assistant';
  content: string;
  tool_calls?: ToolCall[];
  timestamp: string;
};
export type ToolMessage = { role: 'tool'; content: ToolResult; timestamp: string };

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type StreamChunk =
  | { type: 'text'; text: string }
  | { type: 'tool_call'; call: ToolCall }
  | { type: 'done'; finish_reason?: string }
  | { type: 'error'; error: Error };

export type SessionSnapshot = {
  id: string;
  provider: ProviderKind;
  model: string;
  system_instruction?: string;
  created_at: string;
  updated_at: string;
  messages: ChatMessage[];
};

export type PermissionStatus = {
  enabled: boolean;
  allowed: string[];
  forbidden: string[];
};

export type ColorMode = 'auto' | 'always' | 'never';

export type FunctionCallingMode = 'auto' | 'on' | 'off';

export type AgentConfig = {
  enabled: boolean;
  max_iterations: number;
  max_read_bytes: number;
  max_search_results: number;
  dry_run: boolean;
  auto_backup: boolean;
  /** Seed the allow-list with the working directory on startup. */
  allow_cwd: boolean;
  allowed_paths: string[];
  forbidden_paths: string[];
};

export type ParleyConfig = {
  provider: ProviderKind;
  model: string;
  api_key?: string;
  gemini_endpoint: string;
  ollama: {
    endpoint: string;
    function_calling: FunctionCallingMode;
  };
  system_instruction: string;
  dir: string;
  verbose: boolean;
  color: ColorMode;
  auto_save: boolean;
  sessions_dir: string;
  /** Seconds to wait for response headers. */
  connection_timeout: number;
  agent: AgentConfig;
};

export type ToolCallEvent = { id: string; name: string; args: Record<string, unknown> };

export type ToolResultEvent = {
  id: string;
  name: string;
  success: boolean;
  summary: string;
  durationMs: number;
};

export type TurnEndEvent = {
  state: 'completed' | 'aborted';
  iterations: number;
  toolCalls: number;
  durationMs: number;
};
