import { BUILTIN_TOOL_NAMES, BUILTIN_TOOL_SPECS, validateArgs, type BuiltinToolName } from './agent/tools-schema.js';
import type { PermissionGuard } from './permissions.js';
import { listDirectoryTool, searchFilesTool } from './tools/file-discovery.js';
import { updateFileTool, writeFileTool } from './tools/file-mutations.js';
import { fileInfoTool, readFileTool } from './tools/file-read.js';
import { ToolError, ValidationError } from './tools/tool-error.js';
import type { JsonSchema, PermissionStatus, ToolCall, ToolResult, ToolSchema } from './types.js';
import { nowIso } from './utils.js';

export type ToolContext = {
  cwd: string;
  guard: PermissionGuard;
  dryRun: boolean;
  autoBackup: boolean;
  maxReadBytes: number;
  maxSearchResults: number;
};

export type ToolHandler = (ctx: ToolContext, args: Record<string, unknown>) => Promise<string>;

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: JsonSchema;
  handler: ToolHandler;
};

export type ToolExecution = {
  name: string;
  call_id: string;
  success: boolean;
  at: string;
  durationMs: number;
};

export type RegistryStatus = PermissionStatus & {
  dry_run: boolean;
  tools_executed: number;
  tools: string[];
};

export type ToolRegistryOptions = {
  cwd: string;
  guard: PermissionGuard;
  enabled?: boolean;
  dryRun?: boolean;
  autoBackup?: boolean;
  maxReadBytes?: number;
  maxSearchResults?: number;
  /** Execution records kept for history(). */
  historyLimit?: number;
};

export const DEFAULT_MAX_READ_BYTES = 256 * 1024;
export const DEFAULT_MAX_SEARCH_RESULTS = 100;
const DEFAULT_HISTORY_LIMIT = 100;

const BUILTIN_HANDLERS: Record<BuiltinToolName, ToolHandler> = {
  read_file: readFileTool,
  write_file: writeFileTool,
  update_file: updateFileTool,
  search_files: searchFilesTool,
  list_directory: listDirectoryTool,
  file_info: fileInfoTool,
};

function failed(call: ToolCall, error: string): ToolResult {
  return { call_id: call.id, name: call.name, success: false, error };
}

/**
 * Named tools the model may call. execute() never rejects: every failure
 * (unknown tool, bad arguments, permission, handler error) comes back as a
 * failed ToolResult.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly executions: ToolExecution[] = [];
  private executedCount = 0;
  private readonly historyLimit: number;

  readonly cwd: string;
  readonly guard: PermissionGuard;
  enabled: boolean;
  dryRun: boolean;
  autoBackup: boolean;
  maxReadBytes: number;
  maxSearchResults: number;

  constructor(opts: ToolRegistryOptions) {
    this.cwd = opts.cwd;
    this.guard = opts.guard;
    this.enabled = opts.enabled ?? false;
    this.dryRun = opts.dryRun ?? false;
    this.autoBackup = opts.autoBackup ?? true;
    this.maxReadBytes = opts.maxReadBytes ?? DEFAULT_MAX_READ_BYTES;
    this.maxSearchResults = opts.maxSearchResults ?? DEFAULT_MAX_SEARCH_RESULTS;
    this.historyLimit = opts.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  register(def: ToolDefinition): void {
    if (this.tools.has(def.name)) throw new Error(`tool already registered: ${def.name}`);
    this.tools.set(def.name, def);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  schemas(): ToolSchema[] {
    return [...this.tools.values()].map((t) => ({
      type: 'function',
      function: { name: t.name, description: t.description, parameters: t.parameters },
    }));
  }

  async execute(call: ToolCall): Promise<ToolResult> {
    const started = Date.now();
    const result = await this.dispatch(call);
    this.record({
      name: call.name,
      call_id: call.id,
      success: result.success,
      at: nowIso(),
      durationMs: Date.now() - started,
    });
    return result;
  }

  history(limit?: number): ToolExecution[] {
    return limit === undefined ? [...this.executions] : this.executions.slice(-limit);
  }

  /** Forget recorded executions and reset the executed count. */
  clearHistory(): void {
    this.executions.length = 0;
    this.executedCount = 0;
  }

  status(): RegistryStatus {
    return {
      ...this.guard.status(this.enabled),
      dry_run: this.dryRun,
      tools_executed: this.executedCount,
      tools: this.names(),
    };
  }

  private context(): ToolContext {
    return {
      cwd: this.cwd,
      guard: this.guard,
      dryRun: this.dryRun,
      autoBackup: this.autoBackup,
      maxReadBytes: this.maxReadBytes,
      maxSearchResults: this.maxSearchResults,
    };
  }

  private async dispatch(call: ToolCall): Promise<ToolResult> {
    const def = this.tools.get(call.name);
    if (!def) {
      return failed(
        call,
        new ToolError('invalid_args', `unknown tool: ${call.name}`, false, `available: ${this.names().join(', ')}`).toToolResult()
      );
    }

    if (call.invalid_arguments !== undefined) {
      return failed(
        call,
        new ToolError('invalid_args', `${call.name}: arguments are not a JSON object`, false, undefined, {
          raw: call.invalid_arguments,
        }).toToolResult()
      );
    }

    const errors = validateArgs(def.parameters, call.arguments);
    if (errors.length) return failed(call, new ValidationError(errors).toToolResult());

    try {
      const output = await def.handler(this.context(), call.arguments);
      return { call_id: call.id, name: call.name, success: true, output };
    } catch (e: unknown) {
      return failed(call, ToolError.fromError(e).toToolResult());
    }
  }

  private record(exec: ToolExecution): void {
    this.executedCount++;
    this.executions.push(exec);
    if (this.executions.length > this.historyLimit) this.executions.shift();
  }
}

/** Registry with the six built-in file tools registered. */
export function createToolRegistry(opts: ToolRegistryOptions): ToolRegistry {
  const registry = new ToolRegistry(opts);
  for (const name of BUILTIN_TOOL_NAMES) {
    registry.register({ name, ...BUILTIN_TOOL_SPECS[name], handler: BUILTIN_HANDLERS[name] });
  }
  return registry;
}
