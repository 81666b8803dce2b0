/**
 * Wires config into the runtime objects the REPL and one-shot mode share:
 * permission guard, tool registry, session, provider and orchestrator.
 */

import { AgentOrchestrator } from '../agent.js';
import { createProvider, type FetchLike, type ProviderAdapter } from '../client.js';
import { DEFAULT_MODELS } from '../config.js';
import { PermissionGuard } from '../permissions.js';
import { loadSessionFile } from '../persistence.js';
import { ConversationSession } from '../session.js';
import type { Styler } from '../term.js';
import { createToolRegistry, type ToolRegistry } from '../tools.js';
import type { ParleyConfig, ProviderKind } from '../types.js';

import type { ReplContext } from './repl-context.js';
import { resolveSessionPath } from './session-state.js';

export type RuntimeOptions = {
  /** Extra roots from --allow / --forbid, applied after the config lists. */
  allow?: string[];
  forbid?: string[];
  /** --resume name or path. */
  resume?: string;
  fetch?: FetchLike;
};

export type Runtime = {
  guard: PermissionGuard;
  tools: ToolRegistry;
  session: ConversationSession;
  orchestrator: AgentOrchestrator;
  makeProvider(kind: ProviderKind): ProviderAdapter;
};

export function buildGuard(config: ParleyConfig, extra: Pick<RuntimeOptions, 'allow' | 'forbid'> = {}): PermissionGuard {
  const guard = new PermissionGuard(config.dir, {
    allowed: [...(config.agent.allow_cwd ? [config.dir] : []), ...config.agent.allowed_paths],
    forbidden: config.agent.forbidden_paths,
  });
  for (const p of extra.forbid ?? []) guard.forbid(p);
  for (const p of extra.allow ?? []) guard.allow(p);
  return guard;
}

export async function buildRuntime(config: ParleyConfig, opts: RuntimeOptions = {}): Promise<Runtime> {
  const guard = buildGuard(config, opts);
  const tools = createToolRegistry({
    cwd: config.dir,
    guard,
    enabled: config.agent.enabled,
    dryRun: config.agent.dry_run,
    autoBackup: config.agent.auto_backup,
    maxReadBytes: config.agent.max_read_bytes,
    maxSearchResults: config.agent.max_search_results,
  });

  const session = opts.resume
    ? ConversationSession.fromSnapshot(await loadSessionFile(resolveSessionPath(opts.resume, config.sessions_dir)))
    : new ConversationSession({
        provider: config.provider,
        model: config.model || DEFAULT_MODELS[config.provider],
        systemInstruction: config.system_instruction,
      });

  const makeProvider = (kind: ProviderKind) => createProvider({ ...config, provider: kind }, { fetch: opts.fetch });
  const orchestrator = new AgentOrchestrator({
    session,
    provider: makeProvider(session.provider),
    tools,
    maxIterations: config.agent.max_iterations,
    verbose: config.verbose,
  });

  return { guard, tools, session, orchestrator, makeProvider };
}

export function buildReplContext(
  rt: Runtime,
  deps: {
    config: ParleyConfig;
    configPath: string;
    S: Styler;
    version: string;
    shutdown(code: number): Promise<void>;
  }
): ReplContext {
  return {
    session: rt.session,
    orchestrator: rt.orchestrator,
    tools: rt.tools,
    guard: rt.guard,
    makeProvider: rt.makeProvider,
    ...deps,
  };
}
