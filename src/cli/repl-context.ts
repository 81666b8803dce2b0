import type { AgentOrchestrator } from '../agent.js';
import type { ProviderAdapter } from '../client.js';
import type { PermissionGuard } from '../permissions.js';
import type { ConversationSession } from '../session.js';
import type { Styler } from '../term.js';
import type { ToolRegistry } from '../tools.js';
import type { ParleyConfig, ProviderKind } from '../types.js';

export interface ReplContext {
  session: ConversationSession;
  orchestrator: AgentOrchestrator;
  tools: ToolRegistry;
  guard: PermissionGuard;
  config: ParleyConfig;
  configPath: string;
  S: Styler;
  version: string;

  makeProvider(kind: ProviderKind): ProviderAdapter;
  shutdown(code: number): Promise<void>;
}
