import type { ReplContext } from './repl-context.js';

export interface SlashCommand {
  name: string;
  aliases?: string[];
  usage?: string;
  description: string;
  /** Returns false when the line was not handled. */
  execute(ctx: ReplContext, args: string, line: string): Promise<boolean>;
}

const registry = new Map<string, SlashCommand>();

export function registerCommand(cmd: SlashCommand): void {
  registry.set(cmd.name.toLowerCase(), cmd);
  for (const a of cmd.aliases ?? []) registry.set(a.toLowerCase(), cmd);
}

export function registerAll(cmds: SlashCommand[]): void {
  for (const c of cmds) registerCommand(c);
}

export function findCommand(line: string): SlashCommand | null {
  const head = (line.trim().split(/\s+/)[0] || '').toLowerCase();
  if (!head.startsWith('/')) return null;
  return registry.get(head) ?? null;
}

export function allCommands(): SlashCommand[] {
  return [...new Set(registry.values())].sort((a, b) => a.name.localeCompare(b.name));
}

/** Text after the command word. */
export function commandArgs(line: string): string {
  const trimmed = line.trim();
  const sp = trimmed.search(/\s/);
  return sp < 0 ? '' : trimmed.slice(sp + 1).trim();
}
