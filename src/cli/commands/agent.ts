/**
 * /agent on|off|status|config|tools|history|clear|dry-run|allow|forbid|check
 */

import { parseBool } from '../../config.js';
import { err as errFmt } from '../../term.js';
import { plural } from '../../utils.js';
import { friendlyError } from '../args.js';
import type { SlashCommand } from '../command-registry.js';
import type { ReplContext } from '../repl-context.js';

const USAGE =
  '/agent on|off|status|config|tools|history|clear|dry-run on|off|allow <path>|forbid <path>|check <path>';

export function formatAgentStatus(ctx: Pick<ReplContext, 'tools' | 'S'>): string {
  const st = ctx.tools.status();
  const list = (xs: string[]) => (xs.length ? xs.map((x) => `    ${x}`).join('\n') : ctx.S.dim('    (none)'));
  return [
    `agent: ${st.enabled ? ctx.S.green('on') : ctx.S.dim('off')}${st.dry_run ? ctx.S.yellow(' (dry-run)') : ''}`,
    `tools executed: ${st.tools_executed}`,
    '  allowed:',
    list(st.allowed),
    '  forbidden:',
    list(st.forbidden),
  ].join('\n');
}

export function formatAgentConfig(ctx: Pick<ReplContext, 'tools' | 'orchestrator'>): string {
  const { tools } = ctx;
  const onOff = (v: boolean) => (v ? 'on' : 'off');
  return [
    'agent config:',
    `  enabled: ${onOff(tools.enabled)}`,
    `  dry-run: ${onOff(tools.dryRun)}`,
    `  auto-backup: ${onOff(tools.autoBackup)}`,
    `  max iterations: ${ctx.orchestrator.maxIterations}`,
    `  max read bytes: ${tools.maxReadBytes}`,
    `  max search results: ${tools.maxSearchResults}`,
    `  working dir: ${tools.cwd}`,
  ].join('\n');
}

function needPath(rest: string, sub: string): string | null {
  if (rest) return rest;
  console.log(`usage: /agent ${sub} <path>`);
  return null;
}

export const agentCommands: SlashCommand[] = [
  {
    name: '/agent',
    usage: '/agent [subcommand]',
    description: 'Agent mode and file permissions',
    async execute(ctx, args) {
      const [sub = 'status', ...restParts] = args.split(/\s+/).filter(Boolean);
      const rest = restParts.join(' ');
      try {
        switch (sub.toLowerCase()) {
          case 'on':
            ctx.tools.enabled = true;
            console.log(`agent mode ${ctx.S.green('on')}: the model may call ${plural(ctx.tools.names().length, 'tool')}`);
            return true;
          case 'off':
            ctx.tools.enabled = false;
            console.log(`agent mode ${ctx.S.dim('off')}`);
            return true;
          case 'status':
            console.log(formatAgentStatus(ctx));
            return true;
          case 'config':
            console.log(formatAgentConfig(ctx));
            return true;
          case 'tools':
            for (const s of ctx.tools.schemas()) {
              console.log(`  ${s.function.name.padEnd(16)} ${ctx.S.dim(s.function.description ?? '')}`);
            }
            return true;
          case 'history': {
            const recent = ctx.tools.history(20);
            if (!recent.length) {
              console.log(ctx.S.dim('no tool calls yet'));
              return true;
            }
            for (const h of recent) {
              const mark = h.success ? ctx.S.green('✓') : ctx.S.red('✗');
              console.log(`  ${mark} ${h.name.padEnd(16)} ${ctx.S.dim(`${h.durationMs}ms ${h.at}`)}`);
            }
            return true;
          }
          case 'clear':
            ctx.tools.clearHistory();
            console.log('tool history cleared');
            return true;
          case 'dry-run': {
            const v = parseBool(rest || undefined);
            if (v === undefined) {
              console.log(`dry-run: ${ctx.tools.dryRun ? 'on' : 'off'}`);
              return true;
            }
            ctx.tools.dryRun = v;
            console.log(`dry-run ${v ? 'on' : 'off'}`);
            return true;
          }
          case 'allow': {
            const p = needPath(rest, 'allow');
            if (p) console.log(`allowed ${ctx.guard.allow(p)}`);
            return true;
          }
          case 'forbid': {
            const p = needPath(rest, 'forbid');
            if (p) console.log(`forbidden ${ctx.guard.forbid(p)}`);
            return true;
          }
          case 'check': {
            const p = needPath(rest, 'check');
            if (!p) return true;
            const v = ctx.guard.check(p);
            console.log(v.allowed ? `${ctx.S.green('allowed')} ${v.path}` : `${ctx.S.red('denied')} ${v.path}: ${v.reason ?? ''}`);
            return true;
          }
          default:
            console.log(`usage: ${USAGE}`);
            return true;
        }
      } catch (e: unknown) {
        console.error(errFmt(friendlyError(e), ctx.S));
        return true;
      }
    },
  },
];
