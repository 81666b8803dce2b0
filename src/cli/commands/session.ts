/**
 * Session commands: /help, /quit, /exit, /clear, /save, /load, /sessions,
 * /model, /system, /history, /info.
 */

import { loadSessionFile, saveSessionFile } from '../../persistence.js';
import { err as errFmt, roleLabel } from '../../term.js';
import type { ChatMessage } from '../../types.js';
import { plural } from '../../utils.js';
import { friendlyError } from '../args.js';
import { allCommands, type SlashCommand } from '../command-registry.js';
import type { ReplContext } from '../repl-context.js';
import { autoSavePath, listSavedSessions, resolveSessionPath } from '../session-state.js';

const HISTORY_PREVIEW = 100;

function oneLine(text: string, max = HISTORY_PREVIEW): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? flat.slice(0, max - 1) + '…' : flat;
}

export function formatHistoryLine(m: ChatMessage, i: number, ctx: Pick<ReplContext, 'S'>): string {
  const n = ctx.S.dim(String(i + 1).padStart(3));
  const label = roleLabel(m.role, ctx.S);
  switch (m.role) {
    case 'assistant': {
      const calls = m.tool_calls?.length ? ctx.S.dim(` [calls: ${m.tool_calls.map((c) => c.name).join(', ')}]`) : '';
      return `${n} ${label}: ${oneLine(m.content)}${calls}`;
    }
    case 'tool': {
      const r = m.content;
      const status = r.success ? 'ok' : 'failed';
      return `${n} ${label}: ${r.name} ${status}: ${oneLine(r.success ? r.output : r.error)}`;
    }
    default:
      return `${n} ${label}: ${oneLine(m.content)}`;
  }
}

async function runGuarded(ctx: ReplContext, fn: () => Promise<void>): Promise<boolean> {
  try {
    await fn();
  } catch (e: unknown) {
    console.error(errFmt(friendlyError(e), ctx.S));
  }
  return true;
}

export const sessionCommands: SlashCommand[] = [
  {
    name: '/quit',
    aliases: ['/exit'],
    description: 'Exit parley',
    async execute(ctx) {
      await ctx.shutdown(0);
      return true;
    },
  },
  {
    name: '/help',
    description: 'Show available commands',
    async execute(ctx) {
      const lines = allCommands().map((c) => {
        const head = c.usage ?? c.name;
        const alias = c.aliases?.length ? ctx.S.dim(` (${c.aliases.join(', ')})`) : '';
        return `  ${head.padEnd(34)} ${c.description}${alias}`;
      });
      console.log(ctx.S.bold('Commands:') + '\n' + lines.join('\n'));
      console.log(ctx.S.dim('Anything else is sent to the model. Ctrl+C cancels a running turn.'));
      return true;
    },
  },
  {
    name: '/clear',
    description: 'Forget the conversation',
    async execute(ctx) {
      return runGuarded(ctx, async () => {
        ctx.session.clear();
        console.log(ctx.S.dim('conversation cleared'));
      });
    },
  },
  {
    name: '/save',
    usage: '/save [name|path]',
    description: 'Save the session to a file',
    async execute(ctx, args) {
      return runGuarded(ctx, async () => {
        const file = args
          ? resolveSessionPath(args, ctx.config.sessions_dir)
          : autoSavePath(ctx.config.sessions_dir, ctx.session.id);
        await saveSessionFile(ctx.session, file);
        console.log(`saved ${plural(ctx.session.messages.length, 'message')} to ${file}`);
      });
    },
  },
  {
    name: '/load',
    usage: '/load <name|path>',
    description: 'Replace the session with a saved one',
    async execute(ctx, args) {
      if (!args) {
        console.log('usage: /load <name|path>');
        return true;
      }
      return runGuarded(ctx, async () => {
        const file = resolveSessionPath(args, ctx.config.sessions_dir);
        const snap = await loadSessionFile(file);
        ctx.session.restore(snap);
        if (ctx.orchestrator.provider.kind !== snap.provider) {
          ctx.orchestrator.provider = ctx.makeProvider(snap.provider);
        }
        console.log(`loaded ${plural(snap.messages.length, 'message')} (${snap.provider}/${snap.model}) from ${file}`);
      });
    },
  },
  {
    name: '/sessions',
    description: 'List saved sessions',
    async execute(ctx) {
      return runGuarded(ctx, async () => {
        const saved = await listSavedSessions(ctx.config.sessions_dir);
        if (!saved.length) {
          console.log(ctx.S.dim(`no saved sessions in ${ctx.config.sessions_dir}`));
          return;
        }
        for (const s of saved) {
          console.log(`  ${s.name.padEnd(40)} ${ctx.S.dim(new Date(s.mtimeMs).toISOString())}`);
        }
      });
    },
  },
  {
    name: '/model',
    usage: '/model [name]',
    description: 'Show or change the model',
    async execute(ctx, args) {
      if (!args) {
        console.log(`model: ${ctx.session.model} (${ctx.session.provider})`);
        return true;
      }
      return runGuarded(ctx, async () => {
        ctx.session.setModel(args);
        console.log(`model set to ${args}`);
      });
    },
  },
  {
    name: '/system',
    usage: '/system [text|reset]',
    description: 'Show, set or reset the system instruction',
    async execute(ctx, args) {
      if (!args) {
        console.log(ctx.session.systemInstruction ?? ctx.S.dim('(no system instruction)'));
        return true;
      }
      return runGuarded(ctx, async () => {
        if (args === 'reset') {
          ctx.session.setSystemInstruction(ctx.config.system_instruction);
          console.log(ctx.S.dim('system instruction reset'));
          return;
        }
        ctx.session.setSystemInstruction(args);
        console.log(ctx.S.dim('system instruction updated'));
      });
    },
  },
  {
    name: '/history',
    description: 'Show the transcript',
    async execute(ctx) {
      const msgs = ctx.session.messages;
      if (!msgs.length) {
        console.log(ctx.S.dim('(empty conversation)'));
        return true;
      }
      console.log(msgs.map((m, i) => formatHistoryLine(m, i, ctx)).join('\n'));
      return true;
    },
  },
  {
    name: '/info',
    description: 'Show session and configuration details',
    async execute(ctx) {
      const endpoint = ctx.session.provider === 'gemini' ? ctx.config.gemini_endpoint : ctx.config.ollama.endpoint;
      const lines = [
        `parley v${ctx.version}`,
        `Session: ${ctx.session.id}`,
        `Provider: ${ctx.session.provider}`,
        `Model: ${ctx.session.model}`,
        `Endpoint: ${endpoint}`,
        `Messages: ${ctx.session.messages.length}`,
        `Agent: ${ctx.tools.enabled ? 'on' : 'off'}${ctx.tools.dryRun ? ' (dry-run)' : ''}`,
        `Working dir: ${ctx.tools.cwd}`,
        `Config: ${ctx.configPath}`,
        `Node: ${process.version}`,
      ];
      console.log(lines.join('\n'));
      return true;
    },
  },
];
