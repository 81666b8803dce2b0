#!/usr/bin/env node

import { stdin as input, stdout as output } from 'node:process';
import readline from 'node:readline/promises';

import { runAgentTurn } from './cli/agent-turn.js';
import {
  friendlyError,
  parseArgs,
  printHelp,
  toCliOptions,
  UsageError,
  withEndpoint,
  type CliOptions,
} from './cli/args.js';
import { buildReplContext, buildRuntime } from './cli/build-repl-context.js';
import { commandArgs, findCommand, registerAll } from './cli/command-registry.js';
import { agentCommands } from './cli/commands/agent.js';
import { sessionCommands } from './cli/commands/session.js';
import { readStdin, runOneShot } from './cli/oneshot.js';
import { loadConfig } from './config.js';
import { banner, err as errFmt, makeStyler, resolveColorMode } from './term.js';
import { PKG_VERSION } from './utils.js';

async function main() {
  let cli: CliOptions;
  try {
    cli = toCliOptions(parseArgs(process.argv.slice(2)));
  } catch (e: unknown) {
    if (e instanceof UsageError) {
      console.error(`parley: ${e.message} (see --help)`);
      process.exit(2);
    }
    throw e;
  }

  if (cli.help) {
    printHelp();
    process.exit(0);
  }
  if (cli.version) {
    console.log(PKG_VERSION);
    process.exit(0);
  }

  const loaded = await loadConfig({ configPath: cli.configPath, cli: cli.layer });
  const config = withEndpoint(loaded.config, cli.endpoint);
  const S = makeStyler(resolveColorMode(config.color).enabled);

  const rt = await buildRuntime(config, { allow: cli.allow, forbid: cli.forbid, resume: cli.resume });
  const turnDeps = { orchestrator: rt.orchestrator, config, S };

  // ── One-shot ──
  const piped = !input.isTTY;
  if (cli.prompt !== undefined || piped) {
    const prompt = cli.prompt ?? (await readStdin());
    if (!prompt) {
      console.error(errFmt('empty prompt', S));
      process.exit(2);
    }
    process.exit(await runOneShot(turnDeps, prompt));
  }

  // ── REPL ──
  const rl = readline.createInterface({ input, output, terminal: true });
  let closing = false;
  const shutdown = async (code: number) => {
    if (closing) return;
    closing = true;
    rl.close();
    process.exit(code);
  };

  registerAll([...sessionCommands, ...agentCommands]);
  const ctx = buildReplContext(rt, { config, configPath: loaded.configPath, S, version: PKG_VERSION, shutdown });

  let turnAbort: AbortController | null = null;
  const onInterrupt = () => {
    if (turnAbort) {
      turnAbort.abort();
      return;
    }
    process.stdout.write('\n');
    void shutdown(0);
  };
  rl.on('SIGINT', onInterrupt);
  process.on('SIGINT', onInterrupt);
  process.on('SIGTERM', () => {
    void shutdown(143);
  });
  rl.on('close', () => {
    void shutdown(0);
  });

  console.log(banner(`parley v${PKG_VERSION}`, S) + S.dim(` ${rt.session.provider}/${rt.session.model}`));
  if (rt.tools.enabled) console.log(S.dim(`agent mode on (working dir ${rt.tools.cwd})`));
  if (cli.resume) console.log(S.dim(`resumed ${rt.session.messages.length} messages from ${cli.resume}`));
  console.log(S.dim('Type /help for commands, /quit to exit.'));

  for (;;) {
    const line = (await rl.question(S.cyan('> '))).trim();
    if (!line) continue;

    const cmd = findCommand(line);
    if (cmd) {
      await cmd.execute(ctx, commandArgs(line), line);
      continue;
    }
    if (line.startsWith('/')) {
      console.log(errFmt(`unknown command ${line.split(/\s+/)[0]} (try /help)`, S));
      continue;
    }

    turnAbort = new AbortController();
    try {
      await runAgentTurn(turnDeps, line, turnAbort.signal);
    } catch (e: unknown) {
      console.error(errFmt(friendlyError(e), S));
    } finally {
      turnAbort = null;
    }
  }
}

main().catch((e: unknown) => {
  console.error(friendlyError(e));
  process.exit(1);
});
