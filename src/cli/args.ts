/**
 * CLI argument parsing, flag coercions, and help text.
 */

import { ClientError, isConnRefused, isConnTimeout } from '../client/error-utils.js';
import { parseColorMode, parseCsv, parseProvider, type ConfigLayer } from '../config.js';
import type { ParleyConfig } from '../types.js';

/** Bad command line. The bin prints the message and exits 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Convert raw errors into operator-facing messages (no stack traces). */
export function friendlyError(e: unknown): string {
  const msg = e instanceof Error ? e.message : String(e);
  if (e instanceof ClientError && (e.status === 401 || e.status === 403)) {
    return `Authentication failed (${e.status}). Check GEMINI_API_KEY or PARLEY_API_KEY.`;
  }
  if (e instanceof ClientError && e.status === 404) {
    return `Not found: ${msg}. Check the model name and endpoint.`;
  }
  if (e instanceof ClientError && e.status === 429) {
    return `Rate limited by the provider. Wait a moment and try again. (${msg})`;
  }
  if (isConnTimeout(e) || isConnRefused(e) || msg.includes('Connection timeout') || msg.includes('ECONNREFUSED')) {
    return `Connection failed: ${msg}. Is the endpoint reachable (for Ollama: is the server running)?`;
  }
  return msg;
}

// Flags that never consume the next argument as their value
const BOOLEAN_FLAGS = new Set(['help', 'version', 'verbose', 'agent', 'dry-run', 'no-color']);

const VALUE_FLAGS = new Set([
  'provider',
  'model',
  'system',
  'endpoint',
  'allow',
  'forbid',
  'max-iterations',
  'resume',
  'config',
  'color',
  'prompt',
  'dir',
]);

const SHORT_ALIASES: Record<string, string> = {
  h: 'help',
  v: 'version',
  p: 'prompt',
};

export type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | true>;
};

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const out: ParsedArgs = { positional: [], flags: {} };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--') {
      out.positional.push(...argv.slice(i + 1));
      break;
    }
    if (!a.startsWith('-') || a === '-') {
      out.positional.push(a);
      continue;
    }

    let key: string;
    let value: string | undefined;
    if (a.startsWith('--')) {
      const eq = a.indexOf('=');
      key = eq >= 0 ? a.slice(2, eq) : a.slice(2);
      value = eq >= 0 ? a.slice(eq + 1) : undefined;
    } else {
      const short = a.slice(1);
      const mapped = SHORT_ALIASES[short];
      if (!mapped) throw new UsageError(`unknown option ${a}`);
      key = mapped;
    }

    if (BOOLEAN_FLAGS.has(key)) {
      if (value !== undefined) throw new UsageError(`--${key} does not take a value`);
      out.flags[key] = true;
      continue;
    }
    if (!VALUE_FLAGS.has(key)) throw new UsageError(`unknown option ${a}`);

    if (value === undefined) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) throw new UsageError(`--${key} needs a value`);
      value = next;
      i++;
    }
    out.flags[key] = value;
  }
  return out;
}

export type CliOptions = {
  layer: ConfigLayer;
  configPath?: string;
  /** Applies to whichever provider ends up active. */
  endpoint?: string;
  allow: string[];
  forbid: string[];
  resume?: string;
  prompt?: string;
  help: boolean;
  version: boolean;
};

function flagString(flags: ParsedArgs['flags'], key: string): string | undefined {
  const v = flags[key];
  return typeof v === 'string' ? v : undefined;
}

export function toCliOptions(args: ParsedArgs): CliOptions {
  const f = args.flags;
  const layer: ConfigLayer = {};
  const agent: NonNullable<ConfigLayer['agent']> = {};

  const provider = flagString(f, 'provider');
  if (provider !== undefined) {
    const kind = parseProvider(provider);
    if (!kind) throw new UsageError(`--provider must be gemini or ollama (got "${provider}")`);
    layer.provider = kind;
  }

  const model = flagString(f, 'model');
  if (model !== undefined) layer.model = model;
  const system = flagString(f, 'system');
  if (system !== undefined) layer.system_instruction = system;
  const dir = flagString(f, 'dir');
  if (dir !== undefined) layer.dir = dir;
  if (f.verbose) layer.verbose = true;

  const color = flagString(f, 'color');
  if (color !== undefined) {
    const mode = parseColorMode(color);
    if (!mode) throw new UsageError(`--color must be auto, always or never (got "${color}")`);
    layer.color = mode;
  }
  if (f['no-color']) layer.color = 'never';

  if (f.agent) agent.enabled = true;
  if (f['dry-run']) agent.dry_run = true;
  const maxIter = flagString(f, 'max-iterations');
  if (maxIter !== undefined) {
    const n = Number(maxIter);
    if (!Number.isInteger(n) || n < 1) throw new UsageError(`--max-iterations must be a positive integer (got "${maxIter}")`);
    agent.max_iterations = n;
  }
  if (Object.keys(agent).length) layer.agent = agent;

  const prompt = flagString(f, 'prompt') ?? (args.positional.length ? args.positional.join(' ') : undefined);

  return {
    layer,
    configPath: flagString(f, 'config'),
    endpoint: flagString(f, 'endpoint'),
    allow: parseCsv(flagString(f, 'allow')) ?? [],
    forbid: parseCsv(flagString(f, 'forbid')) ?? [],
    resume: flagString(f, 'resume'),
    prompt,
    help: f.help === true,
    version: f.version === true,
  };
}

/** Point the active provider at `endpoint`. */
export function withEndpoint(config: ParleyConfig, endpoint: string | undefined): ParleyConfig {
  if (!endpoint) return config;
  const url = endpoint.replace(/\/+$/, '');
  return config.provider === 'gemini'
    ? { ...config, gemini_endpoint: url }
    : { ...config, ollama: { ...config.ollama, endpoint: url } };
}

export function printHelp(): void {
  console.log(`Usage: parley [options] [prompt]

Starts an interactive chat. With a prompt (or piped stdin) runs one turn and exits.

Options:
  --provider gemini|ollama   (default: gemini)
  --model NAME               (default: gemini-2.5-flash / llama3.1)
  --system TEXT              system instruction for new sessions
  --endpoint URL             endpoint of the active provider
  --dir PATH                 working directory for agent tools
  --agent                    start with agent mode on
  --allow a,b                extra allowed roots for agent tools
  --forbid a,b               extra forbidden roots for agent tools
  --dry-run                  describe file changes without writing
  --max-iterations N         tool rounds per turn (default 6)
  --resume NAME|PATH         continue a saved session
  --config PATH              (default: ~/.config/parley/config.json)
  --color auto|always|never
  --no-color
  --verbose                  diagnostics on stderr
  --prompt, -p TEXT          one-shot prompt
  --help, -h
  --version, -v

Environment:
  GEMINI_API_KEY / PARLEY_API_KEY, OLLAMA_HOST, PARLEY_PROVIDER, PARLEY_MODEL,
  PARLEY_AGENT, PARLEY_DRY_RUN, PARLEY_MAX_ITERATIONS, PARLEY_VERBOSE
`);
}
