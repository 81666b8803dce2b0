import fsSync from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { GEMINI_DEFAULT_ENDPOINT } from './client/gemini.js';
import { OLLAMA_DEFAULT_ENDPOINT } from './client/ollama.js';
import type { AgentConfig, ColorMode, FunctionCallingMode, ParleyConfig, ProviderKind } from './types.js';
import { configDir, isRecord, stateDir } from './utils.js';

export const DEFAULT_MODELS: Record<ProviderKind, string> = {
  gemini: 'gemini-2.5-flash',
  ollama: 'llama3.1',
};

export const DEFAULT_FORBIDDEN_PATHS = [
  '/etc',
  '/usr',
  '/bin',
  '/sbin',
  '/boot',
  '/dev',
  '/proc',
  '/sys',
  '/var/log',
  '/var/lib',
  '/root',
  '/home/*/.ssh',
  '/home/*/.gnupg',
];

const DEFAULT_AGENT: AgentConfig = {
  enabled: false,
  max_iterations: 6,
  max_read_bytes: 256 * 1024,
  max_search_results: 100,
  dry_run: false,
  auto_backup: true,
  allow_cwd: true,
  allowed_paths: [],
  forbidden_paths: DEFAULT_FORBIDDEN_PATHS,
};

function defaults(): ParleyConfig {
  return {
    provider: 'gemini',
    model: '',
    gemini_endpoint: GEMINI_DEFAULT_ENDPOINT,
    ollama: { endpoint: OLLAMA_DEFAULT_ENDPOINT, function_calling: 'auto' },
    system_instruction: '',
    dir: process.cwd(),
    verbose: false,
    color: 'auto',
    auto_save: false,
    sessions_dir: path.join(stateDir(), 'sessions'),
    connection_timeout: 30,
    agent: { ...DEFAULT_AGENT, allowed_paths: [], forbidden_paths: [...DEFAULT_FORBIDDEN_PATHS] },
  };
}

/** One source of settings. Nested sections merge key by key. */
export type ConfigLayer = Partial<Omit<ParleyConfig, 'ollama' | 'agent'>> & {
  ollama?: Partial<ParleyConfig['ollama']>;
  agent?: Partial<AgentConfig>;
};

export function defaultConfigPath() {
  return path.join(configDir(), 'config.json');
}

export function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

export function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function parseCsv(v: string | undefined): string[] | undefined {
  if (v == null) return undefined;
  const values = v
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
  return values.length ? values : undefined;
}

export function parseProvider(v: string | undefined): ProviderKind | undefined {
  const lower = v?.trim().toLowerCase();
  if (lower === 'gemini' || lower === 'ollama') return lower;
  return undefined;
}

export function parseColorMode(v: string | undefined): ColorMode | undefined {
  const lower = v?.trim().toLowerCase();
  if (lower === 'auto' || lower === 'always' || lower === 'never') return lower;
  return undefined;
}

function parseFunctionCalling(v: string | undefined): FunctionCallingMode | undefined {
  const lower = v?.trim().toLowerCase();
  if (lower === 'auto' || lower === 'on' || lower === 'off') return lower;
  return undefined;
}

function stripUndef<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

/**
 * Narrow a parsed config.json. Fields of the wrong type are dropped with a
 * `[warn]`; unknown keys are ignored.
 */
export function readFileLayer(raw: unknown, source: string): ConfigLayer {
  if (!isRecord(raw)) {
    if (raw !== undefined) console.warn(`[warn] ${source}: expected a JSON object, ignoring file`);
    return {};
  }
  const bad = (key: string, want: string) => console.warn(`[warn] ${source}: "${key}" must be ${want}, ignoring`);

  const str = (obj: Record<string, unknown>, key: string, prefix = ''): string | undefined => {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v;
    bad(prefix + key, 'a string');
    return undefined;
  };
  const num = (obj: Record<string, unknown>, key: string, prefix = ''): number | undefined => {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (typeof v === 'number' && Number.isFinite(v)) return v;
    bad(prefix + key, 'a number');
    return undefined;
  };
  const bool = (obj: Record<string, unknown>, key: string, prefix = ''): boolean | undefined => {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (typeof v === 'boolean') return v;
    bad(prefix + key, 'true or false');
    return undefined;
  };
  const strList = (obj: Record<string, unknown>, key: string, prefix = ''): string[] | undefined => {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (Array.isArray(v) && v.every((x) => typeof x === 'string')) return v;
    bad(prefix + key, 'a list of strings');
    return undefined;
  };
  const oneOf = <T extends string>(
    obj: Record<string, unknown>,
    key: string,
    parse: (v: string | undefined) => T | undefined,
    want: string,
    prefix = ''
  ): T | undefined => {
    const v = obj[key];
    if (v === undefined) return undefined;
    const parsed = typeof v === 'string' ? parse(v) : undefined;
    if (parsed === undefined) bad(prefix + key, want);
    return parsed;
  };

  const layer: ConfigLayer = stripUndef({
    provider: oneOf(raw, 'provider', parseProvider, '"gemini" or "ollama"'),
    model: str(raw, 'model'),
    api_key: str(raw, 'api_key'),
    gemini_endpoint: str(raw, 'gemini_endpoint'),
    system_instruction: str(raw, 'system_instruction'),
    dir: str(raw, 'dir'),
    verbose: bool(raw, 'verbose'),
    color: oneOf(raw, 'color', parseColorMode, '"auto", "always" or "never"'),
    auto_save: bool(raw, 'auto_save'),
    sessions_dir: str(raw, 'sessions_dir'),
    connection_timeout: num(raw, 'connection_timeout'),
  });

  if (isRecord(raw.ollama)) {
    const o = raw.ollama;
    layer.ollama = stripUndef({
      endpoint: str(o, 'endpoint', 'ollama.'),
      function_calling: oneOf(o, 'function_calling', parseFunctionCalling, '"auto", "on" or "off"', 'ollama.'),
    });
  } else if (raw.ollama !== undefined) {
    bad('ollama', 'an object');
  }

  if (isRecord(raw.agent)) {
    const a = raw.agent;
    layer.agent = stripUndef({
      enabled: bool(a, 'enabled', 'agent.'),
      max_iterations: num(a, 'max_iterations', 'agent.'),
      max_read_bytes: num(a, 'max_read_bytes', 'agent.'),
      max_search_results: num(a, 'max_search_results', 'agent.'),
      dry_run: bool(a, 'dry_run', 'agent.'),
      auto_backup: bool(a, 'auto_backup', 'agent.'),
      allow_cwd: bool(a, 'allow_cwd', 'agent.'),
      allowed_paths: strList(a, 'allowed_paths', 'agent.'),
      forbidden_paths: strList(a, 'forbidden_paths', 'agent.'),
    });
  } else if (raw.agent !== undefined) {
    bad('agent', 'an object');
  }

  return layer;
}

export function readEnvLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const provider = env.PARLEY_PROVIDER;
  if (provider && !parseProvider(provider)) {
    console.warn(`[warn] PARLEY_PROVIDER="${provider}" is not a provider (gemini, ollama), ignoring`);
  }
  return stripUndef({
    provider: parseProvider(provider),
    model: env.PARLEY_MODEL || undefined,
    api_key: env.PARLEY_API_KEY || env.GEMINI_API_KEY || undefined,
    gemini_endpoint: env.PARLEY_GEMINI_ENDPOINT || undefined,
    system_instruction: env.PARLEY_SYSTEM_INSTRUCTION,
    verbose: parseBool(env.PARLEY_VERBOSE),
    auto_save: parseBool(env.PARLEY_AUTO_SAVE),
    sessions_dir: env.PARLEY_SESSIONS_DIR || undefined,
    connection_timeout: parseNum(env.PARLEY_CONNECTION_TIMEOUT),
    ollama: stripUndef({
      endpoint: env.PARLEY_OLLAMA_ENDPOINT || normalizeOllamaHost(env.OLLAMA_HOST),
    }),
    agent: stripUndef({
      enabled: parseBool(env.PARLEY_AGENT),
      max_iterations: parseNum(env.PARLEY_MAX_ITERATIONS),
      dry_run: parseBool(env.PARLEY_DRY_RUN),
      max_read_bytes: parseNum(env.PARLEY_MAX_READ_BYTES),
    }),
  });
}

/** OLLAMA_HOST may be a bare `host:port`. */
function normalizeOllamaHost(v: string | undefined): string | undefined {
  if (!v?.trim()) return undefined;
  const t = v.trim();
  return /^https?:\/\//i.test(t) ? t : `http://${t}`;
}

export function mergeLayers(base: ParleyConfig, ...layers: ConfigLayer[]): ParleyConfig {
  let out = base;
  for (const layer of layers) {
    const { ollama, agent, ...top } = layer;
    out = {
      ...out,
      ...stripUndef(top),
      ollama: { ...out.ollama, ...stripUndef(ollama ?? {}) },
      agent: { ...out.agent, ...stripUndef(agent ?? {}) },
    };
  }
  return out;
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(n)));
}

/** Apply per-provider defaults, trim endpoints, clamp numeric knobs, check the working dir. */
export function normalizeConfig(cfg: ParleyConfig): ParleyConfig {
  let dir = path.resolve(cfg.dir);
  if (!fsSync.existsSync(dir)) {
    console.warn(`[warn] configured dir "${cfg.dir}" does not exist, using ${process.cwd()}`);
    dir = process.cwd();
  }
  return {
    ...cfg,
    model: cfg.model.trim() || DEFAULT_MODELS[cfg.provider],
    gemini_endpoint: cfg.gemini_endpoint.replace(/\/+$/, ''),
    ollama: { ...cfg.ollama, endpoint: cfg.ollama.endpoint.replace(/\/+$/, '') },
    dir,
    sessions_dir: path.resolve(cfg.sessions_dir),
    connection_timeout: clamp(cfg.connection_timeout, 1, 600),
    agent: {
      ...cfg.agent,
      max_iterations: clamp(cfg.agent.max_iterations, 1, 50),
      max_read_bytes: clamp(cfg.agent.max_read_bytes, 1024, 16 * 1024 * 1024),
      max_search_results: clamp(cfg.agent.max_search_results, 1, 500),
    },
  };
}

/** defaults < config.json < environment < CLI flags */
export async function loadConfig(opts: {
  configPath?: string;
  cli?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
}): Promise<{ config: ParleyConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();

  let fileRaw: unknown;
  try {
    const raw = await fs.readFile(configPath, 'utf8');
    if (raw.trim().length) fileRaw = JSON.parse(raw);
  } catch (e: unknown) {
    if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) {
      throw new Error(`cannot load config ${configPath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }

  const merged = mergeLayers(
    defaults(),
    readFileLayer(fileRaw, configPath),
    readEnvLayer(opts.env ?? process.env),
    opts.cli ?? {}
  );
  return { config: normalizeConfig(merged), configPath };
}
