import { describe, it, before, after, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

import {
  DEFAULT_FORBIDDEN_PATHS,
  loadConfig,
  mergeLayers,
  parseBool,
  parseCsv,
  parseNum,
  readEnvLayer,
  readFileLayer,
} from '../src/config.js';

let tmpDir: string;

before(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'parley-config-'));
});

after(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

afterEach(() => {
  mock.restoreAll();
});

function captureWarnings(): () => string[] {
  const warn = mock.method(console, 'warn', () => {});
  return () => warn.mock.calls.map((c) => String(c.arguments[0]));
}

async function writeConfig(name: string, content: string): Promise<string> {
  const file = path.join(tmpDir, name);
  await fs.writeFile(file, content);
  return file;
}

describe('loadConfig: CLI > env > file > defaults', () => {
  it('uses defaults when the file is missing', async () => {
    const configPath = path.join(tmpDir, 'missing.json');
    const { config, configPath: used } = await loadConfig({ configPath, env: {} });
    assert.equal(used, configPath);
    assert.equal(config.provider, 'gemini');
    assert.equal(config.model, 'gemini-2.5-flash');
    assert.equal(config.connection_timeout, 30);
    assert.equal(config.auto_save, false);
    assert.equal(config.agent.enabled, false);
    assert.equal(config.agent.max_iterations, 6);
    assert.equal(config.agent.max_read_bytes, 256 * 1024);
    assert.deepEqual(config.agent.forbidden_paths, DEFAULT_FORBIDDEN_PATHS);
    assert.equal(config.dir, process.cwd());
  });

  it('treats an empty file as no settings', async () => {
    const configPath = await writeConfig('empty.json', '  \n');
    const { config } = await loadConfig({ configPath, env: {} });
    assert.equal(config.provider, 'gemini');
  });

  it('layers file, environment and CLI in that order', async () => {
    const configPath = await writeConfig(
      'layers.json',
      JSON.stringify({
        provider: 'ollama',
        model: 'file-model',
        system_instruction: 'from file',
        agent: { max_iterations: 3, dry_run: true },
        ollama: { function_calling: 'off' },
      })
    );
    const { config } = await loadConfig({
      configPath,
      env: { PARLEY_MODEL: 'env-model', PARLEY_MAX_ITERATIONS: '4', PARLEY_OLLAMA_ENDPOINT: 'http://gpu.test:11434/' },
      cli: { model: 'cli-model', agent: { enabled: true } },
    });
    assert.equal(config.provider, 'ollama');
    assert.equal(config.model, 'cli-model');
    assert.equal(config.system_instruction, 'from file');
    assert.equal(config.agent.max_iterations, 4);
    assert.equal(config.agent.dry_run, true);
    assert.equal(config.agent.enabled, true);
    assert.deepEqual(config.ollama, { endpoint: 'http://gpu.test:11434', function_calling: 'off' });
  });

  it('picks the default model of the chosen provider', async () => {
    const { config } = await loadConfig({
      configPath: path.join(tmpDir, 'missing.json'),
      env: { PARLEY_PROVIDER: 'ollama' },
    });
    assert.equal(config.model, 'llama3.1');
  });

  it('clamps numeric settings and trims endpoint slashes', async () => {
    const { config } = await loadConfig({
      configPath: path.join(tmpDir, 'missing.json'),
      env: {},
      cli: {
        connection_timeout: 0,
        gemini_endpoint: 'https://gemini.test/v1beta//',
        agent: { max_iterations: 500, max_read_bytes: 10, max_search_results: 2.7 },
      },
    });
    assert.equal(config.connection_timeout, 1);
    assert.equal(config.gemini_endpoint, 'https://gemini.test/v1beta');
    assert.equal(config.agent.max_iterations, 50);
    assert.equal(config.agent.max_read_bytes, 1024);
    assert.equal(config.agent.max_search_results, 2);
  });

  it('falls back to the current directory when dir does not exist', async () => {
    const warnings = captureWarnings();
    const missingDir = path.join(tmpDir, 'no-such-dir');
    const { config } = await loadConfig({ configPath: path.join(tmpDir, 'missing.json'), env: {}, cli: { dir: missingDir } });
    assert.equal(config.dir, process.cwd());
    assert.deepEqual(warnings(), [`[warn] configured dir "${missingDir}" does not exist, using ${process.cwd()}`]);
  });

  it('rejects a config file that is not valid JSON', async () => {
    const configPath = await writeConfig('broken.json', '{ "model": ');
    await assert.rejects(loadConfig({ configPath, env: {} }), (e: unknown) => {
      assert.ok(e instanceof Error);
      assert.ok(e.message.startsWith(`cannot load config ${configPath}: `));
      return true;
    });
  });
});

describe('readFileLayer', () => {
  it('drops fields of the wrong type with a warning each', () => {
    const warnings = captureWarnings();
    const layer = readFileLayer(
      {
        provider: 'openai',
        model: 3,
        ollama: 'localhost',
        agent: { max_iterations: 'lots', allowed_paths: ['src', 1], auto_backup: false },
        unknown_key: true,
      },
      'cfg.json'
    );
    assert.deepEqual(layer, { agent: { auto_backup: false } });
    assert.deepEqual(warnings(), [
      '[warn] cfg.json: "provider" must be "gemini" or "ollama", ignoring',
      '[warn] cfg.json: "model" must be a string, ignoring',
      '[warn] cfg.json: "ollama" must be an object, ignoring',
      '[warn] cfg.json: "agent.max_iterations" must be a number, ignoring',
      '[warn] cfg.json: "agent.allowed_paths" must be a list of strings, ignoring',
    ]);
  });

  it('ignores a file that is not a JSON object', () => {
    const warnings = captureWarnings();
    assert.deepEqual(readFileLayer('hello', 'cfg.json'), {});
    assert.deepEqual(warnings(), ['[warn] cfg.json: expected a JSON object, ignoring file']);
  });
});

describe('readEnvLayer', () => {
  it('reads PARLEY_* variables and the provider fallbacks', () => {
    const layer = readEnvLayer({
      PARLEY_PROVIDER: 'Ollama',
      OLLAMA_HOST: 'gpu-box:11434',
      GEMINI_API_KEY: 'test-secret',
      PARLEY_AGENT: 'yes',
      PARLEY_MAX_ITERATIONS: '10',
      PARLEY_VERBOSE: 'maybe',
    });
    assert.deepEqual(layer, {
      provider: 'ollama',
      api_key: 'test-secret',
      ollama: { endpoint: 'http://gpu-box:11434' },
      agent: { enabled: true, max_iterations: 10 },
    });
  });

  it('prefers PARLEY_API_KEY over GEMINI_API_KEY', () => {
    const layer = readEnvLayer({ PARLEY_API_KEY: 'test-secret-a', GEMINI_API_KEY: 'test-secret-b' });
    assert.equal(layer.api_key, 'test-secret-a');
  });

  it('warns about an unknown provider', () => {
    const warnings = captureWarnings();
    assert.equal(readEnvLayer({ PARLEY_PROVIDER: 'openai' }).provider, undefined);
    assert.deepEqual(warnings(), ['[warn] PARLEY_PROVIDER="openai" is not a provider (gemini, ollama), ignoring']);
  });
});

describe('mergeLayers', () => {
  it('merges nested sections key by key and skips undefined values', async () => {
    const { config: base } = await loadConfig({ configPath: path.join(tmpDir, 'missing.json'), env: {} });
    const merged = mergeLayers(base, { agent: { dry_run: true } }, { model: undefined, agent: { max_iterations: 2 } });
    assert.equal(merged.model, base.model);
    assert.equal(merged.agent.dry_run, true);
    assert.equal(merged.agent.max_iterations, 2);
    assert.equal(merged.agent.auto_backup, true);
  });
});

describe('value parsers', () => {
  it('parse booleans, numbers and lists', () => {
    assert.equal(parseBool('ON'), true);
    assert.equal(parseBool('0'), false);
    assert.equal(parseBool('perhaps'), undefined);
    assert.equal(parseNum(' '), undefined);
    assert.equal(parseNum('12.5'), 12.5);
    assert.equal(parseNum('12px'), undefined);
    assert.deepEqual(parseCsv(' a, ,b '), ['a', 'b']);
    assert.equal(parseCsv(' , '), undefined);
  });
});
