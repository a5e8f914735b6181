import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  appConfigSchema,
  buildProviderSettings,
  configPaths,
  loadAppConfig,
  loadPromptConfig,
  logLevelFromEnv,
  parseConfig,
} from '../app-config.js';

const shipped = (name: string) => fileURLToPath(new URL(`../../../config/${name}`, import.meta.url));

describe('app configuration', () => {
  it('fills defaults for an empty document', () => {
    expect(parseConfig(appConfigSchema, {}, 'test.json')).toEqual({
      servers: [],
      providers: { default: 'ollama' },
      invoker: { maxAttempts: 3, timeoutMs: 30_000, backoff: { kind: 'fixed', delayMs: 1_000 } },
      session: { maxToolRounds: 8, snapshotFile: '.toolhub/sessions.json' },
      handshakeTimeoutMs: 10_000,
      logLevel: 'info',
    });
  });

  it('defaults stdio arguments and enables servers unless told otherwise', () => {
    const config = parseConfig(appConfigSchema, { servers: [{ name: 'rag', target: { transport: 'stdio', command: 'toolhub-server' } }] }, 'test.json');
    expect(config.servers).toEqual([{ name: 'rag', enabled: true, target: { transport: 'stdio', command: 'toolhub-server', args: [], env: {} } }]);
  });

  it('names the offending path in validation errors', () => {
    const bad = { servers: [{ name: 'my server', target: { transport: 'builtin', kind: 'memory' } }] };
    expect(() => parseConfig(appConfigSchema, bad, 'test.json')).toThrow(
      new ConfigError('Invalid configuration in test.json: servers.0.name: server names may only contain letters, digits, _ and -')
    );
    expect(() => parseConfig(appConfigSchema, { invoker: { maxAttempts: 0 } }, 'test.json')).toThrow(/^Invalid configuration in test\.json: invoker\.maxAttempts: /);
  });

  it('loads the shipped configuration and prompts', async () => {
    const config = await loadAppConfig(shipped('toolhub.json'));
    expect(config.servers.map((s) => [s.name, s.enabled])).toEqual([
      ['memory', true],
      ['sqlite', true],
      ['file', true],
      ['rag', false],
    ]);
    expect(config.providers.default).toBe('ollama');

    const prompts = await loadPromptConfig(shipped('prompts.json'));
    expect(Object.keys(prompts.serverPrompts)).toEqual(['memory', 'sqlite', 'file', 'retrieval']);
    expect(prompts.common.maxToolRoundsNotice).toContain('{max}');
  });

  it('reports unreadable and malformed files', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'toolhub-config-'));
    try {
      const broken = join(dir, 'broken.json');
      await writeFile(broken, '{ "servers": ', 'utf8');
      await expect(loadAppConfig(broken)).rejects.toThrow(`${broken} is not valid JSON: `);
      await expect(loadAppConfig(join(dir, 'missing.json'))).rejects.toThrow(`Cannot read ${join(dir, 'missing.json')}: `);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('environment', () => {
  it('resolves config paths with overrides', () => {
    expect(configPaths({})).toEqual({ config: 'config/toolhub.json', prompts: 'config/prompts.json' });
    expect(configPaths({ TOOLHUB_CONFIG: '/etc/toolhub.json' }).config).toBe('/etc/toolhub.json');
  });

  it('reads the log level case-insensitively and falls back on junk', () => {
    expect(logLevelFromEnv({ TOOLHUB_LOG_LEVEL: 'DEBUG' }, 'info')).toBe('debug');
    expect(logLevelFromEnv({ TOOLHUB_LOG_LEVEL: 'loud' }, 'warn')).toBe('warn');
    expect(logLevelFromEnv({}, 'error')).toBe('error');
  });

  it('takes credentials and the Ollama host from the environment', () => {
    const config = parseConfig(
      appConfigSchema,
      { providers: { ollama: { model: 'llama3.2', host: 'http://127.0.0.1:11434' }, openai: { model: 'gpt-4o-mini' } } },
      'test.json'
    );
    expect(buildProviderSettings(config, { OPENAI_API_KEY: 'test-secret', OLLAMA_HOST: 'http://gpu-box:11434' })).toEqual({
      ollama: { model: 'llama3.2', host: 'http://gpu-box:11434' },
      openai: { model: 'gpt-4o-mini', apiKey: 'test-secret' },
    });
    expect(buildProviderSettings(config, {}).ollama?.host).toBe('http://127.0.0.1:11434');
  });
});
