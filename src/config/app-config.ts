import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ToolhubError, errorMessage } from '../core/errors.js';
import { LOG_LEVELS, type LogLevel } from '../core/logger.js';
import type { ProviderSettings } from '../providers/provider-config.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']) satisfies z.ZodType<LogLevel>;
const providerIdSchema = z.enum(['ollama', 'openai', 'anthropic', 'deepseek']);

export const builtinKindSchema = z.enum(['memory', 'sqlite', 'file', 'retrieval', 'transcription']);
export type BuiltinKind = z.infer<typeof builtinKindSchema>;

const builtinOptionsSchema = z
  .object({
    /** sqlite database file, `:memory:` allowed. */
    filename: z.string().optional(),
    /** Root directory of the file backend. */
    root: z.string().optional(),
    embeddingModel: z.string().optional(),
    chunkSize: z.number().int().positive().optional(),
    maxEntries: z.number().int().positive().optional(),
    /** Memory entries older than this read as absent. */
    ttlMs: z.number().int().positive().optional(),
  })
  .default({});

export const serverTargetSchema = z.discriminatedUnion('transport', [
  z.object({ transport: z.literal('builtin'), kind: builtinKindSchema, options: builtinOptionsSchema }),
  z.object({
    transport: z.literal('stdio'),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    cwd: z.string().optional(),
  }),
]);

export type ServerTarget = z.infer<typeof serverTargetSchema>;

export const serverConfigSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9_-]+$/, 'server names may only contain letters, digits, _ and -'),
  target: serverTargetSchema,
  /** Key into `serverPrompts` of the prompt configuration. Defaults to the server name. */
  prompt: z.string().optional(),
  enabled: z.boolean().default(true),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

const hostedModelSchema = z.object({
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

const backoffSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), delayMs: z.number().int().nonnegative() }),
  z.object({
    kind: z.literal('exponential'),
    baseDelayMs: z.number().int().nonnegative(),
    factor: z.number().min(1),
    maxDelayMs: z.number().int().nonnegative(),
  }),
]);

export const appConfigSchema = z.object({
  servers: z.array(serverConfigSchema).default([]),
  providers: z
    .object({
      default: providerIdSchema.default('ollama'),
      ollama: z
        .object({
          model: z.string().min(1),
          host: z.string().url().optional(),
          embeddingModel: z.string().optional(),
          temperature: z.number().min(0).max(2).optional(),
        })
        .optional(),
      openai: hostedModelSchema.optional(),
      anthropic: hostedModelSchema.optional(),
      deepseek: hostedModelSchema.optional(),
    })
    .default({}),
  invoker: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      timeoutMs: z.number().int().positive().default(30_000),
      backoff: backoffSchema.default({ kind: 'fixed', delayMs: 1_000 }),
    })
    .default({}),
  session: z
    .object({
      maxToolRounds: z.number().int().min(1).default(8),
      snapshotFile: z.string().default('.toolhub/sessions.json'),
    })
    .default({}),
  handshakeTimeoutMs: z.number().int().positive().default(10_000),
  logLevel: logLevelSchema.default('info'),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

const toolExampleSchema = z.object({ description: z.string(), example: z.string() });

export const promptConfigSchema = z.object({
  defaultSystemPrompt: z.string(),
  serverPrompts: z.record(z.string()).default({}),
  common: z.object({
    toolResponse: z.string(),
    welcome: z.string(),
    maxToolRoundsNotice: z.string(),
    providerUnavailable: z.record(z.string()).default({}),
  }),
  commands: z.record(z.string()).default({}),
  toolExamples: z.record(z.array(toolExampleSchema)).default({}),
});

export type PromptConfig = z.infer<typeof promptConfigSchema>;

export class ConfigError extends ToolhubError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

export function parseConfig<S extends z.ZodTypeAny>(schema: S, raw: unknown, source: string): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${details}`);
  }
  return parsed.data;
}

async function readJson(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(e)}`, e);
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(e)}`, e);
  }
}

export async function loadAppConfig(path: string): Promise<AppConfig> {
  return parseConfig(appConfigSchema, await readJson(path), path);
}

export async function loadPromptConfig(path: string): Promise<PromptConfig> {
  return parseConfig(promptConfigSchema, await readJson(path), path);
}

export type Env = Record<string, string | undefined>;

export interface ConfigPaths {
  config: string;
  prompts: string;
}

export function configPaths(env: Env): ConfigPaths {
  return {
    config: env.TOOLHUB_CONFIG ?? 'config/toolhub.json',
    prompts: env.TOOLHUB_PROMPTS ?? 'config/prompts.json',
  };
}

export function logLevelFromEnv(env: Env, fallback: LogLevel): LogLevel {
  const raw = env.TOOLHUB_LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((l) => l === raw) ?? fallback;
}

/** Merges model settings from the config file with credentials from the environment. */
export function buildProviderSettings(config: AppConfig, env: Env): ProviderSettings {
  const p = config.providers;
  const settings: ProviderSettings = {};
  if (p.ollama) settings.ollama = { ...p.ollama, host: env.OLLAMA_HOST ?? p.ollama.host };
  if (p.openai) settings.openai = { ...p.openai, apiKey: env.OPENAI_API_KEY };
  if (p.anthropic) settings.anthropic = { ...p.anthropic, apiKey: env.ANTHROPIC_API_KEY };
  if (p.deepseek) settings.deepseek = { ...p.deepseek, apiKey: env.DEEPSEEK_API_KEY };
  return settings;
}
