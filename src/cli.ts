#!/usr/bin/env node
import { createInterface, type Interface } from 'node:readline/promises';
import dotenv from 'dotenv';
import { errorMessage } from './core/errors.js';
import { EventBus } from './core/event-bus.js';
import { Logger } from './core/logger.js';
import type { TurnOutcome } from './core/types.js';
import { ToolCatalog } from './catalog/tool-catalog.js';
import {
  ConfigError,
  buildProviderSettings,
  configPaths,
  loadAppConfig,
  loadPromptConfig,
  logLevelFromEnv,
} from './config/app-config.js';
import { FileConfigStore } from './config/file-config-store.js';
import { ToolInvoker } from './invoker/tool-invoker.js';
import { transcriptionFromEnv } from './providers/ai-sdk/ai-sdk-transcription.js';
import { ModelClient } from './providers/model-client.js';
import { ServerPool } from './servers/server-pool.js';
import { ChatSession } from './session/chat-session.js';

function print(text: string): void {
  process.stdout.write(text + '\n');
}

/** Resolves to null once the input is closed (Ctrl+D). */
type Ask = (question: string) => Promise<string | null>;

function asker(rl: Interface): Ask {
  const closed = new Promise<null>((resolve) => rl.once('close', () => resolve(null)));
  return (question) => Promise.race([closed, rl.question(question)]);
}

/** Offers each other configured provider in turn; true once the user accepts one. */
async function offerSwitch(session: ChatSession, models: ModelClient, ask: Ask): Promise<boolean> {
  for (const alt of models.providers.filter((p) => p !== session.provider)) {
    const answer = await ask(`Switch to ${alt}? (y/n) `);
    if (answer === null) return false;
    if (/^y(es)?$/i.test(answer.trim())) {
      session.switchProvider(alt);
      print(`Switched AI provider to ${alt}.`);
      return true;
    }
  }
  return false;
}

async function checkProvider(session: ChatSession, models: ModelClient, ask: Ask): Promise<void> {
  const availability = await models.checkAvailability(session.provider);
  if (availability.ok) return;
  print(`${session.provider} is not available: ${availability.message}`);
  await offerSwitch(session, models, ask);
}

async function report(outcome: TurnOutcome, session: ChatSession, models: ModelClient, ask: Ask): Promise<void> {
  switch (outcome.kind) {
    case 'text':
      print(outcome.text);
      return;
    case 'cancelled':
      print('Cancelled.');
      return;
    case 'provider_unavailable':
      print(outcome.message);
      if (outcome.guidance) print(outcome.guidance);
      if (await offerSwitch(session, models, ask)) await report(await session.continueTurn(), session, models, ask);
      return;
  }
}

async function main(): Promise<number> {
  dotenv.config();
  const paths = configPaths(process.env);
  const config = await loadAppConfig(paths.config);
  const prompts = await loadPromptConfig(paths.prompts);

  const logger = new Logger(logLevelFromEnv(process.env, config.logLevel));
  const events = new EventBus(logger);
  const models = ModelClient.fromSettings(buildProviderSettings(config, process.env), logger.child('models'));
  if (models.providers.length === 0) throw new ConfigError(`No model provider is configured in ${paths.config}`);

  const catalog = new ToolCatalog();
  const pool = new ServerPool(catalog, {
    logger,
    events,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    deps: {
      ollamaHost: process.env.OLLAMA_HOST ?? config.providers.ollama?.host,
      transcription: transcriptionFromEnv(process.env),
    },
  });
  const invoker = new ToolInvoker({ catalog, policy: config.invoker, logger: logger.child('invoker'), events });
  const session = new ChatSession({
    catalog,
    invoker,
    models,
    prompts,
    servers: pool,
    events,
    logger,
    provider: config.providers.default,
    maxToolRounds: config.session.maxToolRounds,
  });
  const store = new FileConfigStore({ filePath: config.session.snapshotFile });
  const sessionKey = process.env.TOOLHUB_SESSION;

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => {
    if (!session.cancel()) rl.close();
  });
  const ask = asker(rl);

  try {
    const connected = await pool.connectAll(config.servers);
    for (const failed of connected.failed) print(`Server ${failed.server} is unavailable: ${failed.error}`);
    if (sessionKey && (await session.load(store, sessionKey))) {
      print(`Resumed session ${sessionKey} (${session.context.history.length} turns).`);
    }
    print(session.welcome());
    await checkProvider(session, models, ask);

    for (;;) {
      const line = await ask('> ');
      if (line === null) break;
      if (!line.trim()) continue;
      try {
        const reply = await session.handle(line);
        if (reply.kind === 'command') {
          print(reply.output);
          if (reply.exit) break;
          continue;
        }
        await report(reply, session, models, ask);
      } catch (e) {
        print(`Error: ${errorMessage(e)}`);
      }
      if (sessionKey) await session.save(store, sessionKey);
    }
  } finally {
    rl.close();
    await pool.shutdownAll();
    events.close();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`toolhub: ${errorMessage(e)}\n`);
    process.exitCode = 1;
  }
);
