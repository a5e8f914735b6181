#!/usr/bin/env node
import dotenv from 'dotenv';
import { errorMessage } from './core/errors.js';
import { Logger } from './core/logger.js';
import { logLevelFromEnv } from './config/app-config.js';
import { parseServerArgs } from './config/server-args.js';
import { transcriptionFromEnv } from './providers/ai-sdk/ai-sdk-transcription.js';
import { createBuiltinBackend } from './servers/server-factory.js';
import { serveStdio } from './servers/stdio-host.js';

const USAGE = `Usage: toolhub-server <memory|sqlite|file|retrieval|transcription> [options]

Options:
  --filename <path>         sqlite database file (default .toolhub/toolhub.db)
  --root <dir>              root directory of the file backend (default .)
  --embedding-model <name>  embedding model of the retrieval backend
  --chunk-size <n>          words per chunk of the retrieval backend
  --max-entries <n>         capacity of the memory backend
  --ttl-ms <n>              lifetime of memory entries in milliseconds

The transcription backend needs OPENAI_API_KEY.`;

/** Runs one reference backend over stdin/stdout until the client shuts it down. */
async function main(argv: string[]): Promise<number> {
  const args = parseServerArgs(argv);
  if (args.action !== 'serve') {
    if (args.action === 'invalid') process.stderr.write(`toolhub-server: ${args.error}\n`);
    process.stderr.write(USAGE + '\n');
    return args.action === 'help' ? 0 : 2;
  }

  dotenv.config();
  const logger = new Logger(logLevelFromEnv(process.env, 'info'));
  const backend = createBuiltinBackend(args.kind, args.options, {
    ollamaHost: process.env.OLLAMA_HOST,
    transcription: transcriptionFromEnv(process.env),
  });
  logger.info('Serving over stdio', { server: backend.name, tools: backend.tools.map((t) => t.name) });
  await serveStdio(backend, process.stdin, process.stdout, { logger });
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`toolhub-server: ${errorMessage(e)}\n`);
    process.exitCode = 1;
  }
);
