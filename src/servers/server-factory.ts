import { resolve } from 'node:path';
import type { Logger } from '../core/logger.js';
import type { BuiltinKind, ServerConfig } from '../config/app-config.js';
import { ConfigError } from '../config/app-config.js';
import type { EmbeddingProvider } from '../retrieval/embedding.js';
import { OllamaEmbeddingProvider } from '../providers/ollama/ollama-embeddings.js';
import { createFileBackend } from '../tools/fs-tools.js';
import { createMemoryBackend } from '../tools/memory-tools.js';
import { createRetrievalBackend } from '../tools/retrieval-tools.js';
import { createSqliteBackend } from '../tools/sqlite-database.js';
import { createTranscriptionBackend, type TranscriptionPort } from '../tools/transcription-tools.js';
import type { ToolBackend } from '../tools/tool-types.js';
import type { ServerConnector } from './connector.js';
import { InProcessConnector } from './in-process-connector.js';
import { StdioConnector } from './stdio-connector.js';

export interface BuiltinOptions {
  filename?: string;
  root?: string;
  embeddingModel?: string;
  chunkSize?: number;
  maxEntries?: number;
  ttlMs?: number;
}

/** Collaborators the reference backends cannot build from configuration alone. */
export interface BackendDeps {
  embedder?: EmbeddingProvider;
  ollamaHost?: string;
  transcription?: TranscriptionPort;
}

export const DEFAULT_SQLITE_FILE = '.toolhub/toolhub.db';

export function createBuiltinBackend(kind: BuiltinKind, options: BuiltinOptions = {}, deps: BackendDeps = {}): ToolBackend {
  switch (kind) {
    case 'memory':
      return createMemoryBackend({ maxEntries: options.maxEntries, ttlMs: options.ttlMs });
    case 'sqlite':
      return createSqliteBackend(options.filename ?? DEFAULT_SQLITE_FILE);
    case 'file':
      return createFileBackend(resolve(options.root ?? '.'));
    case 'retrieval': {
      const embedder =
        deps.embedder ?? new OllamaEmbeddingProvider({ host: deps.ollamaHost, embeddingModel: options.embeddingModel });
      return createRetrievalBackend(embedder, { chunkSize: options.chunkSize });
    }
    case 'transcription':
      if (!deps.transcription) throw new ConfigError('The transcription backend needs a transcription engine from the host application');
      return createTranscriptionBackend(deps.transcription);
  }
}

export interface ConnectorFactoryOptions {
  logger?: Logger;
  handshakeTimeoutMs?: number;
  deps?: BackendDeps;
}

export function createConnector(server: ServerConfig, opts: ConnectorFactoryOptions = {}): ServerConnector {
  const target = server.target;
  if (target.transport === 'builtin') {
    const backend = createBuiltinBackend(target.kind, target.options, opts.deps);
    return new InProcessConnector(server.name, backend, { logger: opts.logger });
  }
  return StdioConnector.spawn(
    server.name,
    { command: target.command, args: target.args, env: target.env, cwd: target.cwd },
    { logger: opts.logger, handshakeTimeoutMs: opts.handshakeTimeoutMs }
  );
}
