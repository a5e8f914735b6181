export * from './core/types.js';
export * from './core/errors.js';
export { Logger, LOG_LEVELS, type LogLevel, type LogSink } from './core/logger.js';
export { EventBus, type EventHook } from './core/event-bus.js';
export { TurnController, raceAbort } from './core/turn-controller.js';

export {
  toolSuccess,
  toolFailure,
  encodeToolCall,
  decodeToolCall,
  encodeToolResult,
  decodeToolResult,
  parseModelReply,
  encodeMessage,
  decodeMessage,
  describeTool,
} from './protocol/codec.js';
export type { ProtocolMessage, ProtocolMessageType } from './protocol/messages.js';

export { ToolCatalog, type ResolvedTool, type ServerSummary } from './catalog/tool-catalog.js';
export {
  ToolInvoker,
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  type BackoffPolicy,
  type RetryPolicy,
  type ToolInvokerOptions,
} from './invoker/tool-invoker.js';

export type { ServerConnector, CallOptions } from './servers/connector.js';
export { InProcessConnector } from './servers/in-process-connector.js';
export { StdioConnector } from './servers/stdio-connector.js';
export { spawnTransport, streamTransport, type StdioTarget, type StdioTransport } from './servers/stdio-transport.js';
export { serveStdio } from './servers/stdio-host.js';
export { ServerPool, type ConnectReport } from './servers/server-pool.js';
export { createBuiltinBackend, createConnector, type BackendDeps } from './servers/server-factory.js';

export type { ToolDefinition, ToolBackend, ToolExecutionContext } from './tools/tool-types.js';
export { validateArguments, jsonSchemaToZod } from './tools/schema-validation.js';
export { createMemoryTools, createMemoryBackend } from './tools/memory-tools.js';
export { createDatabaseTools, type DatabasePort } from './tools/db-tools.js';
export { SqliteDatabase, createSqliteBackend } from './tools/sqlite-database.js';
export { createFsTools, createFileBackend } from './tools/fs-tools.js';
export { createRetrievalTools, createRetrievalBackend } from './tools/retrieval-tools.js';
export { createTranscriptionTools, createTranscriptionBackend, type TranscriptionPort } from './tools/transcription-tools.js';

export { NodeFsWorkspace } from './workspaces/node-fs-workspace.js';
export type { WorkspacePort } from './workspaces/workspace.js';

export type { RetrieverPort, RetrievedChunk } from './retrieval/retriever.js';
export type { EmbeddingProvider } from './retrieval/embedding.js';
export { SimpleVectorIndex } from './retrieval/simple-vector-index.js';
export { splitIntoChunks } from './retrieval/chunking.js';

export type { ModelBackend, ModelRequest, AvailabilityResult } from './providers/backend.js';
export { ModelClient } from './providers/model-client.js';
export { OllamaBackend } from './providers/ollama/ollama-backend.js';
export { OllamaEmbeddingProvider } from './providers/ollama/ollama-embeddings.js';
export { AiSdkBackend, createHostedModel } from './providers/ai-sdk/ai-sdk-backend.js';
export { AiSdkTranscription, transcriptionFromEnv } from './providers/ai-sdk/ai-sdk-transcription.js';
export type { ProviderSettings } from './providers/provider-config.js';

export { ConversationContext, contextSnapshotSchema, type ContextSnapshot } from './session/conversation-context.js';
export { ChatSession, type ChatSessionOptions, type SessionReply, type CommandResult } from './session/chat-session.js';

export {
  appConfigSchema,
  promptConfigSchema,
  loadAppConfig,
  loadPromptConfig,
  buildProviderSettings,
  ConfigError,
  type AppConfig,
  type PromptConfig,
  type ServerConfig,
} from './config/app-config.js';
export { MemoryConfigStore, type ConfigStore } from './config/config-store.js';
export { FileConfigStore } from './config/file-config-store.js';
export { parseServerArgs, type ServerArgs } from './config/server-args.js';
