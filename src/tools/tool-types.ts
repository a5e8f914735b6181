import type { JsonObject, JsonSchema, JsonValue, ResourceSchema } from '../core/types.js';
import type { Logger } from '../core/logger.js';

export interface ToolExecutionContext {
  /** Aborted when the caller cancels or the attempt times out. */
  signal: AbortSignal;
  logger: Logger;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  execute(args: JsonObject, ctx: ToolExecutionContext): Promise<JsonValue> | JsonValue;
}

/**
 * A backend that runs in this process: what `InProcessConnector` wraps and
 * what `serveStdio` exposes to a parent process.
 */
export interface ToolBackend {
  name: string;
  version: string;
  tools: ToolDefinition[];
  resources?: ResourceSchema[];
  close?(): Promise<void> | void;
}
