export type ProviderId = 'ollama' | 'openai' | 'anthropic' | 'deepseek';

export const PROVIDER_IDS: readonly ProviderId[] = ['ollama', 'openai', 'anthropic', 'deepseek'];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonSchema =
  | { type: 'object'; properties?: Record<string, JsonSchema>; required?: string[]; additionalProperties?: boolean | JsonSchema; description?: string }
  | { type: 'array'; items?: JsonSchema; description?: string }
  | { type: 'string'; enum?: string[]; description?: string }
  | { type: 'number'; description?: string }
  | { type: 'integer'; description?: string }
  | { type: 'boolean'; description?: string }
  | { type: 'null'; description?: string }
  | { anyOf: JsonSchema[]; description?: string }
  | { oneOf: JsonSchema[]; description?: string }
  | { description?: string };

export type ObjectSchema = Extract<JsonSchema, { type: 'object' }>;

export function isObjectSchema(schema: JsonSchema): schema is ObjectSchema {
  return 'type' in schema && schema.type === 'object';
}

export type ErrorKind =
  | 'ConnectionError'
  | 'ToolNotFound'
  | 'ArgumentError'
  | 'ToolExecutionError'
  | 'ProviderUnavailable'
  | 'Cancelled';

export interface ToolFailure {
  kind: ErrorKind;
  message: string;
}

export type ToolResult = { ok: true; result: JsonValue } | { ok: false; error: ToolFailure };

/** What a server advertises for one of its tools. */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

export interface ToolDescriptor extends ToolSchema {
  /** Catalog-unique name presented to the model. */
  readonly qualifiedName: string;
  /** Owning server (non-owning back-reference by name). */
  readonly server: string;
}

export interface ResourceSchema {
  pattern: string;
  description: string;
}

export interface ResourceDescriptor extends ResourceSchema {
  readonly server: string;
}

export interface ToolCallRequest {
  tool: string;
  arguments: JsonObject;
  correlationId: string;
}

export interface InvocationRecord {
  correlationId: string;
  tool: string;
  server?: string;
  attempts: number;
  result: ToolResult;
  startedAt: number;
  finishedAt: number;
}

export type ServerState = 'created' | 'initializing' | 'ready' | 'closed' | 'failed';

export type TurnRole = 'user' | 'assistant' | 'tool';

export interface Turn {
  role: TurnRole;
  content: string;
  toolName?: string;
  correlationId?: string;
  at: number;
}

export interface PendingToolCall {
  tool: string;
  arguments: JsonObject;
  correlationId: string;
}

export type ModelOutput =
  | { kind: 'text'; text: string }
  | { kind: 'tool_call'; tool: string; arguments: JsonObject };

export type SessionState =
  | 'AwaitingInput'
  | 'ModelThinking'
  | 'RespondingText'
  | 'ToolPending'
  | 'ToolExecuting'
  | 'ToolFailed'
  | 'ContextUpdated';

type SessionEventCore =
  | { type: 'turn_start'; input: string; provider: ProviderId; at: number }
  | { type: 'status'; state: SessionState; detail?: string; at: number }
  | { type: 'model_output'; output: ModelOutput; provider: ProviderId; at: number }
  | { type: 'tool_call'; request: ToolCallRequest; server?: string; at: number }
  | { type: 'tool_attempt'; correlationId: string; attempt: number; failure?: ToolFailure; at: number }
  | { type: 'tool_result'; record: InvocationRecord; at: number }
  | { type: 'provider_switch'; from: ProviderId; to: ProviderId; at: number }
  | { type: 'server_state'; server: string; state: ServerState; detail?: string; at: number }
  | { type: 'error'; error: string; kind?: ErrorKind; at: number }
  | { type: 'turn_finish'; outcome: TurnOutcome['kind']; at: number };

export type SessionEvent = SessionEventCore & { sessionId?: string };

export type TurnOutcome =
  | { kind: 'text'; text: string }
  | { kind: 'cancelled'; detail: string }
  | { kind: 'provider_unavailable'; provider: ProviderId; message: string; guidance: string };
