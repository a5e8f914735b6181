import { z } from 'zod';
import type { ErrorKind, JsonSchema, JsonValue } from '../core/types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema = z.record(jsonValueSchema);

/**
 * Reads an advertised JSON Schema into the subset tools use. Keywords outside
 * it are dropped, and a malformed nested schema becomes `{}` (any value), so
 * one odd property cannot break prompts or validation for every tool.
 */
export const jsonSchemaSchema: z.ZodType<JsonSchema, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({
      type: z.literal('object'),
      properties: z.record(nestedSchema).optional().catch(undefined),
      required: z.array(z.string()).optional().catch(undefined),
      additionalProperties: z.union([z.boolean(), nestedSchema]).optional(),
      description,
    }),
    z.object({ type: z.literal('array'), items: nestedSchema.optional(), description }),
    z.object({ type: z.literal('string'), enum: z.array(z.string()).optional().catch(undefined), description }),
    z.object({ type: z.enum(['number', 'integer', 'boolean', 'null']), description }),
    z.object({ anyOf: z.array(nestedSchema), description }),
    z.object({ oneOf: z.array(nestedSchema), description }),
    z.object({ description }),
  ])
);

const description = z.string().optional().catch(undefined);
const nestedSchema: z.ZodType<JsonSchema, z.ZodTypeDef, unknown> = z.lazy(() => jsonSchemaSchema.catch({}));

export const errorKindSchema = z.enum([
  'ConnectionError',
  'ToolNotFound',
  'ArgumentError',
  'ToolExecutionError',
  'ProviderUnavailable',
  'Cancelled',
]) satisfies z.ZodType<ErrorKind>;

export const toolResultSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: jsonValueSchema }),
  z.object({ ok: z.literal(false), error: z.object({ kind: errorKindSchema, message: z.string() }) }),
]);

export const toolCallEnvelopeSchema = z.object({
  tool: z.string().min(1),
  arguments: jsonObjectSchema,
});

export type ToolCallEnvelope = z.infer<typeof toolCallEnvelopeSchema>;

export const toolSchemaSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  inputSchema: jsonSchemaSchema.default({ type: 'object', properties: {} }),
});

export const resourceSchemaSchema = z.object({
  pattern: z.string().min(1),
  description: z.string().default(''),
});

const id = z.string().min(1);

/** Connector protocol, one JSON object per line. */
export const protocolMessageSchema = z.discriminatedUnion('type', [
  z.object({ id, type: z.literal('initialize'), client: z.object({ name: z.string(), version: z.string() }) }),
  z.object({
    id,
    type: z.literal('initialize_response'),
    server: z.object({ name: z.string(), version: z.string() }),
    capabilities: z.object({ tools: z.boolean(), resources: z.boolean() }),
  }),
  z.object({ id, type: z.literal('list_tools') }),
  z.object({ id, type: z.literal('list_tools_response'), tools: z.array(toolSchemaSchema) }),
  z.object({ id, type: z.literal('list_resources') }),
  z.object({ id, type: z.literal('list_resources_response'), resources: z.array(resourceSchemaSchema) }),
  z.object({ id, type: z.literal('call_tool'), name: z.string().min(1), arguments: jsonObjectSchema }),
  z.object({ id, type: z.literal('call_tool_response'), result: toolResultSchema }),
  z.object({ id, type: z.literal('cancel'), target: id }),
  z.object({ id, type: z.literal('shutdown') }),
  z.object({ id, type: z.literal('shutdown_response') }),
  z.object({ id, type: z.literal('error'), message: z.string() }),
]);

export type ProtocolMessage = z.infer<typeof protocolMessageSchema>;

export type ProtocolMessageType = ProtocolMessage['type'];

export type ProtocolMessageOf<T extends ProtocolMessageType> = Extract<ProtocolMessage, { type: T }>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A message before the sender assigns its `id`. */
export type ProtocolPayload = DistributiveOmit<ProtocolMessage, 'id'>;
