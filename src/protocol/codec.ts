import { isObjectSchema, type ErrorKind, type JsonObject, type JsonSchema, type JsonValue, type ModelOutput, type ToolResult, type ToolSchema } from '../core/types.js';
import {
  protocolMessageSchema,
  toolCallEnvelopeSchema,
  toolResultSchema,
  type ProtocolMessage,
  type ToolCallEnvelope,
} from './messages.js';

export function toolSuccess(result: JsonValue): ToolResult {
  return { ok: true, result };
}

export function toolFailure(kind: ErrorKind, message: string): ToolResult {
  return { ok: false, error: { kind, message } };
}

/** `{"tool": "<name>", "arguments": {...}}` */
export function encodeToolCall(tool: string, args: JsonObject): string {
  const envelope: ToolCallEnvelope = { tool, arguments: args };
  return JSON.stringify(envelope);
}

export function decodeToolCall(value: unknown): ToolCallEnvelope | undefined {
  const parsed = toolCallEnvelopeSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export function encodeToolResult(result: ToolResult): string {
  return JSON.stringify(result);
}

export function decodeToolResult(value: unknown): ToolResult | undefined {
  const parsed = toolResultSchema.safeParse(typeof value === 'string' ? parseJson(value) : value);
  return parsed.success ? parsed.data : undefined;
}

const FENCED_BLOCK_RE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Interprets free-form model text. A reply is a tool call only when some
 * candidate (the whole reply, a fenced block, or the outermost braces) parses
 * into a valid envelope; everything else is plain text.
 */
export function parseModelReply(text: string): ModelOutput {
  const trimmed = text.trim();
  for (const candidate of envelopeCandidates(trimmed)) {
    const envelope = decodeToolCall(parseJson(candidate));
    if (envelope) return { kind: 'tool_call', tool: envelope.tool, arguments: envelope.arguments };
  }
  return { kind: 'text', text };
}

function envelopeCandidates(text: string): string[] {
  const out: string[] = [];
  if (text.startsWith('{')) out.push(text);
  const fenced = FENCED_BLOCK_RE.exec(text)?.[1];
  if (fenced) out.push(fenced.trim());
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first >= 0 && last > first) out.push(text.slice(first, last + 1));
  return out;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function encodeMessage(msg: ProtocolMessage): string {
  return JSON.stringify(msg);
}

export type DecodedMessage = { ok: true; message: ProtocolMessage } | { ok: false; error: string };

export function decodeMessage(line: string): DecodedMessage {
  const raw = parseJson(line);
  if (raw === undefined) return { ok: false, error: 'Malformed JSON' };
  const parsed = protocolMessageSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'Invalid message' };
  }
  return { ok: true, message: parsed.data };
}

/**
 * Plain-text tool description for system prompts, e.g.
 *
 *     Tool: memory_set
 *     Description: Set a value in memory
 *     Arguments:
 *     - key: Key to store (required)
 */
export function describeTool(name: string, tool: Pick<ToolSchema, 'description' | 'inputSchema'>): string {
  const lines = [`Tool: ${name}`, `Description: ${tool.description}`, 'Arguments:'];
  const props = objectProperties(tool.inputSchema);
  const required = new Set(requiredProperties(tool.inputSchema));
  for (const [param, schema] of Object.entries(props)) {
    const desc = schema.description ?? 'No description';
    lines.push(`- ${param}: ${desc}${required.has(param) ? ' (required)' : ''}`);
  }
  return lines.join('\n');
}

function objectProperties(schema: JsonSchema): Record<string, JsonSchema> {
  return isObjectSchema(schema) ? (schema.properties ?? {}) : {};
}

function requiredProperties(schema: JsonSchema): string[] {
  return isObjectSchema(schema) ? (schema.required ?? []) : [];
}
