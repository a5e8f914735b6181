import { z } from 'zod';
import type { PendingToolCall, ProviderId, ToolResult, Turn } from '../core/types.js';
import { ToolhubError } from '../core/errors.js';
import { encodeToolCall, encodeToolResult } from '../protocol/codec.js';
import { jsonObjectSchema } from '../protocol/messages.js';

export const SNAPSHOT_VERSION = 1;

const providerIdSchema = z.enum(['ollama', 'openai', 'anthropic', 'deepseek']) satisfies z.ZodType<ProviderId>;

const pendingSchema = z.object({
  tool: z.string().min(1),
  arguments: jsonObjectSchema,
  correlationId: z.string().min(1),
});

const turnSchema = z.object({
  role: z.enum(['user', 'assistant', 'tool']),
  content: z.string(),
  toolName: z.string().optional(),
  correlationId: z.string().optional(),
  at: z.number(),
});

export const contextSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  provider: providerIdSchema,
  turns: z.array(turnSchema),
  pending: pendingSchema.nullable(),
});

export type ContextSnapshot = z.infer<typeof contextSnapshotSchema>;

/**
 * Ordered conversation turns plus the single tool call awaiting its result.
 * Turns are only ever appended; switching provider leaves them untouched.
 */
export class ConversationContext {
  private turns: Turn[] = [];
  private pendingCall: PendingToolCall | null = null;

  constructor(
    private activeProvider: ProviderId,
    private readonly now: () => number = Date.now
  ) {}

  get provider(): ProviderId {
    return this.activeProvider;
  }

  /** Returns the provider that was active before. */
  setProvider(provider: ProviderId): ProviderId {
    const previous = this.activeProvider;
    this.activeProvider = provider;
    return previous;
  }

  get history(): readonly Turn[] {
    return this.turns;
  }

  get pending(): PendingToolCall | null {
    return this.pendingCall;
  }

  get lastTurn(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }

  appendUser(content: string): void {
    this.turns.push({ role: 'user', content, at: this.now() });
  }

  appendAssistant(content: string): void {
    this.turns.push({ role: 'assistant', content, at: this.now() });
  }

  /** Records the model's tool call as an assistant turn and marks it pending. */
  beginToolCall(call: PendingToolCall): void {
    if (this.pendingCall) {
      throw new ToolhubError(`Tool call ${this.pendingCall.correlationId} is still pending`);
    }
    this.turns.push({
      role: 'assistant',
      content: encodeToolCall(call.tool, call.arguments),
      toolName: call.tool,
      correlationId: call.correlationId,
      at: this.now(),
    });
    this.pendingCall = { tool: call.tool, arguments: call.arguments, correlationId: call.correlationId };
  }

  /** Appends the tool turn for the pending call and clears it. */
  completeToolCall(correlationId: string, result: ToolResult): void {
    const call = this.pendingCall;
    if (!call || call.correlationId !== correlationId) {
      throw new ToolhubError(`No pending tool call with id ${correlationId}`);
    }
    this.turns.push({ role: 'tool', content: encodeToolResult(result), toolName: call.tool, correlationId, at: this.now() });
    this.pendingCall = null;
  }

  clear(): void {
    this.turns = [];
    this.pendingCall = null;
  }

  snapshot(): ContextSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      provider: this.activeProvider,
      turns: this.turns.map((t) => ({ ...t })),
      pending: this.pendingCall ? { ...this.pendingCall } : null,
    };
  }

  /** Replaces the whole state; throws without touching it when the snapshot is invalid. */
  restore(snapshot: unknown): void {
    const parsed = contextSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ToolhubError(`Invalid context snapshot: ${issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown error'}`);
    }
    this.activeProvider = parsed.data.provider;
    this.turns = parsed.data.turns;
    this.pendingCall = parsed.data.pending;
  }

  static fromSnapshot(snapshot: unknown, now?: () => number): ConversationContext {
    const ctx = new ConversationContext('ollama', now);
    ctx.restore(snapshot);
    return ctx;
  }
}
