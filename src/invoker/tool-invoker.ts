import { setTimeout as delay } from 'node:timers/promises';
import type { InvocationRecord, ToolCallRequest, ToolFailure, ToolResult } from '../core/types.js';
import { CancelledError, ConnectionError, toToolFailure } from '../core/errors.js';
import type { EventBus } from '../core/event-bus.js';
import type { Logger } from '../core/logger.js';
import type { ResolvedTool, ToolCatalog } from '../catalog/tool-catalog.js';
import { validateArguments } from '../tools/schema-validation.js';

export type BackoffPolicy =
  | { kind: 'fixed'; delayMs: number }
  | { kind: 'exponential'; baseDelayMs: number; factor: number; maxDelayMs: number };

export interface RetryPolicy {
  maxAttempts: number;
  /** Bound for each attempt, not for the whole invocation. */
  timeoutMs: number;
  backoff: BackoffPolicy;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  timeoutMs: 30_000,
  backoff: { kind: 'fixed', delayMs: 1_000 },
};

/** Delay before the next attempt, after `failedAttempts` failures (1-based). */
export function backoffDelay(policy: BackoffPolicy, failedAttempts: number): number {
  if (policy.kind === 'fixed') return policy.delayMs;
  const raw = policy.baseDelayMs * policy.factor ** Math.max(0, failedAttempts - 1);
  return Math.min(raw, policy.maxDelayMs);
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface ToolInvokerOptions {
  catalog: ToolCatalog;
  policy?: Partial<RetryPolicy>;
  logger?: Logger;
  events?: EventBus;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Resolves, validates and runs one tool call. Only `ConnectionError`s and
 * attempt timeouts are retried; everything else is final on first sight.
 * Never throws: every outcome is a record carrying a `ToolResult`.
 */
export class ToolInvoker {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(private readonly opts: ToolInvokerOptions) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...opts.policy };
    this.sleep = opts.sleep ?? abortableSleep;
    this.now = opts.now ?? Date.now;
  }

  async invoke(request: ToolCallRequest, policy?: Partial<RetryPolicy>, signal?: AbortSignal): Promise<InvocationRecord> {
    const effective: RetryPolicy = { ...this.policy, ...policy };
    const maxAttempts = Math.max(1, effective.maxAttempts);
    const startedAt = this.now();
    const cancelled = (): ToolResult => ({ ok: false, error: new CancelledError(`tool ${request.tool}`).toFailure() });
    const finish = (tool: string, result: ToolResult, attempts: number, server?: string): InvocationRecord => {
      const record: InvocationRecord = { correlationId: request.correlationId, tool, server, attempts, result, startedAt, finishedAt: this.now() };
      this.opts.events?.emit({ type: 'tool_result', record, at: record.finishedAt });
      if (!result.ok) this.opts.logger?.debug('Tool call failed', { tool, attempts, error: result.error });
      return record;
    };

    if (signal?.aborted) return finish(request.tool, cancelled(), 0);

    let resolved: ResolvedTool;
    try {
      resolved = this.opts.catalog.resolve(request.tool);
    } catch (e) {
      return finish(request.tool, { ok: false, error: toToolFailure(e, request.tool) }, 0);
    }
    const { descriptor, connector } = resolved;
    const tool = descriptor.qualifiedName;
    try {
      validateArguments(tool, descriptor.inputSchema, request.arguments);
    } catch (e) {
      return finish(tool, { ok: false, error: toToolFailure(e, tool) }, 0, descriptor.server);
    }

    let attempts = 0;
    let lastFailure: ToolFailure = { kind: 'ConnectionError', message: 'no attempt made' };
    while (attempts < maxAttempts) {
      attempts++;
      const timeout = AbortSignal.timeout(effective.timeoutMs);
      const attemptSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;
      try {
        const result = await connector.callTool(descriptor.name, request.arguments, { signal: attemptSignal });
        this.emitAttempt(request.correlationId, attempts, result.ok ? undefined : result.error);
        if (result.ok || result.error.kind !== 'ConnectionError') return finish(tool, result, attempts, descriptor.server);
        lastFailure = result.error;
      } catch (e) {
        if (signal?.aborted) return finish(tool, cancelled(), attempts, descriptor.server);
        if (timeout.aborted) {
          lastFailure = { kind: 'ConnectionError', message: `attempt ${attempts} timed out after ${effective.timeoutMs} ms` };
        } else if (e instanceof ConnectionError) {
          lastFailure = e.toFailure();
        } else {
          const failure = toToolFailure(e, tool);
          this.emitAttempt(request.correlationId, attempts, failure);
          return finish(tool, { ok: false, error: failure }, attempts, descriptor.server);
        }
        this.emitAttempt(request.correlationId, attempts, lastFailure);
      }

      this.opts.logger?.warn('Tool attempt failed', { tool, attempt: attempts, maxAttempts, error: lastFailure.message });
      if (attempts >= maxAttempts) break;
      try {
        await this.sleep(backoffDelay(effective.backoff, attempts), signal);
      } catch (e) {
        if (signal?.aborted) return finish(tool, cancelled(), attempts, descriptor.server);
        throw e;
      }
    }

    return finish(
      tool,
      { ok: false, error: { kind: 'ConnectionError', message: `${tool} failed after ${attempts} attempts: ${lastFailure.message}` } },
      attempts,
      descriptor.server
    );
  }

  private emitAttempt(correlationId: string, attempt: number, failure?: ToolFailure): void {
    this.opts.events?.emit({ type: 'tool_attempt', correlationId, attempt, failure, at: this.now() });
  }
}
