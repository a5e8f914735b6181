import type { JsonObject, ToolResult, ToolSchema } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { errorMessage, toToolFailure } from '../core/errors.js';
import { raceAbort } from '../core/turn-controller.js';
import { toolFailure, toolSuccess } from '../protocol/codec.js';
import type { ToolBackend, ToolDefinition } from './tool-types.js';

/**
 * Runs the tools of one backend. Shared by the in-process connector and the
 * stdio host so both report failures identically.
 */
export class ToolExecutor {
  private readonly byName = new Map<string, ToolDefinition>();
  private readonly running = new Set<string>();

  constructor(
    private readonly backend: ToolBackend,
    private readonly logger: Logger
  ) {
    for (const t of backend.tools) this.byName.set(t.name, t);
  }

  get schemas(): ToolSchema[] {
    return this.backend.tools.map((t) => ({ name: t.name, description: t.description, inputSchema: t.inputSchema }));
  }

  /** Ids of calls that have started and not yet settled or been abandoned. */
  get inFlight(): string[] {
    return [...this.running];
  }

  /**
   * Rejects with the abort reason when `signal` fires; the record is dropped
   * at that moment even if the tool keeps running.
   */
  async execute(callId: string, name: string, args: JsonObject, signal: AbortSignal): Promise<ToolResult> {
    const tool = this.byName.get(name);
    if (!tool) return toolFailure('ToolNotFound', `Tool not found: ${name}`);

    this.running.add(callId);
    const onAbort = () => this.running.delete(callId);
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      const run = Promise.resolve().then(() => tool.execute(args, { signal, logger: this.logger }));
      const result = await raceAbort(run, signal);
      return toolSuccess(result);
    } catch (e) {
      if (signal.aborted) throw e;
      this.logger.debug('Tool threw', { tool: name, error: errorMessage(e) });
      return { ok: false, error: toToolFailure(e, name) };
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.running.delete(callId);
    }
  }
}
