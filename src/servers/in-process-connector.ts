import type { JsonObject, ResourceSchema, ServerState, ToolResult, ToolSchema } from '../core/types.js';
import { Logger } from '../core/logger.js';
import { CancelledError, ConnectionError, errorMessage } from '../core/errors.js';
import { uuid } from '../utils/uuid.js';
import { ToolExecutor } from '../tools/tool-executor.js';
import type { ToolBackend } from '../tools/tool-types.js';
import { ConnectorLifecycle, type CallOptions, type ServerConnector, type StateListener } from './connector.js';

export interface InProcessConnectorOptions {
  logger?: Logger;
}

export class InProcessConnector implements ServerConnector {
  private readonly lifecycle: ConnectorLifecycle;
  private readonly executor: ToolExecutor;
  private readonly logger: Logger;
  private released = false;

  constructor(
    readonly name: string,
    private readonly backend: ToolBackend,
    opts: InProcessConnectorOptions = {}
  ) {
    this.lifecycle = new ConnectorLifecycle(name);
    this.logger = (opts.logger ?? new Logger()).child(name);
    this.executor = new ToolExecutor(backend, this.logger);
  }

  get state(): ServerState {
    return this.lifecycle.state;
  }

  /** Calls that have not settled yet; empties as soon as a call is cancelled. */
  get inFlight(): string[] {
    return this.executor.inFlight;
  }

  onStateChange(listener: StateListener): () => void {
    return this.lifecycle.onChange(listener);
  }

  async initialize(signal?: AbortSignal): Promise<ToolSchema[]> {
    this.lifecycle.beginInitialize();
    if (signal?.aborted) {
      this.lifecycle.moveTo('failed', 'initialize aborted');
      throw new CancelledError(`initialize ${this.name}`);
    }
    this.lifecycle.moveTo('ready');
    this.logger.debug('Initialized', { tools: this.backend.tools.length });
    return this.executor.schemas;
  }

  async listResources(): Promise<ResourceSchema[]> {
    this.lifecycle.assertReady();
    return [...(this.backend.resources ?? [])];
  }

  async callTool(name: string, args: JsonObject, opts: CallOptions = {}): Promise<ToolResult> {
    this.lifecycle.assertReady();
    const signal = opts.signal ?? new AbortController().signal;
    return this.executor.execute(uuid(), name, args, signal);
  }

  async shutdown(): Promise<void> {
    this.lifecycle.moveTo('closed');
    if (this.released) return;
    this.released = true;
    try {
      await this.backend.close?.();
    } catch (e) {
      throw new ConnectionError(this.name, `shutdown failed: ${errorMessage(e)}`, e);
    }
  }
}
