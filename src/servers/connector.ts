import type { JsonObject, ResourceSchema, ServerState, ToolResult, ToolSchema } from '../core/types.js';
import { ConnectionError } from '../core/errors.js';

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * One backend server. Transport problems are thrown as `ConnectionError`;
 * failures the backend reports come back as a failed `ToolResult`. An aborted
 * call rejects with the signal's reason.
 */
export interface ServerConnector {
  readonly name: string;
  readonly state: ServerState;
  initialize(signal?: AbortSignal): Promise<ToolSchema[]>;
  listResources(): Promise<ResourceSchema[]>;
  callTool(name: string, args: JsonObject, opts?: CallOptions): Promise<ToolResult>;
  shutdown(): Promise<void>;
  onStateChange?(listener: StateListener): () => void;
}

export type StateListener = (state: ServerState, detail?: string) => void;

const NEXT: Record<ServerState, readonly ServerState[]> = {
  created: ['initializing', 'closed'],
  initializing: ['ready', 'failed', 'closed'],
  ready: ['failed', 'closed'],
  failed: [],
  closed: [],
};

/** Forward-only lifecycle shared by the connector variants. */
export class ConnectorLifecycle {
  private current: ServerState = 'created';
  private readonly listeners = new Set<StateListener>();

  constructor(private readonly server: string) {}

  get state(): ServerState {
    return this.current;
  }

  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Returns false (and changes nothing) when the move is not allowed. */
  moveTo(next: ServerState, detail?: string): boolean {
    if (!NEXT[this.current].includes(next)) return false;
    this.current = next;
    for (const l of this.listeners) l(next, detail);
    return true;
  }

  beginInitialize(): void {
    if (!this.moveTo('initializing')) {
      throw new ConnectionError(this.server, `cannot initialize a connector in state ${this.current}`);
    }
  }

  assertReady(): void {
    if (this.current !== 'ready') throw new ConnectionError(this.server, `connector is ${this.current}`);
  }
}
