import { createInterface, type Interface } from 'node:readline';
import type { JsonObject, ResourceSchema, ServerState, ToolResult, ToolSchema } from '../core/types.js';
import { Logger } from '../core/logger.js';
import { CancelledError, ConnectionError, errorMessage } from '../core/errors.js';
import { uuid } from '../utils/uuid.js';
import { decodeMessage, encodeMessage, toolFailure } from '../protocol/codec.js';
import type { ProtocolMessage, ProtocolMessageOf, ProtocolMessageType, ProtocolPayload } from '../protocol/messages.js';
import { ConnectorLifecycle, type CallOptions, type ServerConnector, type StateListener } from './connector.js';
import { spawnTransport, type StdioTarget, type StdioTransport } from './stdio-transport.js';

export const CLIENT_INFO = { name: 'toolhub', version: '0.1.0' } as const;

export interface StdioConnectorOptions {
  logger?: Logger;
  /** Bound for the initialize + list_tools exchange. Default 10 s. */
  handshakeTimeoutMs?: number;
  /** Bound for the shutdown exchange before the transport is torn down. Default 2 s. */
  shutdownTimeoutMs?: number;
}

interface Pending {
  expect: ProtocolMessageType;
  resolve(msg: ProtocolMessage): void;
  reject(e: unknown): void;
}

function isMessageOf<T extends ProtocolMessageType>(msg: ProtocolMessage, type: T): msg is ProtocolMessageOf<T> {
  return msg.type === type;
}

/**
 * Talks to a server over newline-delimited JSON. Requests are matched to
 * replies by id; when the server goes away every pending request fails with
 * `ConnectionError` and the connector moves to `failed`.
 */
export class StdioConnector implements ServerConnector {
  static spawn(name: string, target: StdioTarget, opts: StdioConnectorOptions = {}): StdioConnector {
    return new StdioConnector(name, () => spawnTransport(target), opts);
  }

  private readonly lifecycle: ConnectorLifecycle;
  private readonly logger: Logger;
  private readonly handshakeTimeoutMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly pending = new Map<string, Pending>();
  private transport: StdioTransport | null = null;
  private lines: Interface | null = null;
  private capabilities = { tools: false, resources: false };
  private resources: ResourceSchema[] | null = null;
  private exited = false;

  constructor(
    readonly name: string,
    private readonly openTransport: () => StdioTransport,
    opts: StdioConnectorOptions = {}
  ) {
    this.lifecycle = new ConnectorLifecycle(name);
    this.logger = (opts.logger ?? new Logger()).child(name);
    this.handshakeTimeoutMs = opts.handshakeTimeoutMs ?? 10_000;
    this.shutdownTimeoutMs = opts.shutdownTimeoutMs ?? 2_000;
  }

  get state(): ServerState {
    return this.lifecycle.state;
  }

  /** Requests still waiting for a reply. */
  get pendingCount(): number {
    return this.pending.size;
  }

  onStateChange(listener: StateListener): () => void {
    return this.lifecycle.onChange(listener);
  }

  async initialize(signal?: AbortSignal): Promise<ToolSchema[]> {
    this.lifecycle.beginInitialize();
    const timeout = AbortSignal.timeout(this.handshakeTimeoutMs);
    const bounded = signal ? AbortSignal.any([signal, timeout]) : timeout;
    try {
      this.attach();
      const init = await this.request({ type: 'initialize', client: { ...CLIENT_INFO } }, 'initialize_response', bounded);
      this.capabilities = init.capabilities;
      this.logger.debug('Handshake complete', { server: init.server, capabilities: init.capabilities });
      const tools = init.capabilities.tools
        ? (await this.request({ type: 'list_tools' }, 'list_tools_response', bounded)).tools
        : [];
      this.lifecycle.moveTo('ready');
      return tools;
    } catch (e) {
      const err = signal?.aborted
        ? new CancelledError(`initialize ${this.name}`)
        : timeout.aborted
          ? new ConnectionError(this.name, `handshake timed out after ${this.handshakeTimeoutMs} ms`)
          : e instanceof ConnectionError
            ? e
            : new ConnectionError(this.name, errorMessage(e), e);
      this.lifecycle.moveTo('failed', err.message);
      this.release('initialize failed');
      throw err;
    }
  }

  async listResources(): Promise<ResourceSchema[]> {
    this.lifecycle.assertReady();
    if (!this.capabilities.resources) return [];
    this.resources ??= (await this.request({ type: 'list_resources' }, 'list_resources_response')).resources;
    return [...this.resources];
  }

  async callTool(name: string, args: JsonObject, opts: CallOptions = {}): Promise<ToolResult> {
    this.lifecycle.assertReady();
    const reply = await this.request({ type: 'call_tool', name, arguments: args }, 'call_tool_response', opts.signal);
    return reply.result;
  }

  async shutdown(): Promise<void> {
    if (this.state === 'closed') return;
    if (this.state === 'ready' && !this.exited) {
      try {
        await this.request({ type: 'shutdown' }, 'shutdown_response', AbortSignal.timeout(this.shutdownTimeoutMs));
      } catch (e) {
        this.logger.debug('Shutdown exchange did not complete', { error: errorMessage(e) });
      }
    }
    this.lifecycle.moveTo('closed');
    this.release('connector closed');
  }

  private attach(): void {
    const transport = this.openTransport();
    this.transport = transport;
    this.lines = createInterface({ input: transport.input, crlfDelay: Infinity });
    this.lines.on('line', (line) => this.onLine(line));
    transport.onExit((detail) => this.onExit(detail));
    transport.output.on('error', (e) => this.onExit(`write failed: ${e.message}`));
  }

  private request<T extends ProtocolMessageType>(
    payload: ProtocolPayload,
    expect: T,
    signal?: AbortSignal
  ): Promise<ProtocolMessageOf<T>> {
    const transport = this.transport;
    if (!transport || this.exited) return Promise.reject(new ConnectionError(this.name, 'process is not running'));
    if (signal?.aborted) return Promise.reject(signal.reason);

    const id = uuid();
    return new Promise<ProtocolMessageOf<T>>((resolve, reject) => {
      const onAbort = () => {
        if (!this.pending.delete(id)) return;
        if (payload.type === 'call_tool') this.send({ type: 'cancel', target: id });
        reject(signal?.reason);
      };
      const settle = () => signal?.removeEventListener('abort', onAbort);

      this.pending.set(id, {
        expect,
        resolve: (msg) => {
          settle();
          if (isMessageOf(msg, expect)) resolve(msg);
          else reject(new ConnectionError(this.name, `expected ${expect}, got ${msg.type}`));
        },
        reject: (e) => {
          settle();
          reject(e);
        },
      });
      signal?.addEventListener('abort', onAbort, { once: true });
      this.send({ ...payload, id });
    });
  }

  private send(msg: ProtocolPayload & { id?: string }): void {
    const full: ProtocolMessage = { ...msg, id: msg.id ?? uuid() };
    this.transport?.output.write(encodeMessage(full) + '\n');
  }

  private onLine(line: string): void {
    if (!line.trim()) return;
    const decoded = decodeMessage(line);
    if (!decoded.ok) {
      this.logger.warn('Ignoring malformed line from server', { error: decoded.error });
      return;
    }
    const msg = decoded.message;
    const waiter = this.pending.get(msg.id);
    if (!waiter) {
      this.logger.debug('Reply for unknown request', { id: msg.id, type: msg.type });
      return;
    }
    this.pending.delete(msg.id);
    if (msg.type !== 'error') {
      waiter.resolve(msg);
    } else if (waiter.expect === 'call_tool_response') {
      waiter.resolve({ id: msg.id, type: 'call_tool_response', result: toolFailure('ToolExecutionError', msg.message) });
    } else {
      waiter.reject(new ConnectionError(this.name, `server error: ${msg.message}`));
    }
  }

  private onExit(detail: string): void {
    if (this.exited) return;
    this.exited = true;
    if (this.state !== 'closed') this.logger.warn('Server process exited', { detail });
    this.lifecycle.moveTo('failed', detail);
    this.failPending(`process exited (${detail})`);
  }

  private release(reason: string): void {
    this.failPending(reason);
    this.lines?.close();
    this.lines = null;
    this.transport?.dispose();
    this.transport = null;
  }

  private failPending(reason: string): void {
    const waiters = [...this.pending.values()];
    this.pending.clear();
    for (const w of waiters) w.reject(new ConnectionError(this.name, reason));
  }
}
