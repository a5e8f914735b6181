import type { EventBus } from '../core/event-bus.js';
import { Logger } from '../core/logger.js';
import { ToolhubError, errorMessage } from '../core/errors.js';
import type { ToolCatalog } from '../catalog/tool-catalog.js';
import type { ServerConfig } from '../config/app-config.js';
import type { ServerConnector } from './connector.js';
import { createConnector, type ConnectorFactoryOptions } from './server-factory.js';

export type ConnectorFactory = (server: ServerConfig, opts: ConnectorFactoryOptions) => ServerConnector;

export interface ConnectReport {
  connected: string[];
  failed: Array<{ server: string; error: string }>;
}

export interface ServerPoolOptions extends ConnectorFactoryOptions {
  events?: EventBus;
  factory?: ConnectorFactory;
}

/**
 * Brings servers up in configuration order and registers what they advertise.
 * A server that fails its handshake is logged and left out; the rest carry on.
 * One that fails later is disconnected.
 */
export class ServerPool {
  private readonly connectors = new Map<string, ServerConnector>();
  private readonly promptKeys = new Map<string, string>();
  private readonly unwatch = new Map<string, () => void>();
  private readonly logger: Logger;

  constructor(
    private readonly catalog: ToolCatalog,
    private readonly opts: ServerPoolOptions = {}
  ) {
    this.logger = (opts.logger ?? new Logger()).child('servers');
  }

  async connectAll(servers: readonly ServerConfig[], signal?: AbortSignal): Promise<ConnectReport> {
    const report: ConnectReport = { connected: [], failed: [] };
    for (const server of servers) {
      if (!server.enabled) {
        this.logger.debug('Skipping disabled server', { server: server.name });
        continue;
      }
      try {
        const factory = this.opts.factory ?? createConnector;
        await this.connect(factory(server, this.opts), signal, server.prompt ?? server.name);
        report.connected.push(server.name);
      } catch (e) {
        report.failed.push({ server: server.name, error: errorMessage(e) });
      }
    }
    return report;
  }

  /** Initializes and registers one connector; on failure it is shut down and the error rethrown. */
  async connect(connector: ServerConnector, signal?: AbortSignal, promptKey: string = connector.name): Promise<void> {
    const name = connector.name;
    if (this.connectors.has(name)) throw new ToolhubError(`Server ${name} is already connected`);
    const unwatch = connector.onStateChange?.((state, detail) => {
      this.opts.events?.emit({ type: 'server_state', server: name, state, detail, at: Date.now() });
      if (state === 'failed') this.serverFailed(connector, detail);
    });
    try {
      const tools = await connector.initialize(signal);
      const resources = await connector.listResources();
      const added = this.catalog.register(connector, tools, resources);
      this.connectors.set(name, connector);
      this.promptKeys.set(name, promptKey);
      if (unwatch) this.unwatch.set(name, unwatch);
      this.logger.info('Server ready', { server: name, tools: added.map((d) => d.qualifiedName) });
    } catch (e) {
      unwatch?.();
      this.logger.error('Server failed to start', { server: name, error: errorMessage(e) });
      await connector.shutdown().catch((err: unknown) => {
        this.logger.warn('Cleanup after failed start did not complete', { server: name, error: errorMessage(err) });
      });
      throw e;
    }
  }

  async disconnect(name: string): Promise<void> {
    const connector = this.connectors.get(name);
    if (!connector) return;
    this.connectors.delete(name);
    this.promptKeys.delete(name);
    this.unwatch.get(name)?.();
    this.unwatch.delete(name);
    this.catalog.deregister(name);
    await connector.shutdown();
    this.logger.info('Server disconnected', { server: name });
  }

  /** A connected server that dies takes its tools out of the catalog with it. */
  private serverFailed(connector: ServerConnector, detail?: string): void {
    const name = connector.name;
    this.logger.warn('Server failed', { server: name, detail });
    if (this.connectors.get(name) !== connector) return;
    this.disconnect(name).catch((err: unknown) => {
      this.logger.warn('Cleanup after server failure did not complete', { server: name, error: errorMessage(err) });
    });
  }

  async shutdownAll(): Promise<void> {
    const names = [...this.connectors.keys()].reverse();
    const results = await Promise.allSettled(names.map((n) => this.disconnect(n)));
    results.forEach((r, i) => {
      if (r.status === 'rejected') this.logger.warn('Shutdown failed', { server: names[i], error: errorMessage(r.reason) });
    });
  }

  /** Connected servers with the prompt key each was configured with. */
  servers(): Array<{ name: string; promptKey: string }> {
    return [...this.promptKeys.entries()].map(([name, promptKey]) => ({ name, promptKey }));
  }
}
