import type { ResourceDescriptor, ResourceSchema, ServerState, ToolDescriptor, ToolSchema } from '../core/types.js';
import { ToolNotFoundError, ToolhubError } from '../core/errors.js';
import type { ServerConnector } from '../servers/connector.js';

export interface ResolvedTool {
  descriptor: ToolDescriptor;
  connector: ServerConnector;
}

export interface ServerSummary {
  name: string;
  state: ServerState;
  tools: number;
}

function describe(server: string, schema: ToolSchema, qualifiedName: string): ToolDescriptor {
  return Object.freeze({
    qualifiedName,
    name: schema.name,
    server,
    description: schema.description,
    inputSchema: schema.inputSchema,
  });
}

/**
 * One namespace over every registered server's tools. When two servers
 * advertise the same name, both tools are renamed `<server>.<tool>` (with a
 * `_2`, `_3`… suffix if that is still taken) and any later server advertising
 * it is namespaced too. `<server>.<tool>` always resolves.
 */
export class ToolCatalog {
  private readonly servers = new Map<string, ServerConnector>();
  private entries: ToolDescriptor[] = [];
  private readonly byQualified = new Map<string, ToolDescriptor>();
  private readonly resources = new Map<string, ResourceDescriptor[]>();
  /** Advertised names that have been seen on more than one server. */
  private readonly collided = new Set<string>();

  register(connector: ServerConnector, tools: readonly ToolSchema[], resources: readonly ResourceSchema[] = []): ToolDescriptor[] {
    const server = connector.name;
    if (this.servers.has(server)) throw new ToolhubError(`Server ${server} is already registered`);
    this.servers.set(server, connector);

    const added: ToolDescriptor[] = [];
    for (const schema of tools) {
      const clash = this.byQualified.get(schema.name);
      if (clash) {
        this.collided.add(schema.name);
        this.rename(clash, this.unique(`${clash.server}.${clash.name}`));
      }
      const qualified = this.collided.has(schema.name) ? this.unique(`${server}.${schema.name}`) : schema.name;
      const descriptor = describe(server, schema, qualified);
      this.entries.push(descriptor);
      this.byQualified.set(qualified, descriptor);
      added.push(descriptor);
    }

    this.resources.set(
      server,
      resources.map((r) => Object.freeze({ pattern: r.pattern, description: r.description, server }))
    );
    return added;
  }

  deregister(server: string): boolean {
    if (!this.servers.delete(server)) return false;
    this.entries = this.entries.filter((d) => {
      if (d.server !== server) return true;
      this.byQualified.delete(d.qualifiedName);
      return false;
    });
    this.resources.delete(server);
    return true;
  }

  /** Exact qualified name first, then the `<server>.<tool>` alias. */
  resolve(name: string): ResolvedTool {
    const descriptor = this.byQualified.get(name) ?? this.byAlias(name);
    if (descriptor) {
      const connector = this.servers.get(descriptor.server);
      if (connector) return { descriptor, connector };
    }
    if (this.collided.has(name)) {
      const options = this.entries.filter((d) => d.name === name).map((d) => d.qualifiedName);
      throw new ToolNotFoundError(name, `ambiguous, use one of: ${options.join(', ')}`);
    }
    throw new ToolNotFoundError(name);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Like `resolve`, without throwing. */
  lookup(name: string): ToolDescriptor | undefined {
    return this.byQualified.get(name) ?? this.byAlias(name);
  }

  listAll(): ToolDescriptor[] {
    return [...this.entries];
  }

  listServers(): ServerSummary[] {
    return [...this.servers.values()].map((c) => ({
      name: c.name,
      state: c.state,
      tools: this.entries.filter((d) => d.server === c.name).length,
    }));
  }

  listResources(): ResourceDescriptor[] {
    return [...this.resources.values()].flat();
  }

  connector(server: string): ServerConnector | undefined {
    return this.servers.get(server);
  }

  private byAlias(name: string): ToolDescriptor | undefined {
    for (const server of this.servers.keys()) {
      if (!name.startsWith(`${server}.`)) continue;
      const tool = name.slice(server.length + 1);
      const hit = this.entries.find((d) => d.server === server && d.name === tool);
      if (hit) return hit;
    }
    return undefined;
  }

  private rename(old: ToolDescriptor, qualifiedName: string): void {
    const renamed = describe(old.server, old, qualifiedName);
    this.byQualified.delete(old.qualifiedName);
    this.byQualified.set(qualifiedName, renamed);
    this.entries = this.entries.map((d) => (d === old ? renamed : d));
  }

  private unique(base: string): string {
    if (!this.byQualified.has(base)) return base;
    for (let i = 2; ; i++) {
      const candidate = `${base}_${i}`;
      if (!this.byQualified.has(candidate)) return candidate;
    }
  }
}
