import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../core/event-bus.js';
import type { SessionEvent } from '../../core/types.js';
import { ToolCatalog } from '../../catalog/tool-catalog.js';
import type { ServerConfig } from '../../config/app-config.js';
import type { ToolSchema } from '../../core/types.js';
import { FakeConnector, quietLogger, toolSchema } from '../../__tests__/fakes.js';
import { ServerPool } from '../server-pool.js';

class BrokenConnector extends FakeConnector {
  shutdowns = 0;

  override async initialize(): Promise<ToolSchema[]> {
    this.state = 'failed';
    throw new Error('handshake refused');
  }

  override async shutdown(): Promise<void> {
    this.shutdowns++;
    await super.shutdown();
  }
}

function server(name: string, extra: Partial<ServerConfig> = {}): ServerConfig {
  return { name, enabled: true, target: { transport: 'builtin', kind: 'memory', options: {} }, ...extra };
}

function setup() {
  const catalog = new ToolCatalog();
  const made = new Map<string, FakeConnector>();
  const closed: string[] = [];
  const pool = new ServerPool(catalog, {
    logger: quietLogger(),
    factory: (cfg) => {
      const connector =
        cfg.name === 'broken'
          ? new BrokenConnector(cfg.name, [])
          : new (class extends FakeConnector {
              override async shutdown(): Promise<void> {
                closed.push(this.name);
                await super.shutdown();
              }
            })(cfg.name, [toolSchema(`${cfg.name}_get`)]);
      made.set(cfg.name, connector);
      return connector;
    },
  });
  return { catalog, made, closed, pool };
}

describe('ServerPool', () => {
  it('connects enabled servers in order and reports the ones that failed', async () => {
    const { catalog, made, pool } = setup();
    const report = await pool.connectAll([
      server('alpha', { prompt: 'memory' }),
      server('broken'),
      server('off', { enabled: false }),
      server('beta'),
    ]);

    expect(report).toEqual({ connected: ['alpha', 'beta'], failed: [{ server: 'broken', error: 'handshake refused' }] });
    expect(made.has('off')).toBe(false);
    expect(catalog.listAll().map((t) => t.qualifiedName)).toEqual(['alpha_get', 'beta_get']);
    expect(pool.servers()).toEqual([
      { name: 'alpha', promptKey: 'memory' },
      { name: 'beta', promptKey: 'beta' },
    ]);

    const broken = made.get('broken');
    expect(broken instanceof BrokenConnector && broken.shutdowns).toBe(1);
    expect(broken?.watchers).toBe(0);
    expect(made.get('alpha')?.watchers).toBe(1);
  });

  it('refuses a second connector under a taken name', async () => {
    const { pool } = setup();
    await pool.connect(new FakeConnector('alpha', []));
    await expect(pool.connect(new FakeConnector('alpha', []))).rejects.toThrow('Server alpha is already connected');
  });

  it('disconnects one server and removes its tools', async () => {
    const { catalog, pool } = setup();
    await pool.connectAll([server('alpha'), server('beta')]);
    await pool.disconnect('alpha');
    await pool.disconnect('missing');
    expect(catalog.listAll().map((t) => t.qualifiedName)).toEqual(['beta_get']);
    expect(pool.servers().map((s) => s.name)).toEqual(['beta']);
  });

  it('drops a server that fails after it connected', async () => {
    const { catalog, made, closed, pool } = setup();
    await pool.connectAll([server('alpha'), server('beta')]);

    made.get('alpha')?.fail('process exited with code 1');
    expect(catalog.listAll().map((t) => t.qualifiedName)).toEqual(['beta_get']);
    expect(catalog.listServers().map((s) => s.name)).toEqual(['beta']);
    expect(pool.servers()).toEqual([{ name: 'beta', promptKey: 'beta' }]);
    await vi.waitFor(() => expect(closed).toEqual(['alpha']));
    expect(made.get('alpha')?.watchers).toBe(0);
  });

  it('reports state changes as events', async () => {
    const catalog = new ToolCatalog();
    const events = new EventBus();
    const seen: SessionEvent[] = [];
    events.subscribe((ev) => {
      seen.push(ev);
    });
    const pool = new ServerPool(catalog, { logger: quietLogger(), events });
    const alpha = new FakeConnector('alpha', [toolSchema('alpha_get')]);
    await pool.connect(alpha);

    alpha.fail('stream ended');
    await vi.waitFor(() => expect(seen).toEqual([{ type: 'server_state', server: 'alpha', state: 'failed', detail: 'stream ended', at: expect.any(Number) }]));
  });

  it('shuts servers down in reverse order of connection', async () => {
    const { catalog, closed, pool } = setup();
    await pool.connectAll([server('alpha'), server('beta'), server('gamma')]);
    await pool.shutdownAll();
    expect(closed).toEqual(['gamma', 'beta', 'alpha']);
    expect(catalog.listAll()).toEqual([]);
    expect(pool.servers()).toEqual([]);
  });
});
