import type { JsonValue, ResourceSchema } from '../core/types.js';
import { ToolExecutionError } from '../core/errors.js';
import { LruCache } from '../memory/lru.js';
import { ToolArgs } from './args.js';
import type { ToolBackend, ToolDefinition } from './tool-types.js';

export interface MemoryToolsOptions {
  maxEntries?: number;
  ttlMs?: number;
}

export function createMemoryTools(store: LruCache<JsonValue>): ToolDefinition[] {
  return [
    {
      name: 'memory_set',
      description: 'Set a value in memory',
      inputSchema: {
        type: 'object',
        properties: {
          key: { type: 'string', description: 'Key to store the value under' },
          value: { description: 'Value to store (any JSON value)' },
        },
        required: ['key', 'value'],
        additionalProperties: false,
      },
      execute: (raw, ctx) => {
        const args = new ToolArgs('memory_set', raw);
        const evicted = store.set(args.string('key'), args.value('value'));
        if (evicted.length) ctx.logger.debug('Evicted least recently used keys', { evicted });
        return { success: true };
      },
    },
    {
      name: 'memory_get',
      description: 'Get a value from memory',
      inputSchema: {
        type: 'object',
        properties: { key: { type: 'string', description: 'Key to retrieve the value for' } },
        required: ['key'],
        additionalProperties: false,
      },
      execute: (raw) => {
        const key = new ToolArgs('memory_get', raw).string('key');
        const value = store.get(key);
        if (value === undefined) throw new ToolExecutionError('memory_get', `no value stored for key ${JSON.stringify(key)}`);
        return value;
      },
    },
    {
      name: 'memory_delete',
      description: 'Delete a value from memory',
      inputSchema: {
        type: 'object',
        properties: { key: { type: 'string', description: 'Key to delete' } },
        required: ['key'],
        additionalProperties: false,
      },
      execute: (raw) => {
        const key = new ToolArgs('memory_delete', raw).string('key');
        return { success: true, deleted: store.delete(key) };
      },
    },
    {
      name: 'memory_list',
      description: 'List the keys currently stored in memory',
      inputSchema: { type: 'object', properties: {}, additionalProperties: false },
      execute: () => store.keys(),
    },
  ];
}

const MEMORY_RESOURCES: ResourceSchema[] = [{ pattern: 'memory://{key}', description: 'A value stored in memory' }];

export function createMemoryBackend(opts: MemoryToolsOptions = {}): ToolBackend {
  const store = new LruCache<JsonValue>({ maxEntries: opts.maxEntries ?? 1024, ttlMs: opts.ttlMs });
  return { name: 'memory', version: '0.1.0', tools: createMemoryTools(store), resources: MEMORY_RESOURCES };
}
