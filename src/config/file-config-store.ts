import fs from 'node:fs/promises';
import path from 'node:path';
import type { ConfigStore } from './config-store.js';

type StoreContents = Record<string, unknown>;

export interface FileConfigStoreOptions {
  filePath: string;
}

function isRecord(v: unknown): v is StoreContents {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isNotFound(e: unknown): boolean {
  return isRecord(e) && e.code === 'ENOENT';
}

/** One JSON document on disk; writes are serialized through a queue. */
export class FileConfigStore implements ConfigStore {
  private readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(opts: FileConfigStoreOptions) {
    this.filePath = opts.filePath;
  }

  async get(key: string): Promise<unknown> {
    const obj = await this.readAll();
    return obj[key];
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.enqueue(async () => {
      const obj = await this.readAll();
      obj[key] = value;
      await this.writeAll(obj);
    });
  }

  async delete(key: string): Promise<void> {
    await this.enqueue(async () => {
      const obj = await this.readAll();
      delete obj[key];
      await this.writeAll(obj);
    });
  }

  async keys(): Promise<string[]> {
    return Object.keys(await this.readAll());
  }

  private async enqueue(fn: () => Promise<void>): Promise<void> {
    this.writeQueue = this.writeQueue.then(fn, fn);
    return this.writeQueue;
  }

  private async readAll(): Promise<StoreContents> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (isNotFound(e)) return {};
      throw e;
    }
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  }

  private async writeAll(obj: StoreContents): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(obj, null, 2) + '\n', 'utf8');
  }
}
