import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { JsonObject, JsonValue } from '../core/types.js';
import type { DatabasePort, ExecuteResult, SqlParam } from './db-tools.js';
import { createDatabaseTools } from './db-tools.js';
import type { ToolBackend } from './tool-types.js';

function toJsonValue(v: unknown): JsonValue {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  if (typeof v === 'bigint') return Number(v);
  if (Buffer.isBuffer(v)) return v.toString('base64');
  return String(v);
}

function toJsonRow(row: unknown): JsonObject {
  const out: JsonObject = {};
  if (typeof row !== 'object' || row === null) return out;
  for (const [k, v] of Object.entries(row)) out[k] = toJsonValue(v);
  return out;
}

export class SqliteDatabase implements DatabasePort {
  private readonly db: Database.Database;

  /** `filename` may be `:memory:`. */
  constructor(filename: string) {
    if (filename !== ':memory:') mkdirSync(dirname(filename), { recursive: true });
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
  }

  query(sql: string, params: SqlParam[]): JsonObject[] {
    return this.db.prepare(sql).all(...params).map(toJsonRow);
  }

  execute(sql: string, params: SqlParam[]): ExecuteResult {
    const res = this.db.prepare(sql).run(...params);
    return { changes: res.changes, lastInsertRowid: Number(res.lastInsertRowid) };
  }

  listTables(): string[] {
    const rows = this.query("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name", []);
    return rows.flatMap((r) => (typeof r.name === 'string' ? [r.name] : []));
  }

  close(): void {
    this.db.close();
  }
}

export function createSqliteBackend(filename: string): ToolBackend {
  const db = new SqliteDatabase(filename);
  return { name: 'sqlite', version: '0.1.0', tools: createDatabaseTools(db), close: () => db.close() };
}
