import type { JsonObject, JsonValue } from '../core/types.js';
import { ArgumentError } from '../core/errors.js';
import { ToolArgs } from './args.js';
import type { ToolDefinition } from './tool-types.js';

export type SqlParam = string | number | null;

export interface ExecuteResult {
  changes: number;
  lastInsertRowid: number;
}

/**
 * Storage behind the sqlite tools. Implementations decide the engine and any
 * safety rules (read-only connections, allow-lists).
 */
export interface DatabasePort {
  query(sql: string, params: SqlParam[]): JsonObject[];
  execute(sql: string, params: SqlParam[]): ExecuteResult;
  listTables(): string[];
  close(): void;
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const COLUMN_TYPE_RE = /^[A-Za-z][A-Za-z0-9 ,()]*$/;

function identifier(tool: string, what: string, value: string): string {
  if (!IDENTIFIER_RE.test(value)) throw new ArgumentError(tool, `${what} ${JSON.stringify(value)} is not a valid identifier`);
  return `"${value}"`;
}

function toSqlParams(values: JsonValue[] | undefined): SqlParam[] {
  return (values ?? []).map((v) => {
    if (v === null || typeof v === 'string' || typeof v === 'number') return v;
    if (typeof v === 'boolean') return v ? 1 : 0;
    return JSON.stringify(v);
  });
}

interface ColumnSpec {
  name: string;
  type: string;
  constraints?: string;
}

function columnSpecs(tool: string, raw: JsonValue[]): ColumnSpec[] {
  if (raw.length === 0) throw new ArgumentError(tool, 'columns: at least one column is required');
  return raw.map((c, i) => {
    if (typeof c !== 'object' || c === null || Array.isArray(c)) throw new ArgumentError(tool, `columns.${i}: Expected object`);
    const col = new ToolArgs(tool, c);
    return { name: col.string('name'), type: col.string('type'), constraints: col.optionalString('constraints') };
  });
}

const paramsSchema = { type: 'array', description: 'Positional parameters bound to ? placeholders' } as const;

export function createDatabaseTools(db: DatabasePort): ToolDefinition[] {
  return [
    {
      name: 'sqlite_execute',
      description: 'Execute a statement that modifies the database (INSERT, UPDATE, DELETE)',
      inputSchema: {
        type: 'object',
        properties: { sql: { type: 'string', description: 'SQL statement' }, params: paramsSchema },
        required: ['sql'],
        additionalProperties: false,
      },
      execute: (raw) => {
        const args = new ToolArgs('sqlite_execute', raw);
        const res = db.execute(args.string('sql'), toSqlParams(args.optionalArray('params')));
        return { changes: res.changes, lastInsertRowid: res.lastInsertRowid };
      },
    },
    {
      name: 'sqlite_query',
      description: 'Run a read-only query and return the matching rows',
      inputSchema: {
        type: 'object',
        properties: { query: { type: 'string', description: 'SELECT statement' }, params: paramsSchema },
        required: ['query'],
        additionalProperties: false,
      },
      execute: (raw) => {
        const args = new ToolArgs('sqlite_query', raw);
        return db.query(args.string('query'), toSqlParams(args.optionalArray('params')));
      },
    },
    {
      name: 'sqlite_create_table',
      description: 'Create a table if it does not exist',
      inputSchema: {
        type: 'object',
        properties: {
          name: { type: 'string', description: 'Table name' },
          columns: {
            type: 'array',
            description: 'Column definitions',
            items: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                type: { type: 'string', description: 'SQLite column type, e.g. INTEGER or TEXT' },
                constraints: { type: 'string', description: 'e.g. PRIMARY KEY, NOT NULL' },
              },
              required: ['name', 'type'],
            },
          },
        },
        required: ['name', 'columns'],
        additionalProperties: false,
      },
      execute: (raw) => {
        const tool = 'sqlite_create_table';
        const args = new ToolArgs(tool, raw);
        const table = identifier(tool, 'table', args.string('name'));
        const cols = columnSpecs(tool, args.array('columns')).map((c) => {
          if (!COLUMN_TYPE_RE.test(c.type)) throw new ArgumentError(tool, `column type ${JSON.stringify(c.type)} is not allowed`);
          if (c.constraints && !COLUMN_TYPE_RE.test(c.constraints)) {
            throw new ArgumentError(tool, `constraints ${JSON.stringify(c.constraints)} are not allowed`);
          }
          return [identifier(tool, 'column', c.name), c.type, c.constraints].filter(Boolean).join(' ');
        });
        db.execute(`CREATE TABLE IF NOT EXISTS ${table} (${cols.join(', ')})`, []);
        return { success: true };
      },
    },
    {
      name: 'sqlite_drop_table',
      description: 'Drop a table if it exists',
      inputSchema: {
        type: 'object',
        properties: { name: { type: 'string', description: 'Table name' } },
        required: ['name'],
        additionalProperties: false,
      },
      execute: (raw) => {
        const name = new ToolArgs('sqlite_drop_table', raw).string('name');
        const existed = db.listTables().includes(name);
        db.execute(`DROP TABLE IF EXISTS ${identifier('sqlite_drop_table', 'table', name)}`, []);
        return { success: true, dropped: existed };
      },
    },
    {
      name: 'sqlite_list_tables',
      description: 'List the tables in the database',
      inputSchema: { type: 'object', properties: {}, additionalProperties: false },
      execute: () => db.listTables(),
    },
  ];
}
