import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Logger } from '../../core/logger.js';
import type { JsonObject, JsonValue } from '../../core/types.js';
import { createDatabaseTools } from '../db-tools.js';
import { SqliteDatabase } from '../sqlite-database.js';

const ctx = { signal: new AbortController().signal, logger: new Logger('error', () => {}) };

describe('sqlite tools', () => {
  let db: SqliteDatabase;
  let run: (name: string, args?: JsonObject) => Promise<JsonValue>;

  beforeEach(() => {
    db = new SqliteDatabase(':memory:');
    const tools = createDatabaseTools(db);
    run = async (name, args = {}) => {
      const tool = tools.find((t) => t.name === name);
      if (!tool) throw new Error(`missing tool ${name}`);
      return tool.execute(args, ctx);
    };
  });

  afterEach(() => db.close());

  const createUsers = () =>
    run('sqlite_create_table', {
      name: 'users',
      columns: [
        { name: 'id', type: 'INTEGER', constraints: 'PRIMARY KEY' },
        { name: 'name', type: 'TEXT', constraints: 'NOT NULL' },
        { name: 'active', type: 'INTEGER' },
      ],
    });

  it('creates a table, inserts and queries rows', async () => {
    expect(await createUsers()).toEqual({ success: true });
    expect(await run('sqlite_list_tables')).toEqual(['users']);

    expect(await run('sqlite_execute', { sql: 'INSERT INTO users (name, active) VALUES (?, ?)', params: ['Ann', true] })).toEqual({
      changes: 1,
      lastInsertRowid: 1,
    });
    await run('sqlite_execute', { sql: 'INSERT INTO users (name, active) VALUES (?, ?)', params: ['Bob', false] });

    expect(await run('sqlite_query', { query: 'SELECT id, name, active FROM users ORDER BY id' })).toEqual([
      { id: 1, name: 'Ann', active: 1 },
      { id: 2, name: 'Bob', active: 0 },
    ]);
    expect(await run('sqlite_query', { query: 'SELECT name FROM users WHERE active = ?', params: [1] })).toEqual([{ name: 'Ann' }]);
  });

  it('reports how many rows an update changed', async () => {
    await createUsers();
    await run('sqlite_execute', { sql: "INSERT INTO users (name, active) VALUES ('Ann', 1), ('Bob', 1)" });
    expect(await run('sqlite_execute', { sql: 'UPDATE users SET active = 0' })).toMatchObject({ changes: 2 });
  });

  it('drops tables and says whether one existed', async () => {
    await createUsers();
    expect(await run('sqlite_drop_table', { name: 'users' })).toEqual({ success: true, dropped: true });
    expect(await run('sqlite_drop_table', { name: 'users' })).toEqual({ success: true, dropped: false });
    expect(await run('sqlite_list_tables')).toEqual([]);
  });

  it('rejects identifiers and column clauses that are not plain names', async () => {
    await expect(run('sqlite_create_table', { name: 'users; --', columns: [{ name: 'id', type: 'INTEGER' }] })).rejects.toThrow(
      'Invalid arguments for sqlite_create_table: table "users; --" is not a valid identifier'
    );
    await expect(
      run('sqlite_create_table', { name: 'users', columns: [{ name: 'id', type: 'INTEGER', constraints: 'PRIMARY KEY; DROP' }] })
    ).rejects.toThrow('Invalid arguments for sqlite_create_table: constraints "PRIMARY KEY; DROP" are not allowed');
    await expect(run('sqlite_create_table', { name: 'users', columns: [] })).rejects.toThrow(
      'Invalid arguments for sqlite_create_table: columns: at least one column is required'
    );
    await expect(run('sqlite_drop_table', { name: 'a b' })).rejects.toThrow(
      'Invalid arguments for sqlite_drop_table: table "a b" is not a valid identifier'
    );
  });

  it('surfaces SQL errors from the engine', async () => {
    await expect(run('sqlite_query', { query: 'SELECT * FROM missing' })).rejects.toThrow('no such table: missing');
  });
});
