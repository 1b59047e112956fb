import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { SQLJsExecutor } from '../../adapters/sqljs';
import { StorageError } from '../../errors';
import type { DatabaseExecutor, TableSpec } from '../../types';
import { SqlStorage, decodeValue, encodeValue, quoteIdent } from '../sql';

const items: TableSpec = {
  primaryKey: 'id',
  columns: [
    { name: 'name', type: { kind: 'string' }, notNull: true },
    { name: 'done', type: { kind: 'boolean' } },
    { name: 'meta', type: { kind: 'json' } },
    { name: 'tags', type: { kind: 'list:reference', table: 'tags' } },
  ],
};

describe('encodeValue / decodeValue', () => {
  it('stores JSON and booleans as SQLite understands them', () => {
    expect(encodeValue({ kind: 'json' }, { a: 1 }, 'sqlite')).toBe('{"a":1}');
    expect(encodeValue({ kind: 'list:reference', table: 't' }, [1, 2], 'sqlite')).toBe('[1,2]');
    expect(encodeValue({ kind: 'boolean' }, true, 'sqlite')).toBe(1);
    expect(encodeValue(undefined, true, 'postgres')).toBe(true);
    expect(encodeValue(undefined, new Date(0), 'sqlite')).toBe('1970-01-01T00:00:00.000Z');
    expect(encodeValue({ kind: 'string' }, undefined, 'sqlite')).toBeNull();
  });

  it('reads values back into their column types', () => {
    expect(decodeValue({ kind: 'json' }, '{"a":1}')).toEqual({ a: 1 });
    expect(decodeValue({ kind: 'json' }, 'plain text')).toBe('plain text');
    expect(decodeValue({ kind: 'boolean' }, 0)).toBe(false);
    expect(decodeValue({ kind: 'integer' }, '42')).toBe(42);
    expect(decodeValue(undefined, 'x')).toBe('x');
  });

  it('quotes identifiers', () => {
    expect(quoteIdent('odd "name"')).toBe('"odd ""name"""');
  });
});

describe('SqlStorage (sql.js)', () => {
  let db: SQLJsExecutor;
  let storage: SqlStorage;

  beforeEach(async () => {
    db = await SQLJsExecutor.create();
    storage = new SqlStorage(db);
    await storage.defineTable('items', items);
  });

  afterEach(() => {
    db.close();
  });

  it('creates tables with the primary key first', async () => {
    expect(await storage.hasTable('items')).toBe(true);
    expect(await storage.hasTable('ghost')).toBe(false);
    expect(await storage.tableColumns('items')).toEqual(['id', 'name', 'done', 'meta', 'tags']);
    expect(await storage.tableColumns('ghost')).toEqual([]);
  });

  it('round-trips typed values', async () => {
    expect(await storage.insertRow('items', { name: 'one', done: true, meta: { a: 1 }, tags: [1, 2] })).toBe(1);
    expect(await storage.lookupRow('items', 1)).toEqual({ id: 1, name: 'one', done: true, meta: { a: 1 }, tags: [1, 2] });
    expect(await storage.lookupRow('items', 2)).toBeUndefined();
  });

  it('returns given and generated keys from a bulk insert', async () => {
    expect(await storage.bulkInsertRows('items', [{ name: 'a' }, { id: 10, name: 'b' }, { name: 'c' }])).toEqual([1, 10, 11]);
    expect(await storage.bulkInsertRows('items', [])).toEqual([]);
  });

  it('rolls back a failed bulk insert', async () => {
    await expect(storage.bulkInsertRows('items', [{ name: 'a' }, { nope: 1 }])).rejects.toBeInstanceOf(StorageError);
    expect(await storage.query('items', {})).toEqual([]);
  });

  it('updates columns but never the key', async () => {
    await storage.insertRow('items', { name: 'one', done: true, meta: { a: 1 }, tags: [1, 2] });
    await storage.updateRow('items', 1, { id: 1, done: false, meta: null });
    await storage.updateRow('items', 1, { id: 1 });
    expect(await storage.lookupRow('items', 1)).toEqual({ id: 1, name: 'one', done: false, meta: null, tags: [1, 2] });
  });

  it('queries by equality and by null', async () => {
    await storage.bulkInsertRows('items', [{ name: 'a', done: true }, { name: 'b' }, { name: 'c', done: true }]);
    expect((await storage.query('items', { done: true })).map((r) => r.id)).toEqual([1, 3]);
    expect((await storage.query('items', { done: null })).map((r) => r.id)).toEqual([2]);
    expect((await storage.query('items', { name: 'c', done: true })).map((r) => r.name)).toEqual(['c']);
  });

  it('adds missing columns without touching existing rows', async () => {
    await storage.insertRow('items', { name: 'one' });
    await storage.redefineTable('items', {
      primaryKey: 'id',
      columns: [
        ...items.columns,
        { name: 'score', type: { kind: 'integer' }, notNull: true },
        { name: 'level', type: { kind: 'integer' }, notNull: true, defaultValue: 3 },
      ],
    });
    expect(await storage.tableColumns('items')).toEqual(['id', 'name', 'done', 'meta', 'tags', 'score', 'level']);
    expect(await storage.lookupRow('items', 1)).toEqual({
      id: 1,
      name: 'one',
      done: null,
      meta: null,
      tags: null,
      score: null,
      level: 3,
    });
  });

  it('maps driver failures to storage errors', async () => {
    await storage.insertRow('items', { id: 1, name: 'one' });
    await expect(storage.insertRow('items', { id: 1, name: 'again' })).rejects.toMatchObject({ reason: 'CONFLICT' });
    await expect(storage.insertRow('items', { done: true })).rejects.toMatchObject({ reason: 'INTERNAL' });
    await expect(storage.insertRow('items', { nope: 1 })).rejects.toMatchObject({
      code: 'STORAGE',
      details: { op: 'insertRow', table: 'items' },
    });
  });

  it('records the definition without DDL when migrations are disabled', async () => {
    await storage.defineTable('ghost', items, { migrate: false });
    expect(await storage.hasTable('ghost')).toBe(false);
  });

  it('quotes table and column names', async () => {
    await storage.defineTable('odd "table"', { primaryKey: 'id', columns: [{ name: 'first name', type: { kind: 'string' } }] });
    expect(await storage.insertRow('odd "table"', { 'first name': 'Ann' })).toBe(1);
    expect(await storage.lookupRow('odd "table"', 1)).toEqual({ id: 1, 'first name': 'Ann' });
  });

  it('inserts an empty row with default values', async () => {
    await storage.defineTable('blank', { primaryKey: 'id', columns: [{ name: 'note', type: { kind: 'string' }, defaultValue: "it's" }] });
    expect(await storage.insertRow('blank', {})).toBe(1);
    expect(await storage.lookupRow('blank', 1)).toEqual({ id: 1, note: "it's" });
  });
});

describe('SqlStorage (postgres dialect)', () => {
  const orders: TableSpec = {
    primaryKey: 'id',
    columns: [
      { name: 'title', type: { kind: 'string' }, notNull: true },
      { name: 'done', type: { kind: 'boolean' }, defaultValue: false },
      { name: 'meta', type: { kind: 'json' } },
      { name: 'customer', type: { kind: 'reference', table: 'customers' } },
      { name: 'tags', type: { kind: 'list:reference', table: 'tags' } },
    ],
  };

  let statements: Array<[string, unknown[]]>;
  let rows: Record<string, unknown>[];
  let nextId: number;
  let transaction: Mock;
  let storage: SqlStorage;

  beforeEach(() => {
    statements = [];
    rows = [];
    nextId = 1;
    const run = vi.fn();
    const all = vi.fn();
    const get = vi.fn();
    transaction = vi.fn();
    run.mockImplementation((sql: string, params: readonly unknown[] = []) => {
      statements.push([sql, [...params]]);
    });
    all.mockImplementation((sql: string, params: readonly unknown[] = []) => {
      statements.push([sql, [...params]]);
      return rows;
    });
    get.mockImplementation((sql: string, params: readonly unknown[] = []) => {
      statements.push([sql, [...params]]);
      return sql.includes('RETURNING') ? { id: String(nextId++) } : undefined;
    });
    const executor: DatabaseExecutor = { dialect: 'postgres', run, all, get, transaction };
    transaction.mockImplementation((fn: (tx: DatabaseExecutor) => unknown) => fn(executor));
    storage = new SqlStorage(executor);
  });

  it('creates tables with postgres column types', async () => {
    rows = [{ name: 'id' }, { name: 'title' }, { name: 'done' }, { name: 'meta' }, { name: 'customer' }, { name: 'tags' }];
    await storage.defineTable('orders', orders);
    expect(statements).toEqual([
      [
        'CREATE TABLE IF NOT EXISTS "orders" ("id" BIGSERIAL PRIMARY KEY, "title" TEXT NOT NULL, "done" BOOLEAN DEFAULT FALSE, "meta" JSONB, "customer" BIGINT, "tags" JSONB)',
        [],
      ],
      [
        'SELECT column_name AS name FROM information_schema.columns WHERE table_schema = current_schema() AND table_name = $1 ORDER BY ordinal_position',
        ['orders'],
      ],
    ]);
  });

  it('adds missing columns, nullable unless they have a default', async () => {
    rows = [{ name: 'id' }, { name: 'title' }];
    await storage.redefineTable('orders', {
      primaryKey: 'id',
      columns: [
        { name: 'title', type: { kind: 'string' } },
        { name: 'score', type: { kind: 'double' }, notNull: true },
        { name: 'level', type: { kind: 'integer' }, notNull: true, defaultValue: 3 },
        { name: 'placed', type: { kind: 'datetime' } },
      ],
    });
    expect(statements.slice(1)).toEqual([
      ['ALTER TABLE "orders" ADD COLUMN "score" DOUBLE PRECISION', []],
      ['ALTER TABLE "orders" ADD COLUMN "level" BIGINT DEFAULT 3 NOT NULL', []],
      ['ALTER TABLE "orders" ADD COLUMN "placed" TIMESTAMP', []],
    ]);
  });

  it('inserts with numbered placeholders and RETURNING', async () => {
    await storage.defineTable('orders', orders, { migrate: false });
    expect(await storage.insertRow('orders', { title: 'a', done: true, meta: { a: 1 }, tags: [1, 2] })).toBe(1);
    expect(statements).toEqual([
      [
        'INSERT INTO "orders" ("title", "done", "meta", "tags") VALUES ($1, $2, $3, $4) RETURNING "id" AS id',
        ['a', true, '{"a":1}', '[1,2]'],
      ],
    ]);
  });

  it('bulk inserts inside one transaction', async () => {
    await storage.defineTable('orders', orders, { migrate: false });
    expect(await storage.bulkInsertRows('orders', [{ title: 'b' }, {}])).toEqual([1, 2]);
    expect(transaction).toHaveBeenCalledTimes(1);
    expect(statements).toEqual([
      ['INSERT INTO "orders" ("title") VALUES ($1) RETURNING "id" AS id', ['b']],
      ['INSERT INTO "orders" DEFAULT VALUES RETURNING "id" AS id', []],
    ]);
  });

  it('updates, looks up and queries by numbered placeholders', async () => {
    await storage.defineTable('orders', orders, { migrate: false });
    await storage.updateRow('orders', 2, { id: 2, title: 'b2', done: false });
    expect(await storage.lookupRow('orders', 2)).toBeUndefined();
    expect(await storage.hasTable('orders')).toBe(false);
    rows = [{ id: '7', title: 'a', done: true, meta: { a: 1 }, customer: '5', tags: [1] }];
    expect(await storage.query('orders', { title: 'a', meta: null })).toEqual([
      { id: 7, title: 'a', done: true, meta: { a: 1 }, customer: 5, tags: [1] },
    ]);

    expect(statements).toEqual([
      ['UPDATE "orders" SET "title" = $1, "done" = $2 WHERE "id" = $3', ['b2', false, 2]],
      ['SELECT * FROM "orders" WHERE "id" = $1 LIMIT 1', [2]],
      [
        'SELECT table_name AS name FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = $1',
        ['orders'],
      ],
      ['SELECT * FROM "orders" WHERE "title" = $1 AND "meta" IS NULL ORDER BY "id"', ['a']],
    ]);
  });
});
