import initSqlJs, { type Database as SQLJSDatabase, type SqlValue } from 'sql.js';
import type { DatabaseExecutor, Dialect } from '../types';

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || value instanceof Uint8Array) return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') return Number(value);
  return JSON.stringify(value);
}

/**
 * A minimal executor around a sql.js Database. Useful for tests and examples.
 * This behaves like a synchronous SQLite engine.
 */
export class SQLJsExecutor implements DatabaseExecutor {
  public readonly dialect: Dialect = 'sqlite';
  private readonly db: SQLJSDatabase;

  private constructor(db: SQLJSDatabase) {
    this.db = db;
  }

  /** Create a new in-memory sql.js executor, optionally loading an exported database image. */
  static async create(image?: Uint8Array): Promise<SQLJsExecutor> {
    const SQL = await initSqlJs();
    const db = new SQL.Database(image);
    return new SQLJsExecutor(db);
  }

  run(sql: string, params: readonly unknown[] = []): void {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params.map(toSqlValue));
      while (stmt.step()) {
        // consume
      }
    } finally {
      stmt.free();
    }
  }

  all<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params: readonly unknown[] = [],
  ): TRecord[] {
    const stmt = this.db.prepare(sql);
    const rows: TRecord[] = [];
    try {
      stmt.bind(params.map(toSqlValue));
      while (stmt.step()) {
        rows.push(stmt.getAsObject() as TRecord);
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  get<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params: readonly unknown[] = [],
  ): Promise<TRecord | undefined> | (TRecord | undefined) {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params.map(toSqlValue));
      if (stmt.step()) {
        return stmt.getAsObject() as TRecord;
      }
      return undefined;
    } finally {
      stmt.free();
    }
  }

  transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T> | T): Promise<T> | T {
    this.run('BEGIN');
    try {
      const result = fn(this);
      if (result instanceof Promise) {
        return Promise.resolve<T>(result)
          .then((value: T) => {
            this.run('COMMIT');
            return value;
          })
          .catch((err: unknown) => {
            this.run('ROLLBACK');
            throw err;
          });
      }
      this.run('COMMIT');
      return result;
    } catch (err) {
      this.run('ROLLBACK');
      throw err;
    }
  }

  /** Serialize the database, e.g. to persist it to a file. */
  export(): Uint8Array {
    return this.db.export();
  }

  close(): void {
    this.db.close();
  }
}
