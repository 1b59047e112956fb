import Database from 'better-sqlite3';
import type { DatabaseExecutor, Dialect } from '../types';

function toBindable(value: unknown): unknown {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

/**
 * Executor over a better-sqlite3 connection.
 *
 * @example
 * const storage = new SqlStorage(BetterSqliteExecutor.open('data.sqlite'));
 */
export class BetterSqliteExecutor implements DatabaseExecutor {
  public readonly dialect: Dialect = 'sqlite';
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Open a database file, or an in-memory database when no file is given. */
  static open(filename = ':memory:'): BetterSqliteExecutor {
    return new BetterSqliteExecutor(new Database(filename));
  }

  run(sql: string, params: readonly unknown[] = []): void {
    this.db.prepare(sql).run(...params.map(toBindable));
  }

  all<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params: readonly unknown[] = [],
  ): TRecord[] {
    return this.db.prepare<unknown[], TRecord>(sql).all(...params.map(toBindable));
  }

  get<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params: readonly unknown[] = [],
  ): Promise<TRecord | undefined> | (TRecord | undefined) {
    return this.db.prepare<unknown[], TRecord>(sql).get(...params.map(toBindable));
  }

  transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T> | T): Promise<T> | T {
    // better-sqlite3's own transaction() cannot span an async callback
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

  close(): void {
    this.db.close();
  }
}
