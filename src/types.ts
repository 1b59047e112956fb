/**
 * Public and internal types for the JSON-to-table sync engine.
 */

/**
 * Supported SQL dialects.
 */
export type Dialect = 'sqlite' | 'postgres';

/**
 * Minimal database executor the SQL storage operates against.
 * Implementations must handle parameter binding according to the underlying driver.
 */
export interface DatabaseExecutor {
  /** SQL dialect: influences DDL, placeholders and key generation. */
  readonly dialect: Dialect;

  /**
   * Execute a statement that does not return rows (DDL/DML). Must support positional params.
   */
  run(sql: string, params?: readonly unknown[]): Promise<void> | void;

  /**
   * Fetch all rows as an array of objects.
   */
  all<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params?: readonly unknown[],
  ): Promise<TRecord[]> | TRecord[];

  /**
   * Fetch the first row or undefined.
   */
  get<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params?: readonly unknown[],
  ): Promise<TRecord | undefined> | (TRecord | undefined);

  /**
   * Execute a function within a transaction boundary. Nested transactions are not required to be supported.
   */
  transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T> | T): Promise<T> | T;
}

/** An incoming JSON-like document. */
export type Document = Record<string, unknown>;

/** A mapping from column name to resolved value, ready for storage. */
export type Row = Record<string, unknown>;

/** Column types that carry a plain value. */
export type ScalarType = 'string' | 'integer' | 'double' | 'boolean' | 'json';

/** Column types holding a parsed date and/or time. */
export type TemporalType = 'date' | 'time' | 'datetime';

/** Relational field kinds. */
export type ReferenceKind = 'reference' | 'list:reference';

/**
 * A parsed field type. Reference kinds name the target Type.
 */
export type FieldType =
  | { kind: ScalarType | TemporalType }
  | { kind: ReferenceKind; target: string };

/**
 * A column type as storage sees it. Reference kinds name the target table.
 */
export type ColumnType =
  | { kind: ScalarType | TemporalType }
  | { kind: ReferenceKind; table: string };

export interface ColumnSpec {
  readonly name: string;
  readonly type: ColumnType;
  /** Only honoured when the table is created; migrated columns stay nullable. */
  readonly notNull?: boolean;
  readonly defaultValue?: unknown;
}

export interface TableSpec {
  /** Integer primary-key column, generated on insert when absent from the row. */
  readonly primaryKey: string;
  readonly columns: readonly ColumnSpec[];
}

export interface DefineTableOptions {
  /** When false, the definition is recorded but no DDL is issued. Default true. */
  readonly migrate?: boolean;
}

/**
 * The relational storage engine consumed by the registry and the sync engine.
 */
export interface StorageEngine {
  hasTable(table: string): Promise<boolean>;

  /** Column names currently present on the table (empty when the table does not exist). */
  tableColumns(table: string): Promise<string[]>;

  /** Create the table when missing; columns missing from an existing table are added. */
  defineTable(table: string, spec: TableSpec, options?: DefineTableOptions): Promise<void>;

  /** Additive migration of an existing table: existing columns and data are preserved. */
  redefineTable(table: string, spec: TableSpec, options?: DefineTableOptions): Promise<void>;

  lookupRow(table: string, key: number): Promise<Row | undefined>;

  updateRow(table: string, key: number, values: Row): Promise<void>;

  /** Insert a row and return its primary key (the given one, or a generated one). */
  insertRow(table: string, values: Row): Promise<number>;

  /** Insert rows in order and return their keys in the same order. */
  bulkInsertRows(table: string, rows: readonly Row[]): Promise<number[]>;

  /** Rows whose columns equal every value of `where`, ordered by primary key. */
  query(table: string, where: Row): Promise<Row[]>;
}

/** One row of the Known-Fields Catalog. */
export type CatalogEntry = {
  type: string;
  fieldname: string;
  column_name: string | null;
  db_type: string;
};

export interface SyncOptions {
  /** Leave fields absent from the document untouched instead of clearing them. */
  partial?: boolean;
}
