import { StorageError, toStorageError } from '../errors';
import type {
	ColumnSpec,
	ColumnType,
	DatabaseExecutor,
	DefineTableOptions,
	Dialect,
	Row,
	StorageEngine,
	TableSpec,
} from '../types';

type ColumnKind = ColumnType['kind'];

const COLUMN_TYPES: Record<Dialect, Record<ColumnKind, string>> = {
	sqlite: {
		string: 'TEXT',
		integer: 'INTEGER',
		double: 'REAL',
		boolean: 'INTEGER',
		json: 'TEXT',
		date: 'TEXT',
		time: 'TEXT',
		datetime: 'TEXT',
		reference: 'INTEGER',
		'list:reference': 'TEXT',
	},
	postgres: {
		string: 'TEXT',
		integer: 'BIGINT',
		double: 'DOUBLE PRECISION',
		boolean: 'BOOLEAN',
		json: 'JSONB',
		date: 'DATE',
		time: 'TIME',
		datetime: 'TIMESTAMP',
		reference: 'BIGINT',
		'list:reference': 'JSONB',
	},
};

export function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

function makePlaceholderFactory(dialect: Dialect) {
	if (dialect === 'sqlite') {
		return (_index: number) => '?';
	}
	return (index: number) => `$${index + 1}`;
}

function isJsonColumn(type: ColumnType | undefined): boolean {
	return type !== undefined && (type.kind === 'json' || type.kind === 'list:reference');
}

export function encodeValue(type: ColumnType | undefined, value: unknown, dialect: Dialect): unknown {
	if (value === null || value === undefined) return null;
	if (isJsonColumn(type)) return JSON.stringify(value);
	if (typeof value === 'boolean') return dialect === 'sqlite' ? (value ? 1 : 0) : value;
	if (value instanceof Date) return value.toISOString();
	if (typeof value === 'object' && !(value instanceof Uint8Array)) return JSON.stringify(value);
	return value;
}

export function decodeValue(type: ColumnType | undefined, raw: unknown): unknown {
	if (raw === null || raw === undefined) return null;
	if (!type) return raw;
	if (isJsonColumn(type) && typeof raw === 'string') {
		try {
			return JSON.parse(raw);
		} catch {
			// written before the column was declared as JSON
			return raw;
		}
	}
	if (type.kind === 'boolean' && typeof raw === 'number') return raw !== 0;
	if ((type.kind === 'integer' || type.kind === 'reference') && typeof raw === 'string' && /^-?\d+$/.test(raw)) return Number(raw);
	return raw;
}

function sqlLiteral(value: unknown, dialect: Dialect): string {
	if (value === null || value === undefined) return 'NULL';
	if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'NULL';
	if (typeof value === 'boolean') return dialect === 'sqlite' ? (value ? '1' : '0') : value ? 'TRUE' : 'FALSE';
	return `'${String(value).replace(/'/g, "''")}'`;
}

/**
 * StorageEngine over a DatabaseExecutor (sql.js, better-sqlite3, or any driver wrapped to the
 * executor contract). Table definitions are remembered so values can be encoded on write and
 * decoded on read.
 */
export class SqlStorage implements StorageEngine {
	private readonly db: DatabaseExecutor;
	private readonly dialect: Dialect;
	private readonly placeholder: (index: number) => string;
	private readonly tables = new Map<string, TableSpec>();

	constructor(db: DatabaseExecutor) {
		this.db = db;
		this.dialect = db.dialect;
		this.placeholder = makePlaceholderFactory(db.dialect);
	}

	async hasTable(table: string): Promise<boolean> {
		const sql =
			this.dialect === 'sqlite'
				? `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`
				: `SELECT table_name AS name FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = $1`;
		const row = await this.guard('hasTable', table, () => this.db.get(sql, [table]));
		return row !== undefined;
	}

	async tableColumns(table: string): Promise<string[]> {
		const rows = await this.guard('tableColumns', table, () =>
			this.dialect === 'sqlite'
				? this.db.all<{ name: unknown }>(`PRAGMA table_info(${quoteIdent(table)})`)
				: this.db.all<{ name: unknown }>(
						`SELECT column_name AS name FROM information_schema.columns WHERE table_schema = current_schema() AND table_name = $1 ORDER BY ordinal_position`,
						[table],
					),
		);
		return rows.map((r) => String(r.name));
	}

	async defineTable(table: string, spec: TableSpec, options: DefineTableOptions = {}): Promise<void> {
		if (options.migrate !== false) {
			const columns = [this.primaryKeyDefinition(spec.primaryKey)];
			for (const column of spec.columns) columns.push(this.columnDefinition(column, true));
			const sql = `CREATE TABLE IF NOT EXISTS ${quoteIdent(table)} (${columns.join(', ')})`;
			await this.guard('defineTable', table, () => this.db.run(sql));
			await this.addMissingColumns(table, spec);
		}
		this.remember(table, spec);
	}

	async redefineTable(table: string, spec: TableSpec, options: DefineTableOptions = {}): Promise<void> {
		if (options.migrate !== false) await this.addMissingColumns(table, spec);
		this.remember(table, spec);
	}

	async lookupRow(table: string, key: number): Promise<Row | undefined> {
		const pk = this.primaryKey(table);
		const sql = `SELECT * FROM ${quoteIdent(table)} WHERE ${quoteIdent(pk)} = ${this.placeholder(0)} LIMIT 1`;
		const row = await this.guard('lookupRow', table, () => this.db.get(sql, [key]));
		return row ? this.decodeRow(table, row) : undefined;
	}

	async updateRow(table: string, key: number, values: Row): Promise<void> {
		const pk = this.primaryKey(table);
		const columns = Object.keys(values).filter((c) => c !== pk);
		if (columns.length === 0) return;
		const assigns = columns.map((c, i) => `${quoteIdent(c)} = ${this.placeholder(i)}`).join(', ');
		const sql = `UPDATE ${quoteIdent(table)} SET ${assigns} WHERE ${quoteIdent(pk)} = ${this.placeholder(columns.length)}`;
		const params = [...columns.map((c) => this.encode(table, c, values[c])), key];
		await this.guard('updateRow', table, () => this.db.run(sql, params));
	}

	async insertRow(table: string, values: Row): Promise<number> {
		return this.guard('insertRow', table, () => this.insertWith(this.db, table, values));
	}

	async bulkInsertRows(table: string, rows: readonly Row[]): Promise<number[]> {
		if (rows.length === 0) return [];
		return this.guard('bulkInsertRows', table, () =>
			this.db.transaction(async (tx) => {
				const keys: number[] = [];
				for (const row of rows) keys.push(await this.insertWith(tx, table, row));
				return keys;
			}),
		);
	}

	async query(table: string, where: Row): Promise<Row[]> {
		const clauses: string[] = [];
		const params: unknown[] = [];
		for (const [column, value] of Object.entries(where)) {
			if (value === null || value === undefined) {
				clauses.push(`${quoteIdent(column)} IS NULL`);
			} else {
				clauses.push(`${quoteIdent(column)} = ${this.placeholder(params.length)}`);
				params.push(this.encode(table, column, value));
			}
		}
		const filter = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
		const sql = `SELECT * FROM ${quoteIdent(table)}${filter} ORDER BY ${quoteIdent(this.primaryKey(table))}`;
		const rows = await this.guard('query', table, () => this.db.all(sql, params));
		return rows.map((row) => this.decodeRow(table, row));
	}

	private async insertWith(db: DatabaseExecutor, table: string, values: Row): Promise<number> {
		const columns = Object.keys(values);
		const params = columns.map((c) => this.encode(table, c, values[c]));
		const head =
			columns.length > 0
				? `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(', ')}) VALUES (${columns.map((_, i) => this.placeholder(i)).join(', ')})`
				: `INSERT INTO ${quoteIdent(table)} DEFAULT VALUES`;
		let row: { id: unknown } | undefined;
		if (this.dialect === 'sqlite') {
			await db.run(head, params);
			row = await db.get<{ id: unknown }>(`SELECT last_insert_rowid() AS id`);
		} else {
			row = await db.get<{ id: unknown }>(`${head} RETURNING ${quoteIdent(this.primaryKey(table))} AS id`, params);
		}
		const key = Number(row?.id);
		if (!Number.isInteger(key)) throw new StorageError('INTERNAL', `Insert into ${table} did not return a key`, { table });
		return key;
	}

	private primaryKeyDefinition(pk: string): string {
		return this.dialect === 'sqlite'
			? `${quoteIdent(pk)} INTEGER PRIMARY KEY AUTOINCREMENT`
			: `${quoteIdent(pk)} BIGSERIAL PRIMARY KEY`;
	}

	private columnDefinition(column: ColumnSpec, creating: boolean): string {
		// no REFERENCES clause: integer keys are stored unchecked and a cyclic target may not exist yet
		let def = `${quoteIdent(column.name)} ${COLUMN_TYPES[this.dialect][column.type.kind]}`;
		const hasDefault = column.defaultValue !== undefined;
		if (hasDefault) def += ` DEFAULT ${sqlLiteral(encodeValue(column.type, column.defaultValue, this.dialect), this.dialect)}`;
		// added columns must accept the existing rows
		if (column.notNull && (creating || hasDefault)) def += ' NOT NULL';
		return def;
	}

	private async addMissingColumns(table: string, spec: TableSpec): Promise<void> {
		const existing = new Set(await this.tableColumns(table));
		for (const column of spec.columns) {
			if (existing.has(column.name) || column.name === spec.primaryKey) continue;
			const sql = `ALTER TABLE ${quoteIdent(table)} ADD COLUMN ${this.columnDefinition(column, false)}`;
			await this.guard('redefineTable', table, () => this.db.run(sql));
		}
	}

	private remember(table: string, spec: TableSpec): void {
		const previous = this.tables.get(table);
		const names = new Set(spec.columns.map((c) => c.name));
		const kept = previous ? previous.columns.filter((c) => !names.has(c.name)) : [];
		this.tables.set(table, { primaryKey: spec.primaryKey, columns: [...kept, ...spec.columns] });
	}

	private primaryKey(table: string): string {
		return this.tables.get(table)?.primaryKey ?? 'id';
	}

	private columnType(table: string, column: string): ColumnType | undefined {
		return this.tables.get(table)?.columns.find((c) => c.name === column)?.type;
	}

	private encode(table: string, column: string, value: unknown): unknown {
		return encodeValue(this.columnType(table, column), value, this.dialect);
	}

	private decodeRow(table: string, row: Record<string, unknown>): Row {
		const pk = this.primaryKey(table);
		const out: Row = {};
		for (const [column, raw] of Object.entries(row)) {
			out[column] = column === pk ? decodeValue({ kind: 'integer' }, raw) : decodeValue(this.columnType(table, column), raw);
		}
		return out;
	}

	private async guard<T>(op: string, table: string, fn: () => Promise<T> | T): Promise<T> {
		try {
			return await fn();
		} catch (e) {
			throw toStorageError(e, { op, table });
		}
	}
}
