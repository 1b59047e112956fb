import { StorageError } from '../errors';
import type { ColumnSpec, DefineTableOptions, Row, StorageEngine, TableSpec } from '../types';
import { isIntegerKey } from '../utils';

type MemoryTable = {
	primaryKey: string;
	columns: Map<string, ColumnSpec | undefined>;
	rows: Map<number, Row>;
	nextId: number;
};

/**
 * In-memory StorageEngine backed by Maps. Useful for tests and examples.
 *
 * Mirrors a relational table: writes to unknown columns fail, keys are unique, and
 * every stored row carries every column.
 */
export class MemoryStorage implements StorageEngine {
	private readonly tables = new Map<string, MemoryTable>();

	async hasTable(table: string): Promise<boolean> {
		return this.tables.has(table);
	}

	async tableColumns(table: string): Promise<string[]> {
		const t = this.tables.get(table);
		return t ? [...t.columns.keys()] : [];
	}

	async defineTable(table: string, spec: TableSpec, options: DefineTableOptions = {}): Promise<void> {
		if (this.tables.has(table)) return this.redefineTable(table, spec, options);
		if (options.migrate === false) {
			throw new StorageError('INTERNAL', `no such table: ${table} (migrations disabled)`, { table });
		}
		const columns = new Map<string, ColumnSpec | undefined>([[spec.primaryKey, undefined]]);
		for (const column of spec.columns) columns.set(column.name, column);
		this.tables.set(table, { primaryKey: spec.primaryKey, columns, rows: new Map(), nextId: 1 });
	}

	async redefineTable(table: string, spec: TableSpec, options: DefineTableOptions = {}): Promise<void> {
		if (!this.tables.has(table)) return this.defineTable(table, spec, options);
		if (options.migrate === false) return;
		const t = this.table(table);
		for (const column of spec.columns) {
			if (t.columns.has(column.name)) continue;
			t.columns.set(column.name, column);
			for (const row of t.rows.values()) row[column.name] = column.defaultValue ?? null;
		}
	}

	async lookupRow(table: string, key: number): Promise<Row | undefined> {
		const row = this.table(table).rows.get(key);
		return row ? structuredClone(row) : undefined;
	}

	async updateRow(table: string, key: number, values: Row): Promise<void> {
		const t = this.table(table);
		this.checkColumns(table, t, values);
		const row = t.rows.get(key);
		if (!row) return;
		for (const [column, value] of Object.entries(values)) {
			if (column === t.primaryKey) continue;
			row[column] = value === undefined ? null : structuredClone(value);
		}
	}

	async insertRow(table: string, values: Row): Promise<number> {
		const t = this.table(table);
		this.checkColumns(table, t, values);
		const given = values[t.primaryKey];
		if (given !== null && given !== undefined && !isIntegerKey(given)) {
			throw new StorageError('INTERNAL', `datatype mismatch for ${table}.${t.primaryKey}`, { table, value: given });
		}
		const key = isIntegerKey(given) ? given : t.nextId;
		if (t.rows.has(key)) {
			throw new StorageError('CONFLICT', `UNIQUE constraint failed: ${table}.${t.primaryKey}`, { table, key });
		}
		const row: Row = {};
		for (const [name, column] of t.columns) row[name] = column?.defaultValue ?? null;
		for (const [column, value] of Object.entries(values)) row[column] = value === undefined ? null : structuredClone(value);
		row[t.primaryKey] = key;
		t.rows.set(key, row);
		t.nextId = Math.max(t.nextId, key + 1);
		return key;
	}

	async bulkInsertRows(table: string, rows: readonly Row[]): Promise<number[]> {
		const keys: number[] = [];
		for (const row of rows) keys.push(await this.insertRow(table, row));
		return keys;
	}

	async query(table: string, where: Row): Promise<Row[]> {
		const t = this.table(table);
		const conditions = Object.entries(where);
		return [...t.rows.entries()]
			.sort(([a], [b]) => a - b)
			.map(([, row]) => row)
			.filter((row) => conditions.every(([column, value]) => (row[column] ?? null) === (value ?? null)))
			.map((row) => structuredClone(row));
	}

	private table(name: string): MemoryTable {
		const t = this.tables.get(name);
		if (!t) throw new StorageError('INTERNAL', `no such table: ${name}`, { table: name });
		return t;
	}

	private checkColumns(name: string, t: MemoryTable, values: Row): void {
		for (const column of Object.keys(values)) {
			if (!t.columns.has(column)) {
				throw new StorageError('INTERNAL', `table ${name} has no column named ${column}`, { table: name, column });
			}
		}
	}
}
