import { z } from 'zod';
import { loadConfig, type JsonTypeOptions, type RegistryConfig, type RegistryConfigInput } from './config';
import { DefinitionError, StorageError, TypeReferenceError } from './errors';
import { JsonField, parseFieldType } from './field';
import { createLogger, type Logger } from './logger';
import { JsonType } from './type';
import type { CatalogEntry, StorageEngine, TableSpec } from './types';

export interface RegistryOptions extends RegistryConfigInput {
  /** Defaults to a pino logger at `logLevel`. */
  logger?: Logger;
}

const CATALOG_SPEC: TableSpec = {
  primaryKey: 'id',
  columns: [
    { name: 'type', type: { kind: 'string' }, notNull: true },
    { name: 'fieldname', type: { kind: 'string' }, notNull: true },
    { name: 'column_name', type: { kind: 'string' } },
    { name: 'db_type', type: { kind: 'string' }, notNull: true },
  ],
};

const catalogEntrySchema = z.object({
  type: z.string(),
  fieldname: z.string(),
  column_name: z.string().nullable(),
  db_type: z.string(),
});

/**
 * Owns every Type definition and the Known-Fields Catalog, and mediates all schema changes.
 *
 * @example
 * const registry = createRegistry(new SqlStorage(await SQLJsExecutor.create()));
 * const Person = registry.defineType('Person', [jsonField('name'), jsonField('age', 'integer')]);
 * await Person.sync({ name: 'Ann', age: 30, nickname: 'A' });
 */
export class JsonRegistry {
  readonly storage: StorageEngine;
  readonly logger: Logger;
  readonly config: RegistryConfig;
  private readonly byName = new Map<string, JsonType>();
  /** Fieldnames each applied type's table was last defined with. */
  private readonly applied = new Map<string, ReadonlySet<string>>();
  private catalogReady = false;

  constructor(storage: StorageEngine, options: RegistryOptions = {}) {
    const { logger, ...config } = options;
    this.storage = storage;
    this.config = loadConfig(config);
    this.logger = logger ?? createLogger('registry', this.config.logLevel);
  }

  get types(): JsonType[] {
    return [...this.byName.values()];
  }

  defineType(name: string, fields: readonly JsonField[] = [], options?: JsonTypeOptions): JsonType {
    if (this.byName.has(name)) throw new DefinitionError(`Type already defined: ${name}`, { name });
    const type = new JsonType(this, name, fields, options);
    this.byName.set(name, type);
    return type;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): JsonType {
    const type = this.byName.get(name);
    if (!type) throw new TypeReferenceError(name);
    return type;
  }

  tableFor(typeName: string): string {
    return this.get(typeName).tableName;
  }

  async catalogEntries(type: JsonType): Promise<CatalogEntry[]> {
    await this.ensureCatalog();
    const rows = await this.storage.query(this.config.catalogTable, { type: type.name });
    return rows.map((row) => {
      const parsed = catalogEntrySchema.safeParse(row);
      if (!parsed.success) {
        throw new StorageError('INTERNAL', `Malformed catalog entry for type ${type.name}`, { row });
      }
      return parsed.data;
    });
  }

  /**
   * Declared fields of the type plus every catalog entry it does not declare.
   */
  async knownFields(type: JsonType): Promise<Map<string, JsonField>> {
    const fields = new Map<string, JsonField>(type.fields.map((field) => [field.fieldname, field]));
    for (const entry of await this.catalogEntries(type)) {
      if (fields.has(entry.fieldname)) continue;
      fields.set(
        entry.fieldname,
        new JsonField(entry.fieldname, entry.db_type, { columnName: entry.column_name ?? entry.fieldname }),
      );
    }
    return fields;
  }

  /**
   * Create or additively migrate the table of `type`. Referenced types are applied first.
   */
  async applySchema(type: JsonType): Promise<void> {
    await this.applyWithReferences(type, new Set());
  }

  /**
   * Apply the schema of `type` once per registry, and again when `known` holds fields
   * cataloged elsewhere since the last application.
   */
  async ensureSchema(type: JsonType, known?: ReadonlyMap<string, JsonField>): Promise<void> {
    const applied = this.applied.get(type.name);
    if (applied && (!known || [...known.keys()].every((fieldname) => applied.has(fieldname)))) return;
    await this.applySchema(type);
  }

  /** Define the tables of every registered type. */
  async defineTables(): Promise<void> {
    for (const type of this.byName.values()) await this.applySchema(type);
  }

  /**
   * Record newly discovered fields in the catalog and extend the table. Fields already
   * declared or cataloged are skipped.
   */
  async extendFields(type: JsonType, newFields: ReadonlyMap<string, string>): Promise<void> {
    if (newFields.size === 0) return;
    const cataloged = new Set((await this.catalogEntries(type)).map((entry) => entry.fieldname));
    const rows: CatalogEntry[] = [];
    for (const [fieldname, dbType] of newFields) {
      parseFieldType(dbType);
      if (type.hasField(fieldname) || cataloged.has(fieldname)) continue;
      rows.push({ type: type.name, fieldname, column_name: fieldname, db_type: dbType });
    }
    if (rows.length > 0) {
      await this.storage.bulkInsertRows(this.config.catalogTable, rows);
      this.logger.info(
        { type: type.name, table: type.tableName, fields: Object.fromEntries(rows.map((r) => [r.fieldname, r.db_type])) },
        'extending schema',
      );
    }
    await this.applySchema(type);
  }

  private async ensureCatalog(): Promise<void> {
    if (this.catalogReady) return;
    await this.storage.defineTable(this.config.catalogTable, CATALOG_SPEC, { migrate: this.config.migrate });
    this.catalogReady = true;
  }

  private async applyWithReferences(type: JsonType, applying: Set<string>): Promise<void> {
    applying.add(type.name);
    for (const field of type.fields) {
      if (!('target' in field.type)) continue;
      const target = this.get(field.type.target);
      if (this.applied.has(target.name) || applying.has(target.name)) continue;
      await this.applyWithReferences(target, applying);
    }

    const fields = await this.knownFields(type);
    const spec: TableSpec = {
      primaryKey: type.primaryKey,
      columns: [...fields.values()].map((field) => field.column((name) => this.tableFor(name))),
    };
    const options = { migrate: this.config.migrate };
    if (await this.storage.hasTable(type.tableName)) {
      await this.storage.redefineTable(type.tableName, spec, options);
    } else {
      await this.storage.defineTable(type.tableName, spec, options);
    }
    this.applied.set(type.name, new Set(fields.keys()));
  }
}

export function createRegistry(storage: StorageEngine, options?: RegistryOptions): JsonRegistry {
  return new JsonRegistry(storage, options);
}
