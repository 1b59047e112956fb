import { parseOptions, typeOptionsSchema, type JsonTypeOptions } from './config';
import { SyncContext } from './context';
import { DefinitionError, InvalidValueError, NotFoundError, ParseError, StorageError } from './errors';
import { isTemporalType, type JsonField } from './field';
import { discoverExtraFields, inferColumnTypes, type ObservedKinds } from './inference';
import type { Logger } from './logger';
import type { JsonRegistry } from './registry';
import { parseTemporal } from './temporal';
import type { Document, Row, SyncOptions } from './types';
import { isIntegerKey, isPlainDocument } from './utils';

/**
 * A named document schema and the sync engine that upserts documents into its table.
 */
export class JsonType {
  readonly name: string;
  readonly tableName: string;
  readonly fields: readonly JsonField[];
  /** Null out stored columns a full (non-partial) document omits. */
  readonly removeMissingFields: boolean;
  readonly primaryKey: string;
  private readonly registry: JsonRegistry;
  private readonly fieldsByName: ReadonlyMap<string, JsonField>;
  private readonly declaredColumns: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(registry: JsonRegistry, name: string, fields: readonly JsonField[], options?: JsonTypeOptions) {
    if (!name) throw new DefinitionError('Type name must be a non-empty string');
    const parsed = parseOptions(typeOptionsSchema, options, `options for type ${name}`);
    this.registry = registry;
    this.name = name;
    this.tableName = parsed.tableName ?? name;
    this.removeMissingFields = parsed.removeMissingFields;
    this.primaryKey = parsed.primaryKey;

    const byName = new Map<string, JsonField>();
    const columns = new Set<string>();
    for (const field of fields) {
      if (byName.has(field.fieldname)) {
        throw new DefinitionError(`Duplicate field ${field.fieldname} in type ${name}`, { type: name, fieldname: field.fieldname });
      }
      if (columns.has(field.columnName)) {
        throw new DefinitionError(`Duplicate column ${field.columnName} in type ${name}`, { type: name, column: field.columnName });
      }
      if (field.fieldname === this.primaryKey || field.columnName === this.primaryKey) {
        throw new DefinitionError(`Field ${field.fieldname} collides with primary key ${this.primaryKey} of type ${name}`, {
          type: name,
          fieldname: field.fieldname,
        });
      }
      byName.set(field.fieldname, field);
      columns.add(field.columnName);
    }
    this.fields = [...fields];
    this.fieldsByName = byName;
    this.declaredColumns = columns;
    this.logger = registry.logger.child({ type: name });
  }

  hasField(fieldname: string): boolean {
    return this.fieldsByName.has(fieldname);
  }

  field(fieldname: string): JsonField {
    const field = this.fieldsByName.get(fieldname);
    if (!field) throw new NotFoundError(`Type ${this.name} has no field ${fieldname}`, { type: this.name, fieldname });
    return field;
  }

  /**
   * Upsert one document, extending the schema with any field not seen before.
   *
   * @returns the resolved row, including its primary key
   */
  async sync(document: Document, options: SyncOptions = {}): Promise<Row> {
    return this.syncInContext(SyncContext.forDocument(this, document, options.partial ?? false));
  }

  /**
   * Upsert a batch: one schema extension for the whole batch, one update attempt per
   * document, then a single bulk insert of the documents that were not found.
   *
   * @returns resolved rows in input order
   */
  async bulkSync(documents: readonly Document[], options: SyncOptions = {}): Promise<Row[]> {
    return this.bulkSyncInContext(SyncContext.forBatch(this, documents, options.partial ?? false));
  }

  /** @internal entry point for referenced documents */
  async syncInContext(context: SyncContext): Promise<Row> {
    const document = context.data;
    if (!isPlainDocument(document)) throw new InvalidValueError(`Type ${this.name} can only sync a JSON object`);
    await this.prepareSchema([document]);
    const row = await this.buildRow(document, context);
    if (await this.upsertRow(row, context.partial)) {
      this.logger.debug({ table: this.tableName, key: row[this.primaryKey], depth: context.depth }, 'updated row');
      return row;
    }
    const key = await this.registry.storage.insertRow(this.tableName, this.insertable(row));
    this.logger.debug({ table: this.tableName, key, depth: context.depth }, 'inserted row');
    return { ...row, [this.primaryKey]: key };
  }

  /** @internal entry point for referenced batches */
  async bulkSyncInContext(context: SyncContext): Promise<Row[]> {
    const documents = context.batch ?? [];
    await this.prepareSchema(documents);

    const rows: Row[] = [];
    const pending: Row[] = [];
    const slots: number[] = [];
    for (const [index, document] of documents.entries()) {
      context.index = index;
      context.data = document;
      const row = await this.buildRow(document, context);
      rows.push(row);
      if (!(await this.upsertRow(row, context.partial))) {
        pending.push(this.insertable(row));
        slots.push(index);
      }
    }

    if (pending.length > 0) {
      const keys = await this.registry.storage.bulkInsertRows(this.tableName, pending);
      if (keys.length !== pending.length) {
        throw new StorageError('INTERNAL', `Bulk insert into ${this.tableName} returned ${keys.length} keys for ${pending.length} rows`);
      }
      slots.forEach((slot, i) => {
        rows[slot] = { ...rows[slot], [this.primaryKey]: keys[i] };
      });
    }
    this.logger.debug(
      { table: this.tableName, updated: rows.length - pending.length, inserted: pending.length, depth: context.depth },
      'synced batch',
    );
    return rows;
  }

  /**
   * Kinds observed for every top-level key of `documents` that is not a known field, a declared
   * column or the primary key.
   */
  discoverExtraFields(known: ReadonlyMap<string, JsonField>, documents: readonly Document[]): ObservedKinds {
    const names = new Set([...known.keys(), ...this.declaredColumns]);
    const observed: ObservedKinds = new Map();
    for (const document of documents) {
      if (!isPlainDocument(document)) throw new InvalidValueError(`Type ${this.name} can only sync JSON objects`, { document });
      discoverExtraFields(names, this.primaryKey, document, observed);
    }
    return observed;
  }

  /**
   * Resolve a document into a row: undeclared keys pass through, declared fields are
   * computed, parsed or resolved into foreign keys, in declaration order.
   */
  async buildRow(document: Document, context: SyncContext): Promise<Row> {
    const row: Row = {};
    const columns = new Set(await this.registry.storage.tableColumns(this.tableName));
    for (const [key, value] of Object.entries(document)) {
      if (this.fieldsByName.has(key) || this.declaredColumns.has(key)) continue;
      if ((value !== null && value !== undefined) || columns.has(key)) row[key] = value ?? null;
    }

    for (const field of this.fields) {
      if (field.compute) {
        row[field.columnName] = field.compute(row, context);
        continue;
      }
      const present = Object.hasOwn(document, field.fieldname);
      if (context.partial && !present) continue;
      const value = present ? document[field.fieldname] : undefined;
      if (value === null || value === undefined) {
        row[field.columnName] = null;
        continue;
      }
      row[field.columnName] = await this.resolveValue(field, value, context);
    }
    return row;
  }

  /**
   * Update the stored row with the same primary key.
   *
   * @returns false when the row has no key or no stored row matches it
   */
  async upsertRow(row: Row, partial = false): Promise<boolean> {
    const key = row[this.primaryKey];
    if (key === null || key === undefined) return false;
    if (!isIntegerKey(key)) {
      throw new InvalidValueError(`Primary key ${this.primaryKey} of type ${this.name} must be an integer`, { value: key });
    }
    const storage = this.registry.storage;
    const existing = await storage.lookupRow(this.tableName, key);
    if (!existing) return false;

    let values = row;
    if (this.removeMissingFields && !partial) {
      const missing = Object.keys(existing).filter((column) => !Object.hasOwn(row, column));
      if (missing.length > 0) {
        values = { ...row };
        for (const column of missing) values[column] = null;
      }
    }
    await storage.updateRow(this.tableName, key, values);
    return true;
  }

  /** Primary key of a row this type has synced. */
  keyOf(row: Row): number {
    const key = row[this.primaryKey];
    if (!isIntegerKey(key)) {
      throw new InvalidValueError(`Row of type ${this.name} has no integer ${this.primaryKey}`, { value: key });
    }
    return key;
  }

  private async prepareSchema(documents: readonly Document[]): Promise<void> {
    const known = await this.registry.knownFields(this);
    const inferred = inferColumnTypes(this.discoverExtraFields(known, documents));
    if (inferred.size > 0) await this.registry.extendFields(this, inferred);
    else await this.registry.ensureSchema(this, known);
  }

  private insertable(row: Row): Row {
    const key = row[this.primaryKey];
    if (key !== null && key !== undefined) return row;
    const rest = { ...row };
    delete rest[this.primaryKey];
    return rest;
  }

  private async resolveValue(field: JsonField, value: unknown, context: SyncContext): Promise<unknown> {
    const { type } = field;
    if (isTemporalType(type.kind)) {
      try {
        return parseTemporal(field.fieldname, type.kind, value, field);
      } catch (e) {
        if (e instanceof ParseError) this.logger.error({ field: field.fieldname, value }, 'error parsing date string');
        throw e;
      }
    }
    if (!('target' in type)) return value;
    const target = this.registry.get(type.target);
    if (type.kind === 'reference') return this.resolveReference(field, target, value, context);
    return this.resolveReferenceList(field, target, value, context);
  }

  private async resolveReference(field: JsonField, target: JsonType, value: unknown, context: SyncContext): Promise<number> {
    // integers are taken as existing keys without an existence check
    if (isIntegerKey(value)) return value;
    if (!isPlainDocument(value)) {
      throw new InvalidValueError(`Field ${field.fieldname} of type ${this.name} expects an integer key or a ${target.name} document`, {
        value,
      });
    }
    const child = await target.syncInContext(context.child(target, { data: value }));
    return target.keyOf(child);
  }

  private async resolveReferenceList(field: JsonField, target: JsonType, value: unknown, context: SyncContext): Promise<number[]> {
    const items: readonly unknown[] = Array.isArray(value) ? value : [value];
    const keys: number[] = new Array<number>(items.length);
    const documents: Document[] = [];
    const slots: number[] = [];
    items.forEach((item, i) => {
      if (isIntegerKey(item)) {
        keys[i] = item;
      } else if (isPlainDocument(item)) {
        documents.push(item);
        slots.push(i);
      } else {
        throw new InvalidValueError(`Field ${field.fieldname} of type ${this.name} expects integer keys or ${target.name} documents`, {
          value: item,
          index: i,
        });
      }
    });
    if (documents.length > 0) {
      const children = await target.bulkSyncInContext(context.child(target, { batch: documents }));
      children.forEach((child, j) => {
        keys[slots[j]] = target.keyOf(child);
      });
    }
    return keys;
  }
}
