import { fieldOptionsSchema, parseOptions, type ComputeFn, type JsonFieldOptions } from './config';
import { DefinitionError } from './errors';
import type { ColumnSpec, ColumnType, FieldType, ReferenceKind, ScalarType, TemporalType } from './types';

const SCALAR_TYPES: readonly ScalarType[] = ['string', 'integer', 'double', 'boolean', 'json'];
const TEMPORAL_TYPES: readonly TemporalType[] = ['date', 'time', 'datetime'];
const REFERENCE_PATTERN = /^(reference|list:reference) (\w+)$/;

function isScalarType(value: string): value is ScalarType {
  return SCALAR_TYPES.some((type) => type === value);
}

export function isTemporalType(value: string): value is TemporalType {
  return TEMPORAL_TYPES.some((type) => type === value);
}

/**
 * Parse a field type string such as `integer` or `list:reference Tag`.
 *
 * @throws DefinitionError for anything outside the type vocabulary.
 */
export function parseFieldType(type: string): FieldType {
  if (isScalarType(type) || isTemporalType(type)) return { kind: type };
  const match = REFERENCE_PATTERN.exec(type);
  if (match) {
    const kind: ReferenceKind = match[1] === 'reference' ? 'reference' : 'list:reference';
    return { kind, target: match[2] ?? '' };
  }
  throw new DefinitionError(`Invalid field type: ${JSON.stringify(type)}`, { type });
}

export function formatFieldType(type: FieldType): string {
  return 'target' in type ? `${type.kind} ${type.target}` : type.kind;
}

/**
 * One logical attribute of a JSON document and the column it is stored in.
 */
export class JsonField {
  readonly fieldname: string;
  readonly columnName: string;
  readonly type: FieldType;
  readonly compute?: ComputeFn;
  readonly dateFormat?: string;
  readonly parseOptions?: { additionalDigits?: 0 | 1 | 2 };
  readonly notNull: boolean;
  readonly defaultValue?: unknown;

  constructor(fieldname: string, type = 'string', options: JsonFieldOptions = {}) {
    if (!fieldname) throw new DefinitionError('Field name must be a non-empty string');
    const parsed = parseOptions(fieldOptionsSchema, options, `options for field ${fieldname}`);
    this.fieldname = fieldname;
    this.type = parseFieldType(type);
    this.columnName = parsed.columnName ?? fieldname;
    this.compute = parsed.compute;
    this.dateFormat = parsed.dateFormat;
    this.parseOptions = parsed.parseOptions;
    this.notNull = parsed.notNull ?? false;
    this.defaultValue = parsed.defaultValue;
  }

  /** The type as written in the catalog, e.g. `reference Person`. */
  get typeName(): string {
    return formatFieldType(this.type);
  }

  /**
   * Storage column for this field.
   *
   * @param resolveTable - maps a referenced Type name to its table name
   */
  column(resolveTable: (typeName: string) => string): ColumnSpec {
    const type: ColumnType = 'target' in this.type
      ? { kind: this.type.kind, table: resolveTable(this.type.target) }
      : { kind: this.type.kind };
    return {
      name: this.columnName,
      type,
      ...(this.notNull ? { notNull: true } : {}),
      ...(this.defaultValue !== undefined ? { defaultValue: this.defaultValue } : {}),
    };
  }
}

/**
 * Declare a field.
 *
 * @example
 * const born = jsonField('born', 'date', { dateFormat: 'dd/MM/yyyy' });
 * const tags = jsonField('tags', 'list:reference Tag');
 */
export function jsonField(fieldname: string, type?: string, options?: JsonFieldOptions): JsonField {
  return new JsonField(fieldname, type, options);
}
