export type ErrorCode = 'DEFINITION' | 'PARSE' | 'REFERENCE' | 'NOT_FOUND' | 'INVALID_VALUE' | 'STORAGE';

export class JsonSyncError extends Error {
	code: ErrorCode;
	details?: Record<string, unknown>;

	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
		super(message);
		this.name = 'JsonSyncError';
		this.code = code;
		this.details = details;
	}
}

/** Invalid field descriptor or type/registry configuration. Raised at definition time. */
export class DefinitionError extends JsonSyncError {
	constructor(message: string, details?: Record<string, unknown>) {
		super('DEFINITION', message, details);
		this.name = 'DefinitionError';
	}
}

export class ParseError extends JsonSyncError {
	readonly fieldname: string;
	readonly value: unknown;

	constructor(fieldname: string, value: unknown, message?: string) {
		super('PARSE', message ?? `Error parsing date string ${JSON.stringify(value)} for field ${fieldname}`, { fieldname, value });
		this.name = 'ParseError';
		this.fieldname = fieldname;
		this.value = value;
	}
}

/** A Type name that is not registered. */
export class TypeReferenceError extends JsonSyncError {
	readonly typeName: string;

	constructor(typeName: string) {
		super('REFERENCE', `Unknown type: ${typeName}`, { typeName });
		this.name = 'TypeReferenceError';
		this.typeName = typeName;
	}
}

export class NotFoundError extends JsonSyncError {
	constructor(message: string, details?: Record<string, unknown>) {
		super('NOT_FOUND', message, details);
		this.name = 'NotFoundError';
	}
}

export class InvalidValueError extends JsonSyncError {
	constructor(message: string, details?: Record<string, unknown>) {
		super('INVALID_VALUE', message, details);
		this.name = 'InvalidValueError';
	}
}

export type StorageFailure = 'CONFLICT' | 'INTERNAL';

export class StorageError extends JsonSyncError {
	reason: StorageFailure;

	constructor(reason: StorageFailure, message: string, details?: Record<string, unknown>) {
		super('STORAGE', message, details);
		this.name = 'StorageError';
		this.reason = reason;
	}
}

export function mapSqlErrorToReason(message: string): StorageFailure {
	if (/unique|duplicate key/i.test(message)) return 'CONFLICT';
	return 'INTERNAL';
}

export function toStorageError(e: unknown, details?: Record<string, unknown>): StorageError {
	if (e instanceof StorageError) return e;
	const message = e instanceof Error ? e.message : String(e);
	const err = new StorageError(mapSqlErrorToReason(message), message || 'storage failure', details);
	if (e instanceof Error) err.cause = e;
	return err;
}

export function isJsonSyncError(e: unknown): e is JsonSyncError {
	return e instanceof JsonSyncError;
}
