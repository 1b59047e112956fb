export { JsonRegistry, createRegistry, type RegistryOptions } from './registry';
export { JsonType } from './type';
export { JsonField, jsonField, parseFieldType, formatFieldType } from './field';
export { SyncContext, type ContextPayload } from './context';
export { discoverExtraFields, inferColumnType, inferColumnTypes, valueKind, type ObservedKinds, type ValueKind } from './inference';
export { parseTemporal, type TemporalOptions } from './temporal';
export {
  loadConfig,
  type ComputeFn,
  type JsonFieldOptions,
  type JsonTypeOptions,
  type RegistryConfig,
  type RegistryConfigInput,
} from './config';
export { createLogger, type Logger, type LevelWithSilent } from './logger';
export * from './errors';
export { SqlStorage } from './storage/sql';
export { MemoryStorage } from './storage/memory';
export type * from './types';
