import { z } from 'zod';
import { DefinitionError } from './errors';
import type { Row } from './types';
import type { SyncContext } from './context';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const registryConfigSchema = z
  .object({
    /** Table holding the Known-Fields Catalog. */
    catalogTable: z.string().min(1).default('json_type_registry'),
    /** Issue DDL when tables are defined or extended. */
    migrate: z.boolean().default(true),
    logLevel: z.enum(LOG_LEVELS).default('info'),
  })
  .strict();

export type RegistryConfig = z.output<typeof registryConfigSchema>;
export type RegistryConfigInput = z.input<typeof registryConfigSchema>;

export const typeOptionsSchema = z
  .object({
    tableName: z.string().min(1).optional(),
    removeMissingFields: z.boolean().default(true),
    primaryKey: z.string().min(1).default('id'),
  })
  .strict();

export type JsonTypeOptions = z.input<typeof typeOptionsSchema>;

/** Computed-field contract. Implementations that do not need the context ignore it. */
export type ComputeFn = (row: Row, context: SyncContext) => unknown;

export const fieldOptionsSchema = z
  .object({
    columnName: z.string().min(1).optional(),
    /** date-fns pattern, e.g. `dd/MM/yyyy HH:mm`. */
    dateFormat: z.string().min(1).optional(),
    /** Options for the general-purpose ISO parser. */
    parseOptions: z
      .object({ additionalDigits: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional() })
      .strict()
      .optional(),
    compute: z.custom<ComputeFn>((value) => typeof value === 'function', 'compute must be a function').optional(),
    notNull: z.boolean().optional(),
    defaultValue: z.unknown().optional(),
  })
  .strict();

export type JsonFieldOptions = z.input<typeof fieldOptionsSchema>;

/**
 * Parse options against a strict schema, reporting every issue as a DefinitionError.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    });
    throw new DefinitionError(`Invalid ${what}: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  if (/^(true|1|yes)$/i.test(value)) return true;
  if (/^(false|0|no)$/i.test(value)) return false;
  throw new DefinitionError(`Invalid boolean in environment: ${value}`);
}

/**
 * Resolve the registry configuration: explicit overrides win over the environment,
 * which wins over the defaults.
 */
export function loadConfig(
  overrides: RegistryConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): RegistryConfig {
  const fromEnv: RegistryConfigInput = {};
  if (env.JSON_SYNC_CATALOG_TABLE) fromEnv.catalogTable = env.JSON_SYNC_CATALOG_TABLE;
  const migrate = envBoolean(env.JSON_SYNC_MIGRATE);
  if (migrate !== undefined) fromEnv.migrate = migrate;
  const level = env.JSON_SYNC_LOG_LEVEL;
  if (level) {
    const parsed = z.enum(LOG_LEVELS).safeParse(level);
    if (!parsed.success) throw new DefinitionError(`Invalid log level in environment: ${level}`);
    fromEnv.logLevel = parsed.data;
  }
  return parseOptions(registryConfigSchema, { ...fromEnv, ...overrides }, 'registry options');
}
