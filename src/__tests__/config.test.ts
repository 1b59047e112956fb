import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { DefinitionError } from '../errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({}, {})).toEqual({ catalogTable: 'json_type_registry', migrate: true, logLevel: 'info' });
  });

  it('reads the environment', () => {
    const env = { JSON_SYNC_CATALOG_TABLE: 'catalog', JSON_SYNC_MIGRATE: 'false', JSON_SYNC_LOG_LEVEL: 'debug' };
    expect(loadConfig({}, env)).toEqual({ catalogTable: 'catalog', migrate: false, logLevel: 'debug' });
  });

  it('lets explicit options win over the environment', () => {
    expect(loadConfig({ migrate: true }, { JSON_SYNC_MIGRATE: '0' }).migrate).toBe(true);
  });

  it('rejects bad values and unknown keys', () => {
    expect(() => loadConfig({}, { JSON_SYNC_LOG_LEVEL: 'loud' })).toThrow(DefinitionError);
    expect(() => loadConfig({}, { JSON_SYNC_MIGRATE: 'maybe' })).toThrow(DefinitionError);
    expect(() => loadConfig(JSON.parse('{"catalog":"x"}'), {})).toThrow(DefinitionError);
    expect(() => loadConfig({ catalogTable: '' }, {})).toThrow(/catalogTable/);
  });
});
