import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_SHEET_NAME } from '../../../src/infrastructure/config/loadConfig.js';
import { DEFAULT_CLIENT_CONFIG } from '../../../src/application/BatchClientConfig.js';
import { DEFAULT_RESULT_COLUMNS } from '../../../src/domain/model/ResultColumns.js';
import { ConfigError } from '../../../src/domain/errors/GeocodeErrors.js';

const env = { AZURE_MAPS_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('should fall back to provider defaults when only the credential is set', () => {
    const config = loadConfig(env);

    expect(config.client).toEqual({ ...DEFAULT_CLIENT_CONFIG, credential: 'test-secret' });
    expect(config.columns).toEqual(DEFAULT_RESULT_COLUMNS);
    expect(config.sheetName).toBe(DEFAULT_SHEET_NAME);
  });

  it('should reject a missing credential before anything else', () => {
    const error = (() => {
      try {
        loadConfig({});
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      message: 'AZURE_MAPS_KEY environment variable is not set.',
      context: { configKey: 'AZURE_MAPS_KEY' },
    });
  });

  it('should reject a blank credential', () => {
    expect(() => loadConfig({ AZURE_MAPS_KEY: '   ' })).toThrow('AZURE_MAPS_KEY environment variable is not set.');
  });

  it('should trim the credential', () => {
    expect(loadConfig({ AZURE_MAPS_KEY: '  test-secret  ' }).client.credential).toBe('test-secret');
  });

  it('should read numeric tuning from the environment', () => {
    const config = loadConfig({
      ...env,
      GEOCODE_BATCH_SIZE: '50',
      GEOCODE_POLL_FLOOR_MS: '500',
      GEOCODE_POLL_CEILING_MS: '60000',
    });

    expect(config.client.batchSize).toBe(50);
    expect(config.client.pollFloorMs).toBe(500);
    expect(config.client.pollCeilingMs).toBe(60000);
  });

  it('should treat empty numeric variables as unset', () => {
    expect(loadConfig({ ...env, GEOCODE_BATCH_SIZE: '' }).client.batchSize).toBe(100);
  });

  it('should reject non-positive or non-numeric tuning values', () => {
    expect(() => loadConfig({ ...env, GEOCODE_BATCH_SIZE: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...env, GEOCODE_BATCH_SIZE: 'many' })).toThrow(/^GEOCODE_BATCH_SIZE: /);
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig({ ...env, GEOCODE_BATCH_SIZE: '50' }, { client: { batchSize: 10, countrySet: 'CA' } });

    expect(config.client.batchSize).toBe(10);
    expect(config.client.countrySet).toBe('CA');
  });

  it('should ignore overrides left undefined', () => {
    const config = loadConfig({ ...env, GEOCODE_BATCH_SIZE: '50' }, { client: { batchSize: undefined } });

    expect(config.client.batchSize).toBe(50);
  });

  it('should rename individual result columns', () => {
    const config = loadConfig(env, { columns: { address: 'Addr', confidence: 'Score' } });

    expect(config.columns).toEqual({ ...DEFAULT_RESULT_COLUMNS, address: 'Addr', confidence: 'Score' });
  });

  it('should reject an empty column name', () => {
    expect(() => loadConfig(env, { columns: { latitude: '' } })).toThrow(ConfigError);
  });

  it('should use the default sheet when the override is blank', () => {
    expect(loadConfig(env, { sheetName: '  ' }).sheetName).toBe('Locations');
    expect(loadConfig(env, { sheetName: 'Stores' }).sheetName).toBe('Stores');
  });
});
