import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CompositeConfigSource,
  EnvConfigSource,
  SettingsStoreConfigSource,
  loadConfig,
  resolveConfig,
} from './config.js';
import { ConfigurationMissingError } from './errors.js';
import { SqliteSettingsStore } from './settings/store.js';
import { logger } from './utils/logger.js';

describe('config', () => {
  let store: SqliteSettingsStore | undefined;

  afterEach(async () => {
    await store?.close();
    store = undefined;
    vi.restoreAllMocks();
  });

  it('loads from the environment with defaults', async () => {
    const config = await loadConfig(
      new EnvConfigSource({ OVERSEERR_URL: 'http://overseerr.test/', OVERSEERR_API_KEY: 'test-key' })
    );

    expect(config).toEqual({
      overseerrUrl: 'http://overseerr.test',
      overseerrApiKey: 'test-key',
      errorVerbosity: 'generic',
      requestTimeoutMs: 10000,
      candidatePolicy: 'first',
      logLevel: 'info',
    });
  });

  it('reads optional settings', async () => {
    const config = await loadConfig(
      new EnvConfigSource({
        OVERSEERR_URL: 'http://overseerr.test',
        OVERSEERR_API_KEY: 'test-key',
        ERROR_VERBOSITY: 'Detailed',
        REQUEST_TIMEOUT_MS: '2500',
        CANDIDATE_POLICY: 'prefer-hinted-type',
        LOG_LEVEL: 'DEBUG',
      })
    );

    expect(config.errorVerbosity).toBe('detailed');
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.candidatePolicy).toBe('prefer-hinted-type');
    expect(config.logLevel).toBe('debug');
  });

  it('warns about unknown option values and uses the defaults', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});

    const config = await loadConfig(
      new EnvConfigSource({
        OVERSEERR_URL: 'http://overseerr.test',
        OVERSEERR_API_KEY: 'test-key',
        ERROR_VERBOSITY: 'detaild',
        CANDIDATE_POLICY: 'best',
      })
    );

    expect(config.errorVerbosity).toBe('generic');
    expect(config.candidatePolicy).toBe('first');
    expect(warn.mock.calls).toEqual([
      ["Ignoring ERROR_VERBOSITY='detaild', expected one of generic, detailed; using 'generic'"],
      ["Ignoring CANDIDATE_POLICY='best', expected one of first, prefer-hinted-type; using 'first'"],
    ]);
  });

  it('names every missing key', async () => {
    const error = await loadConfig(new EnvConfigSource({ OVERSEERR_URL: '' })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationMissingError);
    if (!(error instanceof ConfigurationMissingError)) return;
    expect(error.missingKeys).toEqual(['OVERSEERR_URL', 'OVERSEERR_API_KEY']);
  });

  it('prefers the environment over the settings store', async () => {
    store = await SqliteSettingsStore.open(':memory:');
    await store.set('account-1', 'OVERSEERR_URL', 'http://from-store.test');
    await store.set('account-1', 'OVERSEERR_API_KEY', 'store-key');

    const config = await loadConfig(
      new CompositeConfigSource([
        new EnvConfigSource({ OVERSEERR_URL: 'http://from-env.test' }),
        new SettingsStoreConfigSource(store, 'account-1'),
      ])
    );

    expect(config.overseerrUrl).toBe('http://from-env.test');
    expect(config.overseerrApiKey).toBe('store-key');
  });

  it('only reads the configured account from the store', async () => {
    store = await SqliteSettingsStore.open(':memory:');
    await store.set('someone-else', 'OVERSEERR_API_KEY', 'other-key');

    const source = new SettingsStoreConfigSource(store, 'account-1');

    expect(await source.get('OVERSEERR_API_KEY')).toBeUndefined();
  });

  it('requires an account id when the settings store is enabled', async () => {
    await expect(resolveConfig({ SETTINGS_DB_PATH: ':memory:' })).rejects.toThrow(
      'Missing required configuration: SETTINGS_ACCOUNT_ID'
    );
  });

  it('fails when neither source has the API key', async () => {
    await expect(
      resolveConfig({
        OVERSEERR_URL: 'http://overseerr.test',
        SETTINGS_DB_PATH: ':memory:',
        SETTINGS_ACCOUNT_ID: 'account-1',
      })
    ).rejects.toThrow('Missing required configuration: OVERSEERR_API_KEY');
  });
});
