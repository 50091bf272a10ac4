import { ConfigurationMissingError } from './errors.js';
import { type SettingsStore, SqliteSettingsStore } from './settings/store.js';
import { type LogLevel, logger, parseLogLevel } from './utils/logger.js';
import type { ErrorVerbosity } from './types.js';

export interface ConfigSource {
  get(key: string): Promise<string | undefined>;
}

export class EnvConfigSource implements ConfigSource {
  constructor(private env: NodeJS.ProcessEnv = process.env) {}

  async get(key: string): Promise<string | undefined> {
    const value = this.env[key];
    return value ? value : undefined;
  }
}

/**
 * Reads keys for a single account out of the persisted settings store.
 */
export class SettingsStoreConfigSource implements ConfigSource {
  constructor(private store: SettingsStore, private accountId: string) {}

  async get(key: string): Promise<string | undefined> {
    const value = await this.store.get(this.accountId, key);
    return value ? value : undefined;
  }
}

/**
 * Asks each source in order and returns the first value found.
 */
export class CompositeConfigSource implements ConfigSource {
  constructor(private sources: ConfigSource[]) {}

  async get(key: string): Promise<string | undefined> {
    for (const source of this.sources) {
      const value = await source.get(key);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }
}

export interface AppConfig {
  overseerrUrl: string;
  overseerrApiKey: string;
  errorVerbosity: ErrorVerbosity;
  requestTimeoutMs: number;
  candidatePolicy: CandidatePolicyName;
  logLevel: LogLevel;
}

export type CandidatePolicyName = 'first' | 'prefer-hinted-type';

const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Matches a setting against its allowed values, case-insensitively. Unknown
 * values fall back to the default with a warning.
 */
function pickOption<T extends string>(
  key: string,
  value: string | undefined,
  allowed: readonly T[],
  fallback: T
): T {
  if (value === undefined) return fallback;
  const normalized = value.toLowerCase();
  const match = allowed.find(option => option === normalized);
  if (match === undefined) {
    logger.warn(`Ignoring ${key}='${value}', expected one of ${allowed.join(', ')}; using '${fallback}'`);
    return fallback;
  }
  return match;
}

export async function loadConfig(source: ConfigSource): Promise<AppConfig> {
  const overseerrUrl = await source.get('OVERSEERR_URL');
  const overseerrApiKey = await source.get('OVERSEERR_API_KEY');

  const missing: string[] = [];
  if (!overseerrUrl) missing.push('OVERSEERR_URL');
  if (!overseerrApiKey) missing.push('OVERSEERR_API_KEY');
  if (!overseerrUrl || !overseerrApiKey) {
    throw new ConfigurationMissingError(missing);
  }

  const verbosity = pickOption(
    'ERROR_VERBOSITY',
    await source.get('ERROR_VERBOSITY'),
    ['generic', 'detailed'] as const,
    'generic'
  );
  const policy = pickOption(
    'CANDIDATE_POLICY',
    await source.get('CANDIDATE_POLICY'),
    ['first', 'prefer-hinted-type'] as const,
    'first'
  );
  const timeout = parseInt((await source.get('REQUEST_TIMEOUT_MS')) || '', 10);

  return {
    overseerrUrl: overseerrUrl.replace(/\/+$/, ''),
    overseerrApiKey,
    errorVerbosity: verbosity,
    requestTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
    candidatePolicy: policy,
    logLevel: parseLogLevel(await source.get('LOG_LEVEL')),
  };
}

/**
 * Resolves configuration from the environment, falling back to the SQLite
 * settings store when SETTINGS_DB_PATH is set. The store is only needed while
 * loading and is closed before returning.
 */
export async function resolveConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const envSource = new EnvConfigSource(env);
  const dbPath = env.SETTINGS_DB_PATH;

  if (!dbPath) {
    return loadConfig(envSource);
  }

  const accountId = env.SETTINGS_ACCOUNT_ID;
  if (!accountId) {
    throw new ConfigurationMissingError(['SETTINGS_ACCOUNT_ID']);
  }

  const store = await SqliteSettingsStore.open(dbPath);
  try {
    return await loadConfig(
      new CompositeConfigSource([envSource, new SettingsStoreConfigSource(store, accountId)])
    );
  } finally {
    await store.close();
  }
}
