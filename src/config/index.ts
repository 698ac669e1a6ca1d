import { config as dotenvConfig } from 'dotenv';
import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { Config, ConfigSchema, TrackerSettings, TrackerSettingsSchema } from '../types/index.js';

dotenvConfig();

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnvString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === 'true';
}

export function loadConfig(): Config {
  const rawConfig = {
    congress: {
      apiKey: getOptionalEnvString('CONGRESS_API_KEY'),
      apiBase: getEnvString('CONGRESS_API_BASE', 'https://api.congress.gov/v3'),
    },
    federalRegister: {
      apiBase: getEnvString('FEDERAL_REGISTER_API_BASE', 'https://www.federalregister.gov/api/v1'),
    },
    openFema: {
      apiBase: getEnvString('OPENFEMA_API_BASE', 'https://www.fema.gov/api/open/v2'),
    },
    sendgrid: {
      apiKey: getOptionalEnvString('SENDGRID_API_KEY'),
    },
    paths: {
      settings: getEnvString('TRACKER_CONFIG_PATH', 'data/config.yaml'),
      watchlist: getEnvString('WATCHLIST_PATH', 'data/watchlist.yaml'),
      state: getEnvString('STATE_PATH', 'data/state.json'),
      digestDir: getEnvString('DIGEST_DIR', 'outputs/digests'),
    },
    http: {
      timeoutMs: getEnvNumber('HTTP_TIMEOUT_MS', 30000),
      retries: getEnvNumber('HTTP_RETRIES', 3),
      retryDelayMs: getEnvNumber('HTTP_RETRY_DELAY_MS', 2000),
    },
    logLevel: getEnvString('LOG_LEVEL', 'info'),
    logPretty: getEnvBoolean('LOG_PRETTY', true),
  };

  return ConfigSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

/**
 * Parse tracker settings from YAML text.
 * JSON_SCHEMA keeps bare dates such as 2026-01-22 as strings.
 */
export function parseTrackerSettings(raw: string, source = 'tracker settings'): TrackerSettings {
  const data: unknown = yaml.load(raw, { schema: yaml.JSON_SCHEMA }) ?? {};
  const result = TrackerSettingsSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load tracker settings (sources, keywords, recipients) from a YAML file
 */
export async function loadTrackerSettings(path: string = getConfig().paths.settings): Promise<TrackerSettings> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read tracker settings from ${path}: ${message}`);
  }
  return parseTrackerSettings(raw, `tracker settings in ${path}`);
}
