import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { AppConfig, ConfigValue, LoadConfigOptions } from '../types';
import { ConfigError, errorMessage } from '../utils/errors';
import { isLogLevel, Logger } from '../utils/logger';
import { isRecord } from '../utils/validation';

export const CONFIG_DIR = 'system';
export const CONFIG_FILE = 'env_config.json';

/** Directories whose presence marks the workspace root. */
const WORKSPACE_MARKERS = ['dev', 'extensions', 'console', 'system'];

/** Environment variables that override file values when set. */
export const ENV_KEYS = [
  'WL_NAME', 'TANK_BASE_URL', 'TANK_FE_BASE_URL', 'TANK_DOC_BASE_URL',
  'TANK_AWS_REGION', 'TANK_API_GATEWAY_ARN', 'TANK_ROLE_ARN', 'TANK_ENV',
  'DYNAMODB_ENTITY_TABLE', 'DYNAMODB_BLUEPRINT_TABLE', 'DYNAMODB_RINGDATA_TABLE',
  'DYNAMODB_REL_TABLE', 'DYNAMODB_CHAT_TABLE',
  'CSRF_SESSION_KEY', 'SECRET_KEY',
  'COGNITO_REGION', 'COGNITO_USERPOOL_ID', 'COGNITO_APP_CLIENT_ID',
  'COGNITO_CHECK_TOKEN_EXPIRATION',
  'PREVIEW_LAYER', 'S3_BUCKET_NAME',
  'OPENAI_API_KEY', 'WEBSOCKET_CONNECTIONS',
  'ALLOW_DEV_ORIGINS', 'LOG_LEVEL',
] as const;

export const CRITICAL_KEYS = ['DYNAMODB_RINGDATA_TABLE', 'DYNAMODB_ENTITY_TABLE'] as const;

const UPPER_KEY = /^[A-Z][A-Z0-9_]*$/;

function isConfigValue(value: unknown): value is ConfigValue {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Candidate locations of the config file, most specific first.
 */
export function candidatePaths(cwd: string, fileName: string = CONFIG_FILE): string[] {
  const paths = [join(cwd, CONFIG_DIR, fileName)];

  let current = resolve(cwd);
  while (current !== dirname(current)) {
    const candidate = join(current, CONFIG_DIR, fileName);
    if (existsSync(candidate)) {
      paths.push(candidate);
      break;
    }
    if (WORKSPACE_MARKERS.some((m) => existsSync(join(current, m)))) {
      paths.push(candidate);
      break;
    }
    current = dirname(current);
  }

  return [...new Set(paths)];
}

function readConfigFile(path: string): AppConfig {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (!isRecord(parsed)) throw new Error('top-level value must be an object');

  const out: AppConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!UPPER_KEY.test(key)) continue;
    if (!isConfigValue(value)) continue;
    out[key] = value;
  }
  return out;
}

/**
 * Load configuration from `system/env_config.json` (local development) and overlay the
 * known environment variables (deployed runtimes). Environment values win.
 *
 * @throws ConfigError if a critical table name is missing from both sources
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const controllers = createControllers(config);
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}, logger: Logger = new Logger('silent')): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const config: AppConfig = {};

  let loadedFrom: string | undefined;
  for (const path of candidatePaths(cwd, options.fileName)) {
    if (!existsSync(path)) continue;
    try {
      Object.assign(config, readConfigFile(path));
      loadedFrom = path;
      break;
    } catch (err) {
      logger.warn(`Failed to load config from ${path}`, { error: errorMessage(err) });
    }
  }

  if (loadedFrom) {
    logger.info(`Config loaded from file: ${loadedFrom}`);
  } else {
    logger.info('Config file not found, using environment variables');
  }

  let envCount = 0;
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value === undefined) continue;
    config[key] = value;
    envCount++;
  }
  if (envCount > 0) logger.info(`Loaded ${envCount} config values from environment variables`);

  const missing = CRITICAL_KEYS.filter((k) => !(k in config));
  if (missing.length > 0) {
    throw new ConfigError(
      `Critical configuration missing: ${missing.join(', ')}. ` +
        `Set them as environment variables or in ${CONFIG_DIR}/${CONFIG_FILE}`,
    );
  }

  return config;
}

export function configString(config: AppConfig, key: string, fallback: string): string {
  const value = config[key];
  return value === undefined ? fallback : String(value);
}

/** Logger at the configured `LOG_LEVEL`; unknown levels fall back to `info`. */
export function createLogger(config: AppConfig, scope?: string): Logger {
  const level = config.LOG_LEVEL;
  return new Logger(isLogLevel(level) ? level : 'info', scope);
}
