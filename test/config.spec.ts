import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { candidatePaths, configString, createLogger, loadConfig } from '../src/config/config';
import { ConfigError } from '../src/utils/errors';
import { Logger } from '../src/utils/logger';

const APP = join(__dirname, 'fixtures/config/app');
const BROKEN = join(__dirname, 'fixtures/config/broken');

describe('loadConfig', () => {
  let empty: string;

  beforeEach(() => {
    empty = mkdtempSync(join(tmpdir(), 'ring-config-'));
  });

  afterEach(() => {
    rmSync(empty, { recursive: true, force: true });
  });

  test('reads UPPER_CASE scalar keys from system/env_config.json', () => {
    const config = loadConfig({ cwd: APP, env: {} });
    expect(config).toEqual({
      WL_NAME: 'acme',
      TANK_DOC_BASE_URL: 'https://docs.example.test',
      DYNAMODB_ENTITY_TABLE: 'acme_entities',
      DYNAMODB_RINGDATA_TABLE: 'acme_data',
      DYNAMODB_CHAT_TABLE: 'acme_chat',
      PREVIEW_LAYER: 2,
      ALLOW_DEV_ORIGINS: false,
    });
  });

  test('environment variables override file values; unknown variables are ignored', () => {
    const config = loadConfig({ cwd: APP, env: { DYNAMODB_RINGDATA_TABLE: 'env_data', UNRELATED: 'x' } });
    expect(config.DYNAMODB_RINGDATA_TABLE).toBe('env_data');
    expect(config.DYNAMODB_ENTITY_TABLE).toBe('acme_entities');
    expect(config).not.toHaveProperty('UNRELATED');
  });

  test('falls back to the environment when no file exists', () => {
    const config = loadConfig({
      cwd: empty,
      env: { DYNAMODB_RINGDATA_TABLE: 'd', DYNAMODB_ENTITY_TABLE: 'e' },
    });
    expect(config).toEqual({ DYNAMODB_RINGDATA_TABLE: 'd', DYNAMODB_ENTITY_TABLE: 'e' });
  });

  test('throws ConfigError naming every missing critical key', () => {
    expect(() => loadConfig({ cwd: empty, env: {} })).toThrow(ConfigError);
    expect(() => loadConfig({ cwd: empty, env: { DYNAMODB_ENTITY_TABLE: 'e' } })).toThrow(
      /Critical configuration missing: DYNAMODB_RINGDATA_TABLE\./,
    );
  });

  test('skips an unreadable file with a warning', () => {
    const logger = new Logger('error');
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);

    const config = loadConfig({ cwd: BROKEN, env: { DYNAMODB_RINGDATA_TABLE: 'd', DYNAMODB_ENTITY_TABLE: 'e' } }, logger);

    expect(config).toEqual({ DYNAMODB_RINGDATA_TABLE: 'd', DYNAMODB_ENTITY_TABLE: 'e' });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe(`Failed to load config from ${join(BROKEN, 'system', 'env_config.json')}`);
  });

  test('candidatePaths starts in the working directory and does not repeat itself', () => {
    expect(candidatePaths(APP)).toEqual([join(APP, 'system', 'env_config.json')]);
  });

  describe('walking up from a nested directory', () => {
    function writeConfig(dir: string, values: Record<string, string>): void {
      mkdirSync(join(dir, 'system'), { recursive: true });
      writeFileSync(join(dir, 'system', 'env_config.json'), JSON.stringify(values));
    }

    test('finds system/env_config.json in an ancestor', () => {
      writeConfig(empty, { DYNAMODB_RINGDATA_TABLE: 'root_data', DYNAMODB_ENTITY_TABLE: 'root_entities' });
      const deeper = join(empty, 'nested', 'deeper');
      mkdirSync(deeper, { recursive: true });

      expect(candidatePaths(deeper)).toEqual([
        join(deeper, 'system', 'env_config.json'),
        join(empty, 'system', 'env_config.json'),
      ]);
      expect(loadConfig({ cwd: deeper, env: {} })).toEqual({
        DYNAMODB_RINGDATA_TABLE: 'root_data',
        DYNAMODB_ENTITY_TABLE: 'root_entities',
      });
    });

    test('stops at the first directory holding a workspace marker', () => {
      writeConfig(empty, { DYNAMODB_RINGDATA_TABLE: 'root_data', DYNAMODB_ENTITY_TABLE: 'root_entities' });
      const workspace = join(empty, 'ws');
      const pkg = join(workspace, 'pkg');
      mkdirSync(join(workspace, 'extensions'), { recursive: true });
      mkdirSync(pkg);

      expect(candidatePaths(pkg)).toEqual([
        join(pkg, 'system', 'env_config.json'),
        join(workspace, 'system', 'env_config.json'),
      ]);
      const config = loadConfig({ cwd: pkg, env: { DYNAMODB_RINGDATA_TABLE: 'd', DYNAMODB_ENTITY_TABLE: 'e' } });
      expect(config).toEqual({ DYNAMODB_RINGDATA_TABLE: 'd', DYNAMODB_ENTITY_TABLE: 'e' });
    });
  });
});

describe('config helpers', () => {
  test('configString stringifies values and applies the fallback', () => {
    expect(configString({ PREVIEW_LAYER: 2 }, 'PREVIEW_LAYER', '0')).toBe('2');
    expect(configString({}, 'S3_BUCKET_NAME', 'none')).toBe('none');
  });

  test('createLogger honours LOG_LEVEL and defaults to info', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      createLogger({ LOG_LEVEL: 'debug' }).debug('shown');
      createLogger({ LOG_LEVEL: 'loud' }).debug('hidden');
      createLogger({}).info('shown too');
      expect(spy.mock.calls.map((c) => c[0])).toEqual(['[DEBUG] shown', '[INFO] shown too']);
    } finally {
      spy.mockRestore();
    }
  });

  test.each(['constructor', 'toString', '__proto__'])('createLogger treats inherited key %s as unknown', (level) => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      const logger = createLogger({ LOG_LEVEL: level });
      logger.error('boom');
      logger.info('still info');
      logger.debug('hidden');
      expect(error.mock.calls.map((c) => c[0])).toEqual(['[ERROR] boom']);
      expect(log.mock.calls.map((c) => c[0])).toEqual(['[INFO] still info']);
    } finally {
      error.mockRestore();
      log.mockRestore();
    }
  });
});
