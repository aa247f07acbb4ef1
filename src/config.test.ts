import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { defineConfig, loadConfigFromEnv } from './config.js';
import { ConfigError } from './errors.js';
import { DEFAULT_CONFIG } from './types.js';
import type { ReconcileConfig } from './types.js';

const cwd = resolve('/work/app');

describe('defineConfig', () => {
  const validConfig: ReconcileConfig = {
    database: { host: 'localhost', port: 5432, user: 'test', password: 'pass', database: 'dev' },
    paths: {
      modelsFolder: 'src/models',
      productionSnapshot: 'migrations/production.dump.sql',
      pendingOutput: 'migrations/pending.sql',
    },
    retry: { maxAttempts: 13, delayMs: 5000, transientOnly: false },
    apply: { transactional: true },
    ephemeral: { prefix: 'temp_db' },
  };

  it('should return an equal config when valid', () => {
    expect(defineConfig(validConfig)).toEqual(validConfig);
  });

  it('should freeze the config deeply', () => {
    const config = defineConfig(validConfig);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.database)).toBe(true);
    expect(Object.isFrozen(config.paths)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });

  it('should not freeze the input', () => {
    const input = { ...validConfig, database: { ...validConfig.database } };
    defineConfig(input);

    expect(Object.isFrozen(input.database)).toBe(false);
  });

  it('should throw if host is missing', () => {
    expect(() =>
      defineConfig({ ...validConfig, database: { ...validConfig.database, host: '' } })
    ).toThrow('[pg-reconcile] database.host is required');
  });

  it('should throw if port is out of range', () => {
    expect(() =>
      defineConfig({ ...validConfig, database: { ...validConfig.database, port: 70000 } })
    ).toThrow('[pg-reconcile] database.port must be an integer between 1 and 65535');
  });

  it('should throw if maxAttempts is below 1', () => {
    expect(() => defineConfig({ ...validConfig, retry: { ...validConfig.retry, maxAttempts: 0 } })).toThrow(
      '[pg-reconcile] retry.maxAttempts must be at least 1'
    );
  });

  it('should throw if delay is negative', () => {
    expect(() => defineConfig({ ...validConfig, retry: { ...validConfig.retry, delayMs: -1 } })).toThrow(
      '[pg-reconcile] retry.delayMs must be non-negative'
    );
  });

  it('should reject prefixes that are not plain identifiers', () => {
    expect(() => defineConfig({ ...validConfig, ephemeral: { prefix: 'Temp-DB' } })).toThrow(ConfigError);
  });
});

describe('loadConfigFromEnv', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadConfigFromEnv({}, cwd);

    expect(config.database).toEqual(DEFAULT_CONFIG.database);
    expect(config.paths).toEqual({
      modelsFolder: resolve(cwd, 'src/models'),
      productionSnapshot: resolve(cwd, 'migrations/production.dump.sql'),
      pendingOutput: resolve(cwd, 'migrations/pending.sql'),
    });
    expect(config.retry).toEqual({ maxAttempts: 13, delayMs: 5000, transientOnly: false });
    expect(config.apply).toEqual({ transactional: true });
    expect(config.ephemeral).toEqual({ prefix: 'temp_db' });
  });

  it('should read the DB_* variables', () => {
    const config = loadConfigFromEnv(
      { DB_HOST: 'db', DB_PORT: '6543', DB_USER: 'app', DB_PASS: 'test-secret', DB_NAME: 'app_dev' },
      cwd
    );

    expect(config.database).toEqual({
      host: 'db',
      port: 6543,
      user: 'app',
      password: 'test-secret',
      database: 'app_dev',
    });
  });

  it('should read paths, retry and apply settings', () => {
    const config = loadConfigFromEnv(
      {
        MODELS_FOLDER: 'schema',
        PRODUCTION_SNAPSHOT: '/dumps/prod.sql',
        PENDING_OUTPUT: 'out/pending.sql',
        CONNECT_MAX_ATTEMPTS: '3',
        CONNECT_RETRY_DELAY_MS: '250',
        CONNECT_RETRY_TRANSIENT_ONLY: 'yes',
        APPLY_TRANSACTIONAL: '0',
      },
      cwd
    );

    expect(config.paths).toEqual({
      modelsFolder: resolve(cwd, 'schema'),
      productionSnapshot: resolve('/dumps/prod.sql'),
      pendingOutput: resolve(cwd, 'out/pending.sql'),
    });
    expect(config.retry).toEqual({ maxAttempts: 3, delayMs: 250, transientOnly: true });
    expect(config.apply).toEqual({ transactional: false });
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfigFromEnv({ DB_HOST: 'db', DB_PORT: '6543' }, cwd, {
      host: 'override',
      port: 7000,
      modelsFolder: 'other/models',
    });

    expect(config.database.host).toBe('override');
    expect(config.database.port).toBe(7000);
    expect(config.paths.modelsFolder).toBe(resolve(cwd, 'other/models'));
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadConfigFromEnv({ DB_PORT: 'abc' }, cwd)).toThrow(ConfigError);
    expect(() => loadConfigFromEnv({ DB_PORT: 'abc' }, cwd)).toThrow(/^\[pg-reconcile\] invalid environment: DB_PORT: /);
  });

  it('should reject boolean flags outside the accepted words', () => {
    expect(() => loadConfigFromEnv({ APPLY_TRANSACTIONAL: 'maybe' }, cwd)).toThrow(
      /invalid environment: APPLY_TRANSACTIONAL: /
    );
  });

  it('should reject zero attempts', () => {
    expect(() => loadConfigFromEnv({ CONNECT_MAX_ATTEMPTS: '0' }, cwd)).toThrow(ConfigError);
  });
});
