import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_CONFIG } from './types.js';
import type { ReconcileConfig } from './types.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  DB_HOST: z.string().min(1).default(DEFAULT_CONFIG.database.host),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_CONFIG.database.port),
  DB_USER: z.string().min(1).default(DEFAULT_CONFIG.database.user),
  DB_PASS: z.string().default(DEFAULT_CONFIG.database.password),
  DB_NAME: z.string().min(1).default(DEFAULT_CONFIG.database.database),
  MODELS_FOLDER: z.string().min(1).default(DEFAULT_CONFIG.paths.modelsFolder),
  PRODUCTION_SNAPSHOT: z.string().min(1).default(DEFAULT_CONFIG.paths.productionSnapshot),
  PENDING_OUTPUT: z.string().min(1).default(DEFAULT_CONFIG.paths.pendingOutput),
  CONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_CONFIG.retry.maxAttempts),
  CONNECT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_CONFIG.retry.delayMs),
  CONNECT_RETRY_TRANSIENT_ONLY: booleanFlag.optional(),
  APPLY_TRANSACTIONAL: booleanFlag.optional(),
});

/**
 * Values that override the environment, typically CLI options
 */
export interface ConfigOverrides {
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  modelsFolder?: string;
}

/**
 * Deep-freeze a configuration object
 */
function freeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      freeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Define and validate configuration for pg-reconcile
 *
 * Returns a frozen copy so that the value can be shared across workflows
 * without anyone mutating it.
 *
 * @example
 * ```typescript
 * const config = defineConfig({
 *   database: { host: 'localhost', port: 5432, user: 'app', password: 'app', database: 'dev' },
 *   paths: {
 *     modelsFolder: 'src/models',
 *     productionSnapshot: 'migrations/production.dump.sql',
 *     pendingOutput: 'migrations/pending.sql',
 *   },
 *   retry: { maxAttempts: 13, delayMs: 5000, transientOnly: false },
 *   apply: { transactional: true },
 *   ephemeral: { prefix: 'temp_db' },
 * });
 * ```
 */
export function defineConfig(config: ReconcileConfig): ReconcileConfig {
  validateConfig(config);
  return freeze({
    database: { ...config.database },
    paths: { ...config.paths },
    retry: { ...config.retry },
    apply: { ...config.apply },
    ephemeral: { ...config.ephemeral },
  });
}

/**
 * Validate configuration at runtime
 */
function validateConfig(config: ReconcileConfig): void {
  if (!config.database.host) {
    throw new ConfigError('[pg-reconcile] database.host is required');
  }

  if (!config.database.user) {
    throw new ConfigError('[pg-reconcile] database.user is required');
  }

  if (!config.database.database) {
    throw new ConfigError('[pg-reconcile] database.database is required');
  }

  if (
    !Number.isInteger(config.database.port) ||
    config.database.port < 1 ||
    config.database.port > 65535
  ) {
    throw new ConfigError('[pg-reconcile] database.port must be an integer between 1 and 65535');
  }

  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    throw new ConfigError('[pg-reconcile] retry.maxAttempts must be at least 1');
  }

  if (config.retry.delayMs < 0) {
    throw new ConfigError('[pg-reconcile] retry.delayMs must be non-negative');
  }

  if (!/^[a-z_][a-z0-9_]*$/.test(config.ephemeral.prefix)) {
    throw new ConfigError(
      '[pg-reconcile] ephemeral.prefix must start with a lowercase letter or underscore and contain only lowercase letters, digits and underscores'
    );
  }
}

/**
 * Build the configuration from environment variables
 *
 * Relative paths are resolved against `cwd`. Overrides win over the
 * environment.
 *
 * @example
 * ```typescript
 * const config = loadConfigFromEnv(process.env, process.cwd(), { host: 'db' });
 * ```
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
  overrides: ConfigOverrides = {}
): ReconcileConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`[pg-reconcile] invalid environment: ${details}`);
  }

  const values = parsed.data;

  return defineConfig({
    database: {
      host: overrides.host ?? values.DB_HOST,
      port: overrides.port ?? values.DB_PORT,
      user: overrides.user ?? values.DB_USER,
      password: overrides.password ?? values.DB_PASS,
      database: overrides.database ?? values.DB_NAME,
    },
    paths: {
      modelsFolder: resolve(cwd, overrides.modelsFolder ?? values.MODELS_FOLDER),
      productionSnapshot: resolve(cwd, values.PRODUCTION_SNAPSHOT),
      pendingOutput: resolve(cwd, values.PENDING_OUTPUT),
    },
    retry: {
      maxAttempts: values.CONNECT_MAX_ATTEMPTS,
      delayMs: values.CONNECT_RETRY_DELAY_MS,
      transientOnly: values.CONNECT_RETRY_TRANSIENT_ONLY ?? DEFAULT_CONFIG.retry.transientOnly,
    },
    apply: {
      transactional: values.APPLY_TRANSACTIONAL ?? DEFAULT_CONFIG.apply.transactional,
    },
    ephemeral: {
      prefix: DEFAULT_CONFIG.ephemeral.prefix,
    },
  });
}
