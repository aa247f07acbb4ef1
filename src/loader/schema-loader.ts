/**
 * Schema Loader
 *
 * Applies schema definitions written as SQL files to a database.
 *
 * @module loader/schema-loader
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import type { ConnectionTarget } from '../types.js';
import type { Connector } from '../connection/connector.js';
import { SchemaLoadError, toError } from '../errors.js';
import { DebugLogger } from '../debug.js';
import type { SchemaSession } from '../session/schema-session.js';
import { withSchemaSession } from '../session/schema-session.js';

/**
 * Options for the schema loader
 */
export interface SchemaLoaderOptions {
  /** Connector used by `loadFromFile` */
  connector: Connector;
  /** Logger for per-file events */
  logger?: DebugLogger;
}

/**
 * Find every .sql file below a folder, in lexicographic order of the path
 * relative to that folder (forward slashes, code point order)
 *
 * @throws SchemaLoadError when the folder cannot be read
 */
export async function discoverSqlFiles(folder: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(folder, { recursive: true });
  } catch (err) {
    throw new SchemaLoadError(
      folder,
      `Cannot read schema folder ${folder}: ${toError(err).message}`,
      err
    );
  }

  return entries
    .filter((entry) => entry.toLowerCase().endsWith('.sql'))
    .map((entry) => entry.split(sep).join('/'))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((entry) => join(folder, entry));
}

/**
 * Loads SQL schema definitions into databases.
 *
 * Loads are not rolled back on failure: the databases they target are
 * scratch databases that get dropped anyway.
 *
 * @example
 * ```typescript
 * const loader = new SchemaLoader({ connector });
 *
 * await loader.loadFromFolder(session, 'src/models');
 * await loader.loadFromFile(target, 'migrations/production.dump.sql');
 * ```
 */
export class SchemaLoader {
  private readonly connector: Connector;
  private readonly logger: DebugLogger;

  constructor(options: SchemaLoaderOptions) {
    this.connector = options.connector;
    this.logger = options.logger ?? new DebugLogger();
  }

  /**
   * Execute every .sql file under `folder` against the session, in order
   *
   * @returns The files that were loaded
   * @throws SchemaLoadError on the first file that fails
   */
  async loadFromFolder(session: SchemaSession, folder: string): Promise<string[]> {
    const files = await discoverSqlFiles(folder);

    for (const file of files) {
      await this.executeFile(session, file, relative(folder, file));
    }

    return files;
  }

  /**
   * Execute one SQL file as a single batch on a fresh connection to `target`
   *
   * @throws SchemaLoadError when the file cannot be read or executed
   */
  async loadFromFile(target: ConnectionTarget, file: string): Promise<void> {
    await withSchemaSession(
      this.connector,
      target,
      (session) => this.executeFile(session, file, file),
      this.logger
    );
  }

  private async executeFile(session: SchemaSession, file: string, label: string): Promise<void> {
    const startTime = Date.now();
    let sql: string;

    try {
      sql = await readFile(file, 'utf8');
    } catch (err) {
      throw new SchemaLoadError(file, `Cannot read schema file ${label}: ${toError(err).message}`, err);
    }

    if (sql.trim() === '') {
      this.logger.logSchemaFileLoaded(label, Date.now() - startTime);
      return;
    }

    try {
      await session.execute(sql);
    } catch (err) {
      throw new SchemaLoadError(file, `Failed to load schema file ${label}: ${toError(err).message}`, err);
    }

    this.logger.logSchemaFileLoaded(label, Date.now() - startTime);
  }
}

/**
 * Create a schema loader
 */
export function createSchemaLoader(options: SchemaLoaderOptions): SchemaLoader {
  return new SchemaLoader(options);
}
