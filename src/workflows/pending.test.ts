import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runPending } from './pending.js';
import { createWorkflowContext } from './context.js';
import type { Reporter, WorkflowState } from './types.js';
import { defineConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../types.js';
import type { ReconcileConfig } from '../types.js';
import type { SchemaSnapshot } from '../diff/types.js';
import { ConnectionError } from '../errors.js';
import { FakeConnector } from '../testing/fakes.js';
import { catalogHandler, emptySnapshot } from '../testing/catalog.js';

const transaction: SchemaSnapshot = {
  ...emptySnapshot(),
  tables: [
    {
      schema: 'public',
      name: 'transaction',
      columns: [
        { name: '_id', type: 'uuid', isNullable: false, defaultValue: null, identity: null, generated: false },
        { name: 'amount', type: 'numeric(11,2)', isNullable: false, defaultValue: null, identity: null, generated: false },
      ],
      constraints: [{ name: 'transaction_pkey', type: 'primary_key', definition: 'PRIMARY KEY (_id)' }],
      indexes: [],
    },
  ],
};

const EXPECTED_SCRIPT =
  'CREATE TABLE "public"."transaction" (\n  "_id" uuid NOT NULL,\n  "amount" numeric(11,2) NOT NULL\n);\n\n' +
  'ALTER TABLE "public"."transaction" ADD CONSTRAINT "transaction_pkey" PRIMARY KEY (_id);\n\n';

/**
 * The first scratch database to connect holds `production`, the second `desired`
 */
function createServer(production: SchemaSnapshot, desired: SchemaSnapshot) {
  const scratch: string[] = [];
  return new FakeConnector((target) => {
    if (target.database === 'dev') {
      return catalogHandler(() => emptySnapshot());
    }
    if (!scratch.includes(target.database)) {
      scratch.push(target.database);
    }
    const snapshot = scratch.indexOf(target.database) === 0 ? production : desired;
    return catalogHandler(() => snapshot);
  });
}

function createReporter() {
  const lines: string[] = [];
  const scripts: string[] = [];
  const states: WorkflowState[] = [];
  const reporter: Reporter = {
    info: (message) => lines.push(message),
    sql: (script) => scripts.push(script),
    onState: (state) => states.push(state),
  };
  return { reporter, lines, scripts, states };
}

describe('runPending', () => {
  let testDir: string;
  let config: ReconcileConfig;

  beforeEach(async () => {
    testDir = join(tmpdir(), `pending-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    const modelsFolder = join(testDir, 'src', 'models');
    await mkdir(modelsFolder, { recursive: true });
    await writeFile(join(modelsFolder, 'transaction.sql'), 'CREATE TABLE "transaction" ("_id" uuid PRIMARY KEY);');
    await mkdir(join(testDir, 'migrations'), { recursive: true });
    await writeFile(join(testDir, 'migrations', 'production.dump.sql'), '');

    config = defineConfig({
      ...DEFAULT_CONFIG,
      paths: {
        modelsFolder,
        productionSnapshot: join(testDir, 'migrations', 'production.dump.sql'),
        pendingOutput: join(testDir, 'out', 'migrations', 'pending.sql'),
      },
    });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should write the difference to the pending file', async () => {
    const connector = createServer(emptySnapshot(), transaction);
    const { reporter, lines, scripts, states } = createReporter();
    const prompt = vi.fn(async (_question: string) => 'y');
    const ctx = createWorkflowContext(config, { connector, prompt, reporter });

    const result = await runPending(ctx);

    expect(result.outputPath).toBe(config.paths.pendingOutput);
    expect(result.statements).toHaveLength(2);
    expect(await readFile(config.paths.pendingOutput, 'utf8')).toBe(EXPECTED_SCRIPT);
    expect(scripts).toEqual([EXPECTED_SCRIPT]);
    expect(lines[0]).toMatch(/^prod temp url: postgresql:\/\/test:\*\*\*@localhost:5432\/temp_db[a-z]{10}$/);
    expect(lines[1]).toMatch(/^target temp url: postgresql:\/\/test:\*\*\*@localhost:5432\/temp_db[a-z]{10}$/);
    expect(lines.slice(2)).toEqual([
      'THE FOLLOWING CHANGES ARE PENDING:',
      `Changes written to ${config.paths.pendingOutput}.`,
    ]);
    expect(prompt).not.toHaveBeenCalled();
    expect(states).toEqual([
      'START',
      'EPHEMERAL_ACQUIRED',
      'SCHEMAS_LOADED',
      'DIFF_COMPUTED',
      'WRITTEN',
      'EPHEMERAL_RELEASED',
      'DONE',
    ]);
  });

  it('should write an empty file when production matches the models', async () => {
    await mkdir(join(testDir, 'out', 'migrations'), { recursive: true });
    await writeFile(config.paths.pendingOutput, 'DROP TABLE stale;\n');
    const connector = createServer(transaction, transaction);
    const { reporter, lines, scripts } = createReporter();
    const ctx = createWorkflowContext(config, { connector, prompt: async () => 'y', reporter });

    const result = await runPending(ctx);

    expect(result.statements).toEqual([]);
    expect(await readFile(config.paths.pendingOutput, 'utf8')).toBe('');
    expect(scripts).toEqual([]);
    expect(lines.slice(2)).toEqual([
      'No changes needed, setting pending.sql to empty.',
      `Changes written to ${config.paths.pendingOutput}.`,
    ]);
  });

  it('should never apply anything', async () => {
    const connector = createServer(emptySnapshot(), transaction);
    const { reporter } = createReporter();
    const ctx = createWorkflowContext(config, { connector, prompt: async () => 'y', reporter });

    await runPending(ctx);

    for (const client of connector.clients) {
      expect(client.queries).not.toContain('BEGIN');
      expect(client.queries.some((query) => query.startsWith('CREATE TABLE "public"'))).toBe(false);
    }
  });

  it('should load the production dump and the models into separate scratch databases', async () => {
    await writeFile(config.paths.productionSnapshot, 'CREATE TABLE legacy (id int);\n');
    const connector = createServer(emptySnapshot(), transaction);
    const { reporter } = createReporter();
    const ctx = createWorkflowContext(config, { connector, prompt: async () => 'y', reporter });

    await runPending(ctx);

    const scratch = connector.clients.filter((client) => client.target.database !== 'dev');
    const [production, desired] = Array.from(new Set(scratch.map((client) => client.target.database)));
    expect(production).toBeDefined();
    expect(desired).toBeDefined();
    expect(production).not.toBe(desired);

    const productionQueries = scratch
      .filter((client) => client.target.database === production)
      .flatMap((client) => client.queries);
    const desiredQueries = scratch
      .filter((client) => client.target.database === desired)
      .flatMap((client) => client.queries);
    expect(productionQueries).toContain('CREATE TABLE legacy (id int);\n');
    expect(desiredQueries).toContain('CREATE TABLE "transaction" ("_id" uuid PRIMARY KEY);');
    expect(desiredQueries).not.toContain('CREATE TABLE legacy (id int);\n');
  });

  it('should drop both scratch databases and close every connection', async () => {
    const connector = createServer(emptySnapshot(), transaction);
    const { reporter } = createReporter();
    const ctx = createWorkflowContext(config, { connector, prompt: async () => 'y', reporter });

    await runPending(ctx);

    const drops = connector
      .clientsFor('dev')
      .flatMap((client) => client.queries)
      .filter((query) => query.startsWith('DROP DATABASE'));
    expect(drops).toHaveLength(2);
    expect(connector.clients.every((client) => client.ended === 1)).toBe(true);
  });

  it('should not write the pending file when a scratch database cannot be created', async () => {
    const failing = {
      connect: vi.fn(async () => {
        throw new ConnectionError('Max number of connection attempts has been reached (12)', 13);
      }),
    };
    const { reporter, states } = createReporter();
    const ctx = createWorkflowContext(config, { connector: failing, prompt: async () => 'y', reporter });

    await expect(runPending(ctx)).rejects.toBeInstanceOf(ConnectionError);

    await expect(readFile(config.paths.pendingOutput, 'utf8')).rejects.toThrow();
    expect(states).toEqual(['START', 'FAILED']);
  });

  it('should report the first scratch database released when the second cannot be created', async () => {
    let created = 0;
    const connector = new FakeConnector((target) => {
      if (target.database !== 'dev') {
        return catalogHandler(() => emptySnapshot());
      }
      return (text) => {
        if (text.startsWith('CREATE DATABASE') && ++created === 2) {
          throw new Error('permission denied to create database');
        }
      };
    });
    const { reporter, states } = createReporter();
    const ctx = createWorkflowContext(config, { connector, prompt: async () => 'y', reporter });

    await expect(runPending(ctx)).rejects.toThrow('permission denied to create database');

    const drops = connector
      .clientsFor('dev')
      .flatMap((client) => client.queries)
      .filter((query) => query.startsWith('DROP DATABASE'));
    expect(drops).toHaveLength(1);
    expect(states).toEqual(['START', 'EPHEMERAL_ACQUIRED', 'EPHEMERAL_RELEASED', 'FAILED']);
  });
});
