import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SchemaLoader, createSchemaLoader, discoverSqlFiles } from './schema-loader.js';
import { SchemaSession } from '../session/schema-session.js';
import { createConnectionTarget } from '../connection/connection-target.js';
import { SchemaLoadError } from '../errors.js';
import { FakeClient, FakeConnector } from '../testing/fakes.js';

const target = createConnectionTarget({
  host: 'localhost',
  port: 5432,
  user: 'test',
  password: 'test-secret',
  database: 'temp_dbabcdefghij',
});

describe('SchemaLoader', () => {
  let testDir: string;
  let modelsDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `schema-loader-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    modelsDir = join(testDir, 'models');
    await mkdir(modelsDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('discoverSqlFiles', () => {
    it('should find .sql files recursively in lexicographic order', async () => {
      await mkdir(join(modelsDir, 'b_accounts'), { recursive: true });
      await mkdir(join(modelsDir, 'a_users'), { recursive: true });
      await writeFile(join(modelsDir, 'b_accounts', 'account.sql'), 'SELECT 1;');
      await writeFile(join(modelsDir, 'a_users', 'user.sql'), 'SELECT 2;');
      await writeFile(join(modelsDir, 'z_types.sql'), 'SELECT 3;');
      await writeFile(join(modelsDir, 'readme.md'), '# not sql');

      const files = await discoverSqlFiles(modelsDir);

      expect(files).toEqual([
        join(modelsDir, 'a_users', 'user.sql'),
        join(modelsDir, 'b_accounts', 'account.sql'),
        join(modelsDir, 'z_types.sql'),
      ]);
    });

    it('should order uppercase before lowercase', async () => {
      await writeFile(join(modelsDir, 'b.sql'), '');
      await writeFile(join(modelsDir, 'A.sql'), '');

      const files = await discoverSqlFiles(modelsDir);

      expect(files).toEqual([join(modelsDir, 'A.sql'), join(modelsDir, 'b.sql')]);
    });

    it('should throw SchemaLoadError for a missing folder', async () => {
      await expect(discoverSqlFiles(join(testDir, 'missing'))).rejects.toBeInstanceOf(SchemaLoadError);
    });
  });

  describe('loadFromFolder', () => {
    it('should execute each file against the session in order', async () => {
      await mkdir(join(modelsDir, 'nested'), { recursive: true });
      await writeFile(join(modelsDir, '01_types.sql'), 'CREATE TYPE mood AS ENUM (\'ok\');');
      await writeFile(join(modelsDir, 'nested', 'transaction.sql'), 'CREATE TABLE t (id int);');

      const client = new FakeClient(target);
      const session = new SchemaSession(target, client);
      const loader = new SchemaLoader({ connector: new FakeConnector() });

      const loaded = await loader.loadFromFolder(session, modelsDir);

      expect(loaded).toEqual([
        join(modelsDir, '01_types.sql'),
        join(modelsDir, 'nested', 'transaction.sql'),
      ]);
      expect(client.queries).toEqual([
        'CREATE TYPE mood AS ENUM (\'ok\');',
        'CREATE TABLE t (id int);',
      ]);
    });

    it('should skip empty files', async () => {
      await writeFile(join(modelsDir, 'empty.sql'), '  \n');
      const client = new FakeClient(target);
      const loader = createSchemaLoader({ connector: new FakeConnector() });

      await loader.loadFromFolder(new SchemaSession(target, client), modelsDir);

      expect(client.queries).toEqual([]);
    });

    it('should stop at the first failing file with SchemaLoadError', async () => {
      await writeFile(join(modelsDir, 'a.sql'), 'CREATE TABLE a (id int);');
      await writeFile(join(modelsDir, 'b.sql'), 'CREATE TABLE broken (');
      await writeFile(join(modelsDir, 'c.sql'), 'CREATE TABLE c (id int);');

      const client = new FakeClient(target, (text) => {
        if (text.includes('broken')) {
          throw new Error('syntax error at end of input');
        }
      });
      const loader = new SchemaLoader({ connector: new FakeConnector() });

      const error = await loader
        .loadFromFolder(new SchemaSession(target, client), modelsDir)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SchemaLoadError);
      if (error instanceof SchemaLoadError) {
        expect(error.file).toBe(join(modelsDir, 'b.sql'));
        expect(error.message).toBe('Failed to load schema file b.sql: syntax error at end of input');
      }
      expect(client.queries).toEqual(['CREATE TABLE a (id int);', 'CREATE TABLE broken (']);
    });
  });

  describe('loadFromFile', () => {
    it('should execute the whole file as one batch on its own connection', async () => {
      const dump = join(testDir, 'production.dump.sql');
      const contents = 'CREATE TABLE a (id int);\nCREATE TABLE b (id int);\n';
      await writeFile(dump, contents);
      const connector = new FakeConnector();
      const loader = new SchemaLoader({ connector });

      await loader.loadFromFile(target, dump);

      expect(connector.clients).toHaveLength(1);
      expect(connector.clients[0]?.target).toEqual(target);
      expect(connector.clients[0]?.queries).toEqual([contents]);
      expect(connector.clients[0]?.ended).toBe(1);
    });

    it('should treat an empty file as a no-op', async () => {
      const dump = join(testDir, 'production.dump.sql');
      await writeFile(dump, '');
      const connector = new FakeConnector();

      await new SchemaLoader({ connector }).loadFromFile(target, dump);

      expect(connector.clients[0]?.queries).toEqual([]);
      expect(connector.clients[0]?.ended).toBe(1);
    });

    it('should throw SchemaLoadError for a missing file and still close the connection', async () => {
      const connector = new FakeConnector();
      const loader = new SchemaLoader({ connector });

      await expect(loader.loadFromFile(target, join(testDir, 'missing.sql'))).rejects.toBeInstanceOf(
        SchemaLoadError
      );
      expect(connector.clients[0]?.ended).toBe(1);
    });

    it('should wrap execution errors', async () => {
      const dump = join(testDir, 'production.dump.sql');
      await writeFile(dump, 'CREATE TABLE a (id nosuchtype);');
      const connector = new FakeConnector(() => () => {
        throw new Error('type "nosuchtype" does not exist');
      });

      const error = await new SchemaLoader({ connector })
        .loadFromFile(target, dump)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SchemaLoadError);
      if (error instanceof SchemaLoadError) {
        expect(error.message).toBe(`Failed to load schema file ${dump}: type "nosuchtype" does not exist`);
        expect(error.code).toBe('SCHEMA_LOAD_FAILED');
      }
    });
  });
});
