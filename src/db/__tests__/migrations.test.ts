import assert from 'node:assert/strict';
import { applySqlMigrations, readSqlMigrations } from '../migrations.js';
import { pool } from '../pool.js';

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

type QueryCall = {
  text: string;
  params: unknown[];
};

type QueryStep = {
  rows?: unknown[];
  error?: Error;
  check?: (call: QueryCall) => void;
};

const override = (key: 'query' | 'connect', value: unknown) => {
  Object.defineProperty(pool, key, { value, configurable: true, writable: true });
};

const withMockedPool = async (steps: QueryStep[], fn: () => Promise<void>) => {
  let index = 0;
  const fakeQuery = async (text: unknown, params: unknown = []) => {
    const step = steps[index];
    const call: QueryCall = { text: String(text), params: Array.isArray(params) ? params : [] };
    if (!step) {
      throw new Error(`Unexpected query #${index + 1}: ${call.text}`);
    }
    index += 1;
    step.check?.(call);
    if (step.error) {
      throw step.error;
    }
    const rows = step.rows ?? [];
    return { rows, rowCount: rows.length };
  };

  override('query', fakeQuery);
  override('connect', async () => ({ query: fakeQuery, release: () => undefined }));
  try {
    await fn();
    assert.equal(index, steps.length, `Expected ${steps.length} query calls, got ${index}`);
  } finally {
    Reflect.deleteProperty(pool, 'query');
    Reflect.deleteProperty(pool, 'connect');
  }
};

const expectText = (pattern: RegExp) => (call: QueryCall) => assert.match(call.text, pattern);

await test('only migrations missing from schema_migrations run, each with its bookkeeping row', async () => {
  await withMockedPool([
    { check: expectText(/CREATE TABLE IF NOT EXISTS schema_migrations/) },
    { rows: [{ name: '001_base.sql' }], check: expectText(/SELECT name FROM schema_migrations/) },
    { check: expectText(/^BEGIN$/) },
    { check: (call) => assert.equal(call.text, 'ALTER TABLE sync_events ADD COLUMN note TEXT;') },
    {
      check: (call) => {
        assert.match(call.text, /INSERT INTO schema_migrations/);
        assert.deepEqual(call.params, ['002_note.sql']);
      },
    },
    { check: expectText(/^COMMIT$/) },
  ], async () => {
    const applied = await applySqlMigrations([
      { name: '001_base.sql', sql: 'CREATE TABLE base (id INT);' },
      { name: '002_note.sql', sql: 'ALTER TABLE sync_events ADD COLUMN note TEXT;' },
    ]);
    assert.deepEqual(applied, ['002_note.sql']);
  });
});

await test('a failing migration rolls back and is not recorded', async () => {
  await withMockedPool([
    {},
    { rows: [] },
    { check: expectText(/^BEGIN$/) },
    { error: new Error('syntax error at or near "TABL"') },
    { check: expectText(/^ROLLBACK$/) },
  ], async () => {
    await assert.rejects(
      applySqlMigrations([{ name: '001_base.sql', sql: 'CREATE TABL base (id INT);' }]),
      /syntax error/,
    );
  });
});

await test('the project migrations are read in name order', () => {
  const migrations = readSqlMigrations();
  assert.deepEqual(migrations.map((migration) => migration.name), ['001_sync_engine.sql']);
  assert.match(migrations[0]?.sql ?? '', /CREATE TABLE IF NOT EXISTS sync_states/);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
