import assert from 'node:assert/strict';
import { pool } from '../../db/pool.js';
import { isSyncError } from '../../services/syncErrors.js';
import { historyAccount, replicaEntry } from '../../services/__tests__/fixtures.js';
import { PgSyncStorage, parsePendingChangePayload } from '../pgSyncStorage.js';

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
  rowCount?: number;
  error?: Error;
  check?: (call: QueryCall) => void;
};

const override = (key: 'query' | 'connect', value: unknown) => {
  Object.defineProperty(pool, key, { value, configurable: true, writable: true });
};

const withMockedPool = async (
  steps: QueryStep[],
  fn: (state: { released: () => boolean }) => Promise<void> | void,
) => {
  let index = 0;
  let released = false;
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
    return { rows, rowCount: step.rowCount ?? rows.length };
  };

  override('query', fakeQuery);
  override('connect', async () => ({
    query: fakeQuery,
    release: () => {
      released = true;
    },
  }));

  try {
    await fn({ released: () => released });
    assert.equal(index, steps.length, `Expected ${steps.length} query calls, got ${index}`);
  } finally {
    Reflect.deleteProperty(pool, 'query');
    Reflect.deleteProperty(pool, 'connect');
  }
};

const stateRow = (cursor: unknown) => ({
  cursor,
  status: 'idle',
  full_resync_requested: false,
  last_synced_at: new Date('2026-03-01T09:00:00.000Z'),
  last_error_kind: null,
  last_error_message: null,
});

const storage = new PgSyncStorage();

await test('sync state load validates the stored cursor for the account kind', async () => {
  await withMockedPool(
    [
      { check: (call) => assert.match(call.text, /INSERT INTO sync_states/) },
      { rows: [stateRow({ kind: 'sequence', mailbox: 'INBOX' })] },
    ],
    async () => {
      await assert.rejects(
        storage.syncState.load(historyAccount()),
        (error: unknown) => isSyncError(error, 'StorageCorruption'),
      );
    },
  );
});

await test('sync state load maps timestamps and unknown statuses', async () => {
  await withMockedPool(
    [
      {},
      { rows: [{ ...stateRow({ kind: 'history', historyId: '42' }), status: 'paused' }] },
    ],
    async () => {
      const state = await storage.syncState.load(historyAccount());
      assert.deepEqual(state, {
        accountId: 'acct-history',
        cursor: { kind: 'history', historyId: '42' },
        status: 'idle',
        fullResyncRequested: false,
        lastSyncedAt: '2026-03-01T09:00:00.000Z',
        lastErrorKind: null,
        lastErrorMessage: null,
      });
    },
  );
});

await test('claim reports whether the conditional update matched', async () => {
  await withMockedPool(
    [
      {},
      {
        rows: [],
        check: (call) => {
          assert.match(call.text, /status IS DISTINCT FROM 'syncing'/);
          assert.deepEqual(call.params, ['acct-history', 900_000]);
        },
      },
    ],
    async () => {
      assert.equal(await storage.syncState.claim('acct-history', 900_000), false);
    },
  );
});

await test('commitSync writes replica, marks and cursor inside one transaction', async () => {
  const upsert = replicaEntry('local-1', { remoteId: 'remote-1', versionToken: 'v2' });
  await withMockedPool(
    [
      { check: (call) => assert.equal(call.text, 'BEGIN') },
      {
        check: (call) => {
          assert.match(call.text, /FOR UPDATE/);
          assert.deepEqual(call.params, ['acct-history', ['local-1']]);
        },
      },
      {
        rows: [],
        check: (call) => {
          assert.match(call.text, /FROM pending_changes/);
          assert.deepEqual(call.params, ['acct-history', 4, ['local-1']]);
        },
      },
      {
        check: (call) => {
          assert.match(call.text, /DELETE FROM replica_entries/);
          assert.deepEqual(call.params, ['acct-history', ['local-gone']]);
        },
      },
      {
        check: (call) => {
          assert.match(call.text, /SET remote_id = NULL/);
          assert.deepEqual(call.params, ['acct-history', ['local-1']]);
        },
      },
      {
        check: (call) => {
          assert.match(call.text, /INSERT INTO replica_entries/);
          assert.equal(call.params[2], 'remote-1');
          assert.equal(call.params[3], 'v2');
        },
      },
      {
        check: (call) => {
          assert.match(call.text, /SET status = 'synced'/);
          assert.deepEqual(call.params, ['change-1']);
        },
      },
      {
        check: (call) => {
          assert.match(call.text, /UPDATE sync_states/);
          assert.deepEqual(call.params, [
            'acct-history',
            '{"kind":"history","historyId":"77"}',
            '2026-03-01T10:00:00.000Z',
            true,
          ]);
        },
      },
      { check: (call) => assert.equal(call.text, 'COMMIT') },
    ],
    async ({ released }) => {
      await storage.commitSync({
        accountId: 'acct-history',
        cursor: { kind: 'history', historyId: '77' },
        snapshotSeq: 4,
        upserts: [upsert],
        deletes: ['local-gone'],
        marks: [{ type: 'synced', id: 'change-1' }],
        syncedAt: '2026-03-01T10:00:00.000Z',
        clearFullResync: true,
      });
      assert.equal(released(), true);
    },
  );
});

await test('commitSync keeps the effect of a change queued after the run started', async () => {
  const now = new Date('2026-03-01T10:00:00.000Z');
  const upsert = replicaEntry('local-1', { remoteId: 'remote-1', versionToken: 'v2' });
  await withMockedPool(
    [
      {},
      {},
      {
        rows: [{
          id: 'change-9',
          account_id: 'acct-history',
          seq: '5',
          local_id: 'local-1',
          target: 'remote-1',
          kind: 'update',
          payload: { op: 'setFlags', isStarred: true, base: { isStarred: false }, baseVersion: 'v1' },
          status: 'queued',
          attempt_count: 0,
          last_error: null,
          created_at: now,
          updated_at: now,
        }],
      },
      { check: (call) => assert.match(call.text, /SET remote_id = NULL/) },
      {
        check: (call) => {
          assert.match(call.text, /INSERT INTO replica_entries/);
          assert.equal(call.params[11], false);
          assert.equal(call.params[12], true);
        },
      },
      { check: (call) => assert.match(call.text, /UPDATE sync_states/) },
      {},
    ],
    async () => {
      await storage.commitSync({
        accountId: 'acct-history',
        cursor: { kind: 'history', historyId: '78' },
        snapshotSeq: 4,
        upserts: [upsert],
        deletes: [],
        marks: [],
        syncedAt: '2026-03-01T10:00:00.000Z',
        clearFullResync: false,
      });
    },
  );
});

await test('commitSync rolls back when a write fails', async () => {
  await withMockedPool(
    [
      {},
      { error: new Error('deadlock detected') },
      { check: (call) => assert.equal(call.text, 'ROLLBACK') },
    ],
    async ({ released }) => {
      await assert.rejects(
        storage.commitSync({
          accountId: 'acct-history',
          cursor: { kind: 'history', historyId: '77' },
          snapshotSeq: 0,
          upserts: [],
          deletes: [],
          marks: [{ type: 'failed', id: 'change-1', reason: 'rejected' }],
          syncedAt: '2026-03-01T10:00:00.000Z',
          clearFullResync: false,
        }),
        /deadlock detected/,
      );
      assert.equal(released(), true);
    },
  );
});

await test('a pending change row with an unreadable payload is reported as corruption', async () => {
  const now = new Date('2026-03-01T10:00:00.000Z');
  await withMockedPool(
    [
      {
        rows: [{
          id: 'change-1',
          account_id: 'acct-history',
          seq: '3',
          local_id: 'local-1',
          target: 'remote-1',
          kind: 'update',
          payload: { op: 'explode', baseVersion: null },
          status: 'queued',
          attempt_count: 0,
          last_error: null,
          created_at: now,
          updated_at: now,
        }],
      },
    ],
    async () => {
      await assert.rejects(
        storage.changeLog.get('change-1'),
        /pending change change-1 failed validation on load/,
      );
    },
  );
});

await test('discard reports whether a failed row was deleted', async () => {
  await withMockedPool([{ rowCount: 1 }, { rowCount: 0 }], async () => {
    assert.equal(await storage.changeLog.discard('change-1'), true);
    assert.equal(await storage.changeLog.discard('change-2'), false);
  });
});

await test('parsePendingChangePayload keeps only well-formed payloads', () => {
  assert.deepEqual(
    parsePendingChangePayload({ op: 'modifyLabels', add: ['Work'], remove: [], base: { labels: ['INBOX'] }, baseVersion: 'v1' }),
    { op: 'modifyLabels', add: ['Work'], remove: [], base: { labels: ['INBOX'] }, baseVersion: 'v1' },
  );
  assert.deepEqual(
    parsePendingChangePayload({ op: 'setFlags', isRead: true, base: { isRead: false }, baseVersion: null }),
    { op: 'setFlags', isRead: true, base: { isRead: false, isStarred: undefined }, baseVersion: null },
  );
  assert.equal(parsePendingChangePayload({ op: 'setFlags', base: {}, baseVersion: null }), null);
  assert.equal(parsePendingChangePayload({ op: 'delete' }), null);
  assert.equal(parsePendingChangePayload({ op: 'saveDraft', draft: { to: 'x' }, baseVersion: null }), null);
});

await test('parsePendingChangePayload reads a send with its draft content', () => {
  assert.deepEqual(
    parsePendingChangePayload({
      op: 'send',
      draft: { to: ['friend@example.test'], cc: [], subject: 'Lunch', bodyText: 'Friday?' },
      baseVersion: 'dv1',
    }),
    {
      op: 'send',
      draft: { to: ['friend@example.test'], cc: [], subject: 'Lunch', bodyText: 'Friday?', inReplyTo: null },
      baseVersion: 'dv1',
    },
  );
  assert.equal(parsePendingChangePayload({ op: 'send', baseVersion: 'dv1' }), null);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
