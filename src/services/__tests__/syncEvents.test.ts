import assert from 'node:assert/strict';
import type { SyncEventStore } from '../../storage/syncStorage.js';
import { MemorySyncStorage } from '../../storage/memorySyncStorage.js';
import { SyncEventBus, persistSyncEvents } from '../syncEvents.js';
import type { SyncEvent } from '../syncEvents.js';
import { FIXED_NOW } from './fixtures.js';

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

const AT = '2026-03-01T10:00:00.000Z';

await test('subscribers see events until they unsubscribe', () => {
  const bus = new SyncEventBus();
  const seen: string[] = [];
  const unsubscribe = bus.subscribe((event) => seen.push(event.type));

  bus.emit({ type: 'SyncStarted', accountId: 'acct-1', at: AT });
  unsubscribe();
  bus.emit({ type: 'AuthRequired', accountId: 'acct-1', at: AT });

  assert.deepEqual(seen, ['SyncStarted']);
});

await test('persisted events keep emission order and drop type and account from the payload', async () => {
  const storage = new MemorySyncStorage({ clock: () => FIXED_NOW });
  const bus = new SyncEventBus();
  const persisted = persistSyncEvents(bus, storage.events);

  bus.emit({ type: 'SyncStarted', accountId: 'acct-1', at: AT });
  bus.emit({
    type: 'SyncCompleted',
    accountId: 'acct-1',
    receivedCount: 3,
    pushedCount: 1,
    failedCount: 0,
    fullResync: false,
    at: AT,
  });
  await persisted.flush();

  const rows = await storage.events.list(0, 10);
  assert.deepEqual(rows.map((row) => [row.id, row.eventType]), [[1, 'SyncStarted'], [2, 'SyncCompleted']]);
  assert.deepEqual(rows[1]?.payload, { receivedCount: 3, pushedCount: 1, failedCount: 0, fullResync: false, at: AT });
  assert.equal(rows[0]?.accountId, 'acct-1');
});

await test('a failed write does not stop later events from being stored', async () => {
  const stored: string[] = [];
  let calls = 0;
  const store: SyncEventStore = {
    append: async (_accountId, eventType) => {
      calls += 1;
      if (calls === 1) {
        throw new Error('connection reset');
      }
      stored.push(eventType);
      return calls;
    },
    list: async () => [],
    prune: async () => 0,
  };
  const bus = new SyncEventBus();
  const persisted = persistSyncEvents(bus, store);
  const failedEvent: SyncEvent = { type: 'SyncFailed', accountId: 'acct-1', errorKind: 'NetworkError', message: 'x', at: AT };

  bus.emit(failedEvent);
  bus.emit({ type: 'SyncDegraded', accountId: 'acct-1', failures: 5, nextRetryMs: 3_600_000, at: AT });
  await persisted.flush();

  assert.deepEqual(stored, ['SyncDegraded']);

  persisted.unsubscribe();
  bus.emit({ type: 'SyncStarted', accountId: 'acct-1', at: AT });
  await persisted.flush();
  assert.equal(calls, 2);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
