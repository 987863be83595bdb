import assert from 'node:assert/strict';
import type { SequenceCursor } from '../../shared/types.js';
import {
  compactUidSet,
  compareCursors,
  compareSequenceCursors,
  expandUidSet,
  laterCursor,
  parseStoredCursor,
} from '../cursor.js';
import { isSyncError } from '../syncErrors.js';

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

const sequence = (overrides: Partial<SequenceCursor> = {}): SequenceCursor => ({
  kind: 'sequence',
  mailbox: 'INBOX',
  uidValidity: '7',
  lastSeenUid: 10,
  modseq: null,
  knownUids: '1:10',
  ...overrides,
});

await test('compactUidSet collapses runs and drops duplicates', () => {
  assert.equal(compactUidSet([10, 3, 1, 2, 7, 9, 10]), '1:3,7,9:10');
  assert.equal(compactUidSet([]), '');
  assert.equal(compactUidSet([0, -4, 5]), '5');
});

await test('expandUidSet lists every uid of a compact set', () => {
  assert.deepEqual(expandUidSet('1:3,7,9:10'), [1, 2, 3, 7, 9, 10]);
  assert.deepEqual(expandUidSet(''), []);
  assert.throws(() => expandUidSet('5:3'), /invalid uid set segment: 5:3/);
});

await test('history cursors compare numerically rather than lexically', () => {
  assert.equal(compareCursors({ kind: 'history', historyId: '9' }, { kind: 'history', historyId: '10' }), -1);
  assert.equal(compareCursors({ kind: 'history', historyId: '10' }, { kind: 'history', historyId: '10' }), 0);
});

await test('sequence cursors from different epochs are incomparable', () => {
  assert.equal(compareSequenceCursors(sequence(), sequence({ uidValidity: '8' })), null);
  assert.equal(compareSequenceCursors(sequence(), sequence({ mailbox: 'Archive' })), null);
  assert.equal(compareCursors(sequence(), { kind: 'history', historyId: '1' }), null);
});

await test('sequence cursors order by last seen uid then modseq', () => {
  assert.equal(compareSequenceCursors(sequence({ lastSeenUid: 9 }), sequence()), -1);
  assert.equal(compareSequenceCursors(sequence({ modseq: '5' }), sequence({ modseq: '12' })), -1);
  assert.equal(compareSequenceCursors(sequence({ modseq: '5' }), sequence()), 1);
});

await test('laterCursor never moves a stored cursor backwards', () => {
  const stored = { kind: 'history', historyId: '200' } as const;
  assert.equal(laterCursor(stored, { kind: 'history', historyId: '150' }), stored);
  assert.deepEqual(laterCursor(stored, { kind: 'history', historyId: '201' }), { kind: 'history', historyId: '201' });
  assert.deepEqual(laterCursor(null, { kind: 'history', historyId: '1' }), { kind: 'history', historyId: '1' });
});

await test('laterCursor takes the incoming cursor after an epoch change', () => {
  const incoming = sequence({ uidValidity: '99', lastSeenUid: 2 });
  assert.equal(laterCursor(sequence(), incoming), incoming);
});

await test('parseStoredCursor accepts a well-formed sequence cursor', () => {
  assert.deepEqual(parseStoredCursor('acct-1', 'sequence', sequence({ modseq: '44' })), sequence({ modseq: '44' }));
  assert.equal(parseStoredCursor('acct-1', 'history', null), null);
});

await test('parseStoredCursor rejects blobs that do not match the account', () => {
  const cases: unknown[] = [
    'not-an-object',
    { kind: 'sequence', historyId: '1' },
    { kind: 'history', historyId: 'abc' },
  ];
  for (const raw of cases) {
    assert.throws(
      () => parseStoredCursor('acct-1', 'history', raw),
      (error: unknown) => isSyncError(error, 'StorageCorruption'),
    );
  }
  assert.throws(
    () => parseStoredCursor('acct-1', 'sequence', { ...sequence(), knownUids: '4:2' }),
    /invalid uid set segment: 4:2/,
  );
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
