import type { HistoryCursor, ProviderKind, SequenceCursor, SyncCursor } from '../shared/types.js';
import { SyncError } from './syncErrors.js';

const DIGITS = /^\d+$/;

/** Sorted, de-duplicated UIDs rendered as an IMAP sequence set, e.g. `1:3,7,9:10`. */
export const compactUidSet = (uids: Iterable<number>): string => {
  const sorted = Array.from(new Set(uids))
    .filter((uid) => Number.isInteger(uid) && uid > 0)
    .sort((left, right) => left - right);
  const parts: string[] = [];
  let start: number | null = null;
  let previous: number | null = null;
  for (const uid of sorted) {
    if (start === null || previous === null) {
      start = uid;
      previous = uid;
      continue;
    }
    if (uid === previous + 1) {
      previous = uid;
      continue;
    }
    parts.push(start === previous ? `${start}` : `${start}:${previous}`);
    start = uid;
    previous = uid;
  }
  if (start !== null && previous !== null) {
    parts.push(start === previous ? `${start}` : `${start}:${previous}`);
  }
  return parts.join(',');
};

export const expandUidSet = (value: string): number[] => {
  const uids: number[] = [];
  for (const part of value.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) {
      continue;
    }
    const [rawStart, rawEnd] = trimmed.split(':');
    const start = Number(rawStart);
    const end = rawEnd === undefined ? start : Number(rawEnd);
    if (!Number.isInteger(start) || !Number.isInteger(end) || start <= 0 || end < start) {
      throw new Error(`invalid uid set segment: ${trimmed}`);
    }
    for (let uid = start; uid <= end; uid += 1) {
      uids.push(uid);
    }
  }
  return uids;
};

const compareDecimal = (left: string, right: string) => {
  const a = BigInt(left);
  const b = BigInt(right);
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

export const compareHistoryCursors = (left: HistoryCursor, right: HistoryCursor) =>
  compareDecimal(left.historyId, right.historyId);

/** `null` when the cursors belong to different validity epochs or mailboxes. */
export const compareSequenceCursors = (left: SequenceCursor, right: SequenceCursor): number | null => {
  if (left.mailbox !== right.mailbox || left.uidValidity !== right.uidValidity) {
    return null;
  }
  if (left.lastSeenUid !== right.lastSeenUid) {
    return left.lastSeenUid < right.lastSeenUid ? -1 : 1;
  }
  if (left.modseq === right.modseq) {
    return 0;
  }
  if (left.modseq === null) {
    return -1;
  }
  if (right.modseq === null) {
    return 1;
  }
  return compareDecimal(left.modseq, right.modseq);
};

export const compareCursors = (left: SyncCursor, right: SyncCursor): number | null => {
  if (left.kind === 'history' && right.kind === 'history') {
    return compareHistoryCursors(left, right);
  }
  if (left.kind === 'sequence' && right.kind === 'sequence') {
    return compareSequenceCursors(left, right);
  }
  return null;
};

/**
 * Keeps the stored cursor when the adapter hands back an older one for the same epoch.
 * An incomparable pair means the epoch changed, so the incoming cursor wins.
 */
export const laterCursor = (
  stored: SyncCursor | null,
  incoming: SyncCursor,
  compare: (left: SyncCursor, right: SyncCursor) => number | null = compareCursors,
): SyncCursor => {
  if (!stored) {
    return incoming;
  }
  const order = compare(stored, incoming);
  if (order === null) {
    return incoming;
  }
  return order > 0 ? stored : incoming;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const corrupt = (accountId: string, detail: string) =>
  new SyncError('StorageCorruption', `stored sync cursor for account ${accountId} is invalid: ${detail}`);

/** Validates a stored cursor blob against the account's provider kind. */
export const parseStoredCursor = (accountId: string, kind: ProviderKind, raw: unknown): SyncCursor | null => {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (!isRecord(raw)) {
    throw corrupt(accountId, 'not an object');
  }
  if (raw.kind !== kind) {
    throw corrupt(accountId, `expected ${kind} cursor, found ${String(raw.kind)}`);
  }

  if (raw.kind === 'history') {
    const historyId = raw.historyId;
    if (typeof historyId !== 'string' || !DIGITS.test(historyId)) {
      throw corrupt(accountId, 'historyId must be a decimal string');
    }
    return { kind: 'history', historyId };
  }

  const { mailbox, uidValidity, lastSeenUid, modseq, knownUids } = raw;
  if (typeof mailbox !== 'string' || !mailbox) {
    throw corrupt(accountId, 'mailbox missing');
  }
  if (typeof uidValidity !== 'string' || !DIGITS.test(uidValidity)) {
    throw corrupt(accountId, 'uidValidity must be a decimal string');
  }
  if (typeof lastSeenUid !== 'number' || !Number.isInteger(lastSeenUid) || lastSeenUid < 0) {
    throw corrupt(accountId, 'lastSeenUid must be a non-negative integer');
  }
  let parsedModseq: string | null = null;
  if (modseq !== null) {
    if (typeof modseq !== 'string' || !DIGITS.test(modseq)) {
      throw corrupt(accountId, 'modseq must be null or a decimal string');
    }
    parsedModseq = modseq;
  }
  if (typeof knownUids !== 'string') {
    throw corrupt(accountId, 'knownUids must be a string');
  }
  try {
    expandUidSet(knownUids);
  } catch (error) {
    throw corrupt(accountId, error instanceof Error ? error.message : String(error));
  }
  return { kind: 'sequence', mailbox, uidValidity, lastSeenUid, modseq: parsedModseq, knownUids };
};
