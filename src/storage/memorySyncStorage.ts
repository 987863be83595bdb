import { v4 as uuidv4 } from 'uuid';
import type {
  AccountCredential,
  AccountRecord,
  NewPendingChange,
  PendingChange,
  PendingChangePayload,
  PendingChangeStatus,
  ReplicaEntry,
  SyncCursor,
  SyncStateRecord,
} from '../shared/types.js';
import { parseStoredCursor } from '../services/cursor.js';
import { overlayLaterIntents } from '../services/replica.js';
import type {
  ChangeLogMark,
  ChangeLogStore,
  LocalMutation,
  ReplicaFilter,
  SyncCommit,
  SyncEventRecord,
  SyncStorage,
} from './syncStorage.js';

interface MemorySyncStateRow {
  cursor: unknown;
  status: SyncStateRecord['status'];
  fullResyncRequested: boolean;
  lastSyncedAt: string | null;
  lastErrorKind: string | null;
  lastErrorMessage: string | null;
  claimedAtMs: number | null;
}

const cloneEntry = (entry: ReplicaEntry): ReplicaEntry => structuredClone(entry);
const cloneChange = (change: PendingChange): PendingChange => structuredClone(change);

const TERMINAL: PendingChangeStatus[] = ['synced', 'failed'];

/**
 * In-process SyncStorage. Used by tests and local tooling; commits apply on a copy and swap,
 * so a throw halfway through leaves the previous state untouched.
 */
export class MemorySyncStorage implements SyncStorage {
  private accountRows = new Map<string, AccountRecord>();
  private stateRows = new Map<string, MemorySyncStateRow>();
  private entries = new Map<string, ReplicaEntry>();
  private changes = new Map<string, PendingChange>();
  private sequences = new Map<string, number>();
  private eventRows: SyncEventRecord[] = [];
  private nextEventId = 1;
  private clock: () => number;

  /** Set to make the next commitSync throw, before anything is written. */
  failNextCommit: Error | null = null;
  commitCount = 0;

  constructor(options: { clock?: () => number } = {}) {
    this.clock = options.clock ?? Date.now;
  }

  private isoNow() {
    return new Date(this.clock()).toISOString();
  }

  addAccount(account: AccountRecord) {
    this.accountRows.set(account.id, structuredClone(account));
  }

  /** Writes a raw cursor blob, bypassing validation. */
  setStoredCursor(accountId: string, cursor: unknown) {
    const row = this.stateRow(accountId);
    row.cursor = cursor;
  }

  seedEntry(entry: ReplicaEntry) {
    this.entries.set(entry.localId, cloneEntry(entry));
  }

  allEntries(accountId: string): ReplicaEntry[] {
    return Array.from(this.entries.values())
      .filter((entry) => entry.accountId === accountId)
      .map(cloneEntry);
  }

  private stateRow(accountId: string): MemorySyncStateRow {
    const existing = this.stateRows.get(accountId);
    if (existing) {
      return existing;
    }
    const created: MemorySyncStateRow = {
      cursor: null,
      status: 'idle',
      fullResyncRequested: false,
      lastSyncedAt: null,
      lastErrorKind: null,
      lastErrorMessage: null,
      claimedAtMs: null,
    };
    this.stateRows.set(accountId, created);
    return created;
  }

  readonly accounts = {
    list: async (): Promise<AccountRecord[]> =>
      Array.from(this.accountRows.values()).map((account) => structuredClone(account)),
    get: async (accountId: string): Promise<AccountRecord | null> => {
      const account = this.accountRows.get(accountId);
      return account ? structuredClone(account) : null;
    },
    saveCredential: async (accountId: string, credential: AccountCredential): Promise<void> => {
      const account = this.accountRows.get(accountId);
      if (account) {
        account.credential = structuredClone(credential);
      }
    },
  };

  readonly syncState = {
    load: async (account: AccountRecord): Promise<SyncStateRecord> => {
      const row = this.stateRow(account.id);
      return {
        accountId: account.id,
        cursor: parseStoredCursor(account.id, account.kind, row.cursor),
        status: row.status,
        fullResyncRequested: row.fullResyncRequested,
        lastSyncedAt: row.lastSyncedAt,
        lastErrorKind: row.lastErrorKind,
        lastErrorMessage: row.lastErrorMessage,
      };
    },
    claim: async (accountId: string, staleMs: number): Promise<boolean> => {
      const row = this.stateRow(accountId);
      const nowMs = this.clock();
      if (row.status === 'syncing' && row.claimedAtMs !== null && nowMs - row.claimedAtMs < staleMs) {
        return false;
      }
      row.status = 'syncing';
      row.claimedAtMs = nowMs;
      return true;
    },
    heartbeat: async (accountId: string): Promise<void> => {
      const row = this.stateRow(accountId);
      if (row.status === 'syncing') {
        row.claimedAtMs = this.clock();
      }
    },
    release: async (accountId: string): Promise<void> => {
      const row = this.stateRow(accountId);
      row.status = row.lastErrorKind ? 'error' : 'idle';
      row.claimedAtMs = null;
    },
    recordFailure: async (accountId: string, kind: string, message: string): Promise<void> => {
      const row = this.stateRow(accountId);
      row.status = 'error';
      row.claimedAtMs = null;
      row.lastErrorKind = kind;
      row.lastErrorMessage = message;
    },
    requestFullResync: async (accountId: string): Promise<void> => {
      const row = this.stateRow(accountId);
      row.fullResyncRequested = true;
      row.cursor = null;
      row.lastErrorKind = null;
      row.lastErrorMessage = null;
      if (row.status === 'error') {
        row.status = 'idle';
      }
    },
    reapStaleClaims: async (staleMs: number): Promise<number> => {
      const nowMs = this.clock();
      let reaped = 0;
      for (const row of this.stateRows.values()) {
        if (row.status === 'syncing' && row.claimedAtMs !== null && nowMs - row.claimedAtMs >= staleMs) {
          row.status = 'idle';
          row.claimedAtMs = null;
          reaped += 1;
        }
      }
      return reaped;
    },
  };

  readonly replica = {
    load: async (accountId: string, filter?: ReplicaFilter): Promise<ReplicaEntry[]> => {
      const all = Array.from(this.entries.values()).filter((entry) => entry.accountId === accountId);
      if (!filter) {
        return all.map(cloneEntry);
      }
      const remoteIds = new Set(filter.remoteIds ?? []);
      const localIds = new Set(filter.localIds ?? []);
      const messageIds = new Set(filter.messageIds ?? []);
      return all
        .filter((entry) =>
          (entry.remoteId !== null && remoteIds.has(entry.remoteId))
          || localIds.has(entry.localId)
          || (entry.fields.messageId !== null && messageIds.has(entry.fields.messageId)))
        .map(cloneEntry);
    },
    get: async (accountId: string, localId: string): Promise<ReplicaEntry | null> => {
      const entry = this.entries.get(localId);
      return entry && entry.accountId === accountId ? cloneEntry(entry) : null;
    },
  };

  private enqueueInto(changes: Map<string, PendingChange>, sequences: Map<string, number>, input: NewPendingChange) {
    const seq = (sequences.get(input.accountId) ?? 0) + 1;
    sequences.set(input.accountId, seq);
    const at = this.isoNow();
    const change: PendingChange = {
      id: input.id ?? uuidv4(),
      accountId: input.accountId,
      seq,
      localId: input.localId,
      target: input.target,
      kind: input.kind,
      payload: structuredClone(input.payload),
      status: 'queued',
      attemptCount: 0,
      lastError: null,
      createdAt: at,
      updatedAt: at,
    };
    changes.set(change.id, change);
    return cloneChange(change);
  }

  private applyMark(changes: Map<string, PendingChange>, mark: ChangeLogMark) {
    const change = changes.get(mark.id);
    if (!change || TERMINAL.includes(change.status)) {
      return;
    }
    change.updatedAt = this.isoNow();
    switch (mark.type) {
      case 'synced':
        change.status = 'synced';
        return;
      case 'failed':
        change.status = 'failed';
        change.lastError = mark.reason;
        return;
      case 'attempt':
        change.status = 'queued';
        change.attemptCount += 1;
        change.lastError = mark.error;
        return;
      case 'rewrite':
        change.status = 'queued';
        change.payload = structuredClone(mark.payload);
        change.target = mark.target;
        return;
    }
  }

  readonly changeLog: ChangeLogStore = {
    enqueue: async (input: NewPendingChange) => this.enqueueInto(this.changes, this.sequences, input),
    nextBatch: async (accountId: string, limit: number, afterSeq = 0) =>
      Array.from(this.changes.values())
        .filter((change) =>
          change.accountId === accountId
          && change.seq > afterSeq
          && (change.status === 'queued' || change.status === 'in_flight'))
        .sort((left, right) => left.seq - right.seq)
        .slice(0, limit)
        .map(cloneChange),
    list: async (accountId: string, statuses?: PendingChangeStatus[]) =>
      Array.from(this.changes.values())
        .filter((change) => change.accountId === accountId && (!statuses || statuses.includes(change.status)))
        .sort((left, right) => left.seq - right.seq)
        .map(cloneChange),
    get: async (id: string) => {
      const change = this.changes.get(id);
      return change ? cloneChange(change) : null;
    },
    markInFlight: async (id: string) => {
      const change = this.changes.get(id);
      if (change && change.status === 'queued') {
        change.status = 'in_flight';
        change.updatedAt = this.isoNow();
      }
    },
    markSynced: async (id: string) => this.applyMark(this.changes, { type: 'synced', id }),
    markFailed: async (id: string, reason: string) => this.applyMark(this.changes, { type: 'failed', id, reason }),
    recordAttempt: async (id: string, error: string) => this.applyMark(this.changes, { type: 'attempt', id, error }),
    rewrite: async (id: string, payload: PendingChangePayload, target: string | null) =>
      this.applyMark(this.changes, { type: 'rewrite', id, payload, target }),
    retry: async (id: string) => {
      const change = this.changes.get(id);
      if (!change || change.status !== 'failed') {
        return null;
      }
      change.status = 'queued';
      change.attemptCount = 0;
      change.lastError = null;
      change.updatedAt = this.isoNow();
      return cloneChange(change);
    },
    discard: async (id: string) => {
      const change = this.changes.get(id);
      if (!change || change.status !== 'failed') {
        return false;
      }
      this.changes.delete(id);
      return true;
    },
    purgeSynced: async (accountId?: string) => {
      let purged = 0;
      for (const [id, change] of this.changes) {
        if (change.status === 'synced' && (!accountId || change.accountId === accountId)) {
          this.changes.delete(id);
          purged += 1;
        }
      }
      return purged;
    },
  };

  readonly events = {
    append: async (accountId: string, eventType: string, payload: Record<string, unknown>) => {
      const id = this.nextEventId;
      this.nextEventId += 1;
      this.eventRows.push({ id, accountId, eventType, payload: structuredClone(payload), createdAt: this.isoNow() });
      return id;
    },
    list: async (since: number, limit: number, accountId?: string) =>
      this.eventRows
        .filter((event) => event.id > since && (!accountId || event.accountId === accountId))
        .slice(0, limit)
        .map((event) => structuredClone(event)),
    prune: async (retentionDays: number) => {
      const cutoff = this.clock() - retentionDays * 86_400_000;
      const before = this.eventRows.length;
      this.eventRows = this.eventRows.filter((event) => Date.parse(event.createdAt) >= cutoff);
      return before - this.eventRows.length;
    },
  };

  async commitSync(commit: SyncCommit): Promise<void> {
    if (this.failNextCommit) {
      const error = this.failNextCommit;
      this.failNextCommit = null;
      throw error;
    }

    const entries = new Map(this.entries);
    const changes = new Map(Array.from(this.changes, ([id, change]) => [id, cloneChange(change)] as const));

    const written = new Set(commit.upserts.map((entry) => entry.localId));
    const marked = new Set(commit.marks.map((mark) => mark.id));
    const later = Array.from(changes.values())
      .filter((change) =>
        change.accountId === commit.accountId
        && change.seq > commit.snapshotSeq
        && (change.status === 'queued' || change.status === 'in_flight')
        && written.has(change.localId)
        && !marked.has(change.id))
      .sort((left, right) => left.seq - right.seq);
    const overlaid = overlayLaterIntents(commit.upserts, later);

    for (const localId of [...commit.deletes, ...overlaid.deletes]) {
      entries.delete(localId);
    }
    for (const entry of overlaid.upserts) {
      if (entry.remoteId !== null) {
        for (const other of entries.values()) {
          if (other.localId !== entry.localId && other.accountId === entry.accountId && other.remoteId === entry.remoteId) {
            throw new Error(`duplicate remote id ${entry.remoteId} for account ${entry.accountId}`);
          }
        }
      }
      entries.set(entry.localId, cloneEntry(entry));
    }
    for (const mark of commit.marks) {
      this.applyMark(changes, mark);
    }

    this.entries = entries;
    this.changes = changes;
    const row = this.stateRow(commit.accountId);
    row.cursor = structuredClone<SyncCursor>(commit.cursor);
    row.lastSyncedAt = commit.syncedAt;
    row.lastErrorKind = null;
    row.lastErrorMessage = null;
    row.status = 'idle';
    row.claimedAtMs = null;
    if (commit.clearFullResync) {
      row.fullResyncRequested = false;
    }
    this.commitCount += 1;
  }

  async recordLocalMutation(mutation: LocalMutation): Promise<PendingChange> {
    const entries = new Map(this.entries);
    const changes = new Map(this.changes);
    const sequences = new Map(this.sequences);
    if (mutation.deleteLocalId) {
      entries.delete(mutation.deleteLocalId);
    }
    if (mutation.upsert) {
      entries.set(mutation.upsert.localId, cloneEntry(mutation.upsert));
    }
    const change = this.enqueueInto(changes, sequences, mutation.change);
    this.entries = entries;
    this.changes = changes;
    this.sequences = sequences;
    return change;
  }
}
