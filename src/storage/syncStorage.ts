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

export interface AccountStore {
  list(): Promise<AccountRecord[]>;
  get(accountId: string): Promise<AccountRecord | null>;
  saveCredential(accountId: string, credential: AccountCredential): Promise<void>;
}

export interface SyncStateStore {
  /** Throws `StorageCorruption` when the stored cursor does not validate for the account. */
  load(account: AccountRecord): Promise<SyncStateRecord>;
  claim(accountId: string, staleMs: number): Promise<boolean>;
  heartbeat(accountId: string): Promise<void>;
  release(accountId: string): Promise<void>;
  recordFailure(accountId: string, kind: string, message: string): Promise<void>;
  requestFullResync(accountId: string): Promise<void>;
  reapStaleClaims(staleMs: number): Promise<number>;
}

export interface ReplicaFilter {
  remoteIds?: string[];
  localIds?: string[];
  messageIds?: string[];
}

export interface ReplicaStore {
  /** Without a filter, every entry of the account. */
  load(accountId: string, filter?: ReplicaFilter): Promise<ReplicaEntry[]>;
  get(accountId: string, localId: string): Promise<ReplicaEntry | null>;
}

export interface ChangeLogStore {
  enqueue(input: NewPendingChange): Promise<PendingChange>;
  /** Queued and in-flight entries with `seq > afterSeq`, in sequence order. */
  nextBatch(accountId: string, limit: number, afterSeq?: number): Promise<PendingChange[]>;
  list(accountId: string, statuses?: PendingChangeStatus[]): Promise<PendingChange[]>;
  get(id: string): Promise<PendingChange | null>;
  markInFlight(id: string): Promise<void>;
  markSynced(id: string): Promise<void>;
  markFailed(id: string, reason: string): Promise<void>;
  recordAttempt(id: string, error: string): Promise<void>;
  rewrite(id: string, payload: PendingChangePayload, target: string | null): Promise<void>;
  retry(id: string): Promise<PendingChange | null>;
  discard(id: string): Promise<boolean>;
  purgeSynced(accountId?: string): Promise<number>;
}

export interface SyncEventRecord {
  id: number;
  accountId: string;
  eventType: string;
  payload: Record<string, unknown>;
  createdAt: string;
}

export interface SyncEventStore {
  append(accountId: string, eventType: string, payload: Record<string, unknown>): Promise<number | null>;
  list(since: number, limit: number, accountId?: string): Promise<SyncEventRecord[]>;
  prune(retentionDays: number): Promise<number>;
}

export type ChangeLogMark =
  | { type: 'synced'; id: string }
  | { type: 'failed'; id: string; reason: string }
  | { type: 'attempt'; id: string; error: string }
  | { type: 'rewrite'; id: string; payload: PendingChangePayload; target: string | null };

export interface SyncCommit {
  accountId: string;
  cursor: SyncCursor;
  /** Highest change-log seq the run read; queued changes above it are re-applied to `upserts`. */
  snapshotSeq: number;
  upserts: ReplicaEntry[];
  deletes: string[];
  marks: ChangeLogMark[];
  syncedAt: string;
  clearFullResync: boolean;
}

export interface LocalMutation {
  accountId: string;
  upsert: ReplicaEntry | null;
  deleteLocalId: string | null;
  change: NewPendingChange;
}

export interface SyncStorage {
  accounts: AccountStore;
  syncState: SyncStateStore;
  replica: ReplicaStore;
  changeLog: ChangeLogStore;
  events: SyncEventStore;
  /**
   * Cursor, replica writes and change-log marks in one transaction; also releases the claim.
   * Local mutations recorded after `snapshotSeq` stay visible on the entries being written.
   */
  commitSync(commit: SyncCommit): Promise<void>;
  /** Speculative replica write plus enqueue in one transaction. */
  recordLocalMutation(mutation: LocalMutation): Promise<PendingChange>;
}
