import type {
  AccountRecord,
  ItemFields,
  PendingChange,
  PushOutcome,
  RemoteChange,
  RemoteItem,
  RemoteState,
  SyncCursor,
  SyncRunResult,
  SyncStateRecord,
} from '../shared/types.js';
import type { SyncConfig } from '../config/env.js';
import type { ChangeLogMark, SyncStorage } from '../storage/syncStorage.js';
import type { FetchResult, ProviderAdapter } from './providers/types.js';
import { ChangeLog } from './changeLog.js';
import { laterCursor } from './cursor.js';
import {
  DEFAULT_CONFLICT_POLICY,
  rebasePendingChange,
  resolveConflict,
} from './conflictResolver.js';
import type { ConflictPolicy, ConflictResolution } from './conflictResolver.js';
import { ReplicaWorkingSet, applyIntent, applyPatch, overlayIntents, remoteItemFields } from './replica.js';
import { runWithTimeout } from './retry.js';
import { SyncError, describeError, isSyncError, toSyncError } from './syncErrors.js';
import type { SyncEventBus } from './syncEvents.js';

export type ReconcilerConfig = Pick<
  SyncConfig,
  'adapterTimeoutMs' | 'drainBatchSize' | 'maxPushAttempts' | 'syncClaimStaleMs'
>;

export interface AdapterSource {
  adapterFor(account: AccountRecord): ProviderAdapter;
}

export interface ReconcilerOptions {
  storage: SyncStorage;
  adapters: AdapterSource;
  events: SyncEventBus;
  config: ReconcilerConfig;
  policy?: ConflictPolicy;
  clock?: () => number;
}

export interface SyncRunOptions {
  shouldStop?: () => boolean;
}

/** Process-local mutex keyed by account id. */
export class KeyedLock {
  private held = new Set<string>();

  tryAcquire(key: string) {
    if (this.held.has(key)) {
      return false;
    }
    this.held.add(key);
    return true;
  }

  release(key: string) {
    this.held.delete(key);
  }

  isHeld(key: string) {
    return this.held.has(key);
  }
}

type DrainStep = 'continue' | 'stop';

const oldestReceivedAt = (changes: RemoteChange[]) => {
  let oldest: number | null = null;
  for (const change of changes) {
    const receivedAt = change.type === 'new' && change.item.receivedAt !== null ? Date.parse(change.item.receivedAt) : Number.NaN;
    if (Number.isFinite(receivedAt) && (oldest === null || receivedAt < oldest)) {
      oldest = receivedAt;
    }
  }
  return oldest;
};

class SyncCancelled extends Error {}

/** State of one reconciliation of one account. Discarded after `execute()` returns. */
class SyncRun {
  private readonly changeLog: ChangeLog;
  private readonly accountId: string;
  private ws: ReplicaWorkingSet = new ReplicaWorkingSet('', []);
  private pendingById = new Map<string, PendingChange>();
  private deleteTargets = new Map<string, PendingChange>();
  private resolved = new Set<string>();
  private skippedLocalIds = new Set<string>();
  private staleVersions = new Map<string, { stale: Set<string>; current: string }>();
  private seenRemoteIds = new Set<string>();
  private marks: ChangeLogMark[] = [];
  private drainLimitSeq = 0;
  private receivedCount = 0;
  private pushedCount = 0;
  private failedCount = 0;
  private conflictCount = 0;
  private blocked = false;
  private cancelled = false;

  constructor(
    private readonly account: AccountRecord,
    private readonly adapter: ProviderAdapter,
    private readonly options: ReconcilerOptions,
    private readonly shouldStop: () => boolean,
  ) {
    this.accountId = account.id;
    this.changeLog = new ChangeLog(options.storage.changeLog);
  }

  private get policy() {
    return this.options.policy ?? DEFAULT_CONFLICT_POLICY;
  }

  private nowIso() {
    return new Date((this.options.clock ?? Date.now)()).toISOString();
  }

  private checkStop() {
    if (this.shouldStop()) {
      throw new SyncCancelled();
    }
  }

  private async callAdapter<T>(label: string, fn: () => Promise<T>): Promise<T> {
    this.checkStop();
    try {
      return await runWithTimeout(label, this.options.config.adapterTimeoutMs, fn);
    } catch (error) {
      throw toSyncError(error);
    }
  }

  private async callPush(change: PendingChange): Promise<PushOutcome> {
    try {
      return await runWithTimeout(
        'pushChange',
        this.options.config.adapterTimeoutMs,
        () => this.adapter.pushChange(change),
      );
    } catch (error) {
      const syncError = toSyncError(error);
      if (syncError.kind === 'NetworkError' || syncError.kind === 'RateLimited') {
        return { type: 'retryable', error: syncError.message, retryAfterMs: syncError.retryAfterMs ?? undefined };
      }
      throw syncError;
    }
  }

  async execute(state: SyncStateRecord, startedAtMs: number): Promise<{ result: SyncRunResult; committed: boolean }> {
    const storedCursor = state.fullResyncRequested ? null : state.cursor;
    let prepared: { fetched: FetchResult; fullResync: boolean };
    try {
      prepared = await this.fetchAndApply(storedCursor);
    } catch (error) {
      if (error instanceof SyncCancelled) {
        this.cancelled = true;
        return { result: this.result(storedCursor, storedCursor === null, startedAtMs), committed: false };
      }
      throw error;
    }

    const cursor = this.nextCursor(storedCursor, prepared.fetched.cursor, prepared.fullResync);
    try {
      await this.drain();
    } catch (error) {
      if (!(error instanceof SyncCancelled)) {
        await this.commit(cursor, state.fullResyncRequested).catch((commitError: unknown) => {
          console.error(`[reconciler] failed to commit partial sync for ${this.accountId}`, commitError);
        });
        throw error;
      }
      this.cancelled = true;
    }

    await this.commit(cursor, state.fullResyncRequested);
    return { result: this.result(cursor, prepared.fullResync, startedAtMs), committed: true };
  }

  private async fetchAndApply(storedCursor: SyncCursor | null) {
    let fullResync = storedCursor === null;
    let invalidated = false;
    await this.callAdapter('authenticate', () => this.adapter.authenticate());

    let fetched: FetchResult;
    try {
      fetched = await this.callAdapter('fetchChangesSince', () => this.adapter.fetchChangesSince(storedCursor));
    } catch (error) {
      if (!isSyncError(error, 'CursorInvalidated')) {
        throw error;
      }
      console.info(`[reconciler] cursor invalidated for ${this.accountId}; running full resync`);
      fullResync = true;
      invalidated = true;
      fetched = await this.callAdapter('fetchChangesSince', () => this.adapter.fetchChangesSince(null));
    }

    this.indexPending(await this.changeLog.outstanding(this.accountId));
    await this.loadWorkingSet(fetched.changes, fullResync, invalidated);
    for (const change of fetched.changes) {
      await this.applyRemoteChange(change);
    }
    if (invalidated) {
      this.settleUnlinkedAfterResync();
    } else if (fullResync) {
      this.pruneUnlisted(fetched);
    }
    return { fetched, fullResync };
  }

  private nextCursor(stored: SyncCursor | null, incoming: SyncCursor, fullResync: boolean): SyncCursor {
    if (fullResync) {
      return incoming;
    }
    const next = laterCursor(stored, incoming, (left, right) => this.adapter.compareCursors(left, right));
    if (next !== incoming) {
      console.warn(`[reconciler] adapter returned an older cursor for ${this.accountId}; keeping stored cursor`);
    }
    return next;
  }

  private indexPending(outstanding: PendingChange[]) {
    for (const change of outstanding) {
      this.pendingById.set(change.id, change);
      this.drainLimitSeq = Math.max(this.drainLimitSeq, change.seq);
      if (change.kind === 'delete' && change.target) {
        this.deleteTargets.set(change.target, change);
      }
    }
  }

  private pendingFor(localId: string): PendingChange[] {
    return Array.from(this.pendingById.values())
      .filter((change) => change.localId === localId && !this.resolved.has(change.id))
      .sort((left, right) => left.seq - right.seq);
  }

  private async loadWorkingSet(changes: RemoteChange[], fullResync: boolean, invalidated: boolean) {
    const replica = this.options.storage.replica;
    if (fullResync) {
      this.ws = new ReplicaWorkingSet(this.accountId, await replica.load(this.accountId), () => this.nowIso());
      if (invalidated) {
        const keep = new Set(Array.from(this.pendingById.values(), (change) => change.localId));
        this.ws.unlinkAll(keep);
      }
      return;
    }
    const remoteIds = changes.map((change) => (change.type === 'new' ? change.item.remoteId : change.remoteId));
    const localIds = Array.from(new Set(Array.from(this.pendingById.values(), (change) => change.localId)));
    const messageIds = changes
      .map((change) => (change.type === 'new' ? change.item.messageId : null))
      .filter((value): value is string => value !== null);
    const entries = await replica.load(this.accountId, { remoteIds, localIds, messageIds });
    this.ws = new ReplicaWorkingSet(this.accountId, entries, () => this.nowIso());
  }

  private async applyRemoteChange(change: RemoteChange) {
    switch (change.type) {
      case 'deleted': {
        this.receivedCount += 1;
        const entry = this.ws.getByRemote(change.remoteId);
        if (entry) {
          this.ws.remove(entry.localId);
        }
        return;
      }
      case 'updated': {
        const entry = this.ws.getByRemote(change.remoteId);
        if (entry) {
          this.receivedCount += 1;
          this.putRemoteFields(entry.localId, change.remoteId, applyPatch(entry.fields, change.patch), change.versionToken);
          return;
        }
        if (this.deleteTargets.has(change.remoteId)) {
          this.receivedCount += 1;
          return;
        }
        let item: RemoteItem;
        try {
          item = await this.callAdapter('fetchFullItem', () => this.adapter.fetchFullItem(change.remoteId));
        } catch (error) {
          if (isSyncError(error, 'NotFound')) {
            this.receivedCount += 1;
            return;
          }
          throw error;
        }
        this.applyNew(item);
        return;
      }
      case 'new':
        this.applyNew(change.item);
        return;
    }
  }

  private applyNew(item: RemoteItem) {
    this.receivedCount += 1;
    this.seenRemoteIds.add(item.remoteId);
    const entry = this.ws.getByRemote(item.remoteId) ?? this.ws.findUnlinkedByMessageId(item.messageId);
    if (!entry) {
      if (!this.deleteTargets.has(item.remoteId)) {
        this.ws.insert(item, remoteItemFields(item));
      }
      return;
    }

    for (const pending of this.pendingFor(entry.localId)) {
      const resolution = resolveConflict(pending, { deleted: false, item }, this.policy);
      this.noteResolution(pending, resolution);
      if (resolution.verdict === 'KeepRemote') {
        this.stageSynced(pending);
      }
    }
    this.putRemoteFields(entry.localId, item.remoteId, remoteItemFields(item), item.versionToken);
  }

  /** Writes remote fields to an entry and re-applies whatever local intent is still queued. */
  private putRemoteFields(localId: string, remoteId: string, fields: ItemFields, versionToken: string) {
    const overlaid = overlayIntents(fields, this.pendingFor(localId));
    if (!overlaid) {
      this.ws.remove(localId);
      return;
    }
    this.ws.put({
      localId,
      accountId: this.accountId,
      remoteId,
      versionToken,
      fields: overlaid,
      updatedAt: this.nowIso(),
    });
  }

  // After an epoch reset, entries the full listing did not relink point at nothing.
  private settleUnlinkedAfterResync() {
    for (const entry of this.ws.entries()) {
      if (entry.remoteId !== null) {
        continue;
      }
      const pending = this.pendingFor(entry.localId);
      if (pending.some((change) => change.kind === 'create')) {
        continue;
      }
      for (const change of pending) {
        this.resolveAgainstDeleted(change);
      }
      this.ws.remove(entry.localId);
    }
    for (const [target, change] of this.deleteTargets) {
      if (!this.seenRemoteIds.has(target) && !this.resolved.has(change.id)) {
        this.resolveAgainstDeleted(change);
      }
    }
  }

  // A full listing is the remote truth for the window it covers: linked entries inside that
  // window that it did not return were deleted remotely while the cursor was set aside.
  private pruneUnlisted(fetched: FetchResult) {
    const floor = fetched.truncated ? oldestReceivedAt(fetched.changes) : null;
    if (fetched.truncated && floor === null) {
      return;
    }
    for (const entry of this.ws.entries()) {
      if (entry.remoteId === null || this.seenRemoteIds.has(entry.remoteId)) {
        continue;
      }
      if (floor !== null) {
        const receivedAt = entry.fields.receivedAt === null ? Number.NaN : Date.parse(entry.fields.receivedAt);
        if (!(receivedAt >= floor)) {
          continue;
        }
      }
      for (const change of this.pendingFor(entry.localId)) {
        this.resolveAgainstDeleted(change);
      }
      this.ws.remove(entry.localId);
    }
    if (fetched.truncated) {
      return;
    }
    for (const [target, change] of this.deleteTargets) {
      if (!this.seenRemoteIds.has(target) && !this.resolved.has(change.id)) {
        this.resolveAgainstDeleted(change);
      }
    }
  }

  private resolveAgainstDeleted(change: PendingChange) {
    const resolution = resolveConflict(change, { deleted: true }, this.policy);
    this.noteResolution(change, resolution);
    this.conflictCount += 1;
    this.stageSynced(change);
  }

  private noteResolution(change: PendingChange, resolution: ConflictResolution) {
    if (resolution.ambiguous) {
      console.warn(
        `[reconciler] ambiguous conflict for change ${change.id} on ${this.accountId}: ${resolution.reason}; keeping remote`,
      );
    }
  }

  private stageSynced(change: PendingChange) {
    this.marks.push({ type: 'synced', id: change.id });
    this.resolved.add(change.id);
  }

  private stageFailed(change: PendingChange, reason: string) {
    this.marks.push({ type: 'failed', id: change.id, reason });
    this.resolved.add(change.id);
    this.skippedLocalIds.add(change.localId);
    this.failedCount += 1;
    console.warn(`[reconciler] change ${change.id} on ${this.accountId} failed: ${reason}`);
  }

  private stageRewrite(change: PendingChange) {
    this.marks.push({ type: 'rewrite', id: change.id, payload: change.payload, target: change.target });
    this.pendingById.set(change.id, change);
  }

  private async drain() {
    const batchSize = this.options.config.drainBatchSize;
    let afterSeq = 0;
    for (;;) {
      this.checkStop();
      const batch = await this.changeLog.nextBatch(this.accountId, batchSize, afterSeq);
      const eligible = batch.filter((change) => change.seq <= this.drainLimitSeq);
      if (eligible.length === 0) {
        return;
      }
      const missing = eligible
        .map((change) => change.localId)
        .filter((localId) => !this.ws.has(localId) && !this.ws.wasRemoved(localId));
      if (missing.length > 0) {
        this.ws.addLoaded(await this.options.storage.replica.load(this.accountId, { localIds: missing }));
      }

      for (const stored of eligible) {
        afterSeq = stored.seq;
        const change = this.pendingById.get(stored.id) ?? stored;
        if (this.resolved.has(change.id) || this.skippedLocalIds.has(change.localId)) {
          continue;
        }
        const step = await this.pushOne(change);
        if (step === 'stop') {
          this.blocked = true;
          return;
        }
      }
      if (batch.length < batchSize) {
        return;
      }
    }
  }

  private withCurrentBase(change: PendingChange): PendingChange {
    const versions = this.staleVersions.get(change.localId);
    const base = change.payload.baseVersion;
    if (!versions || base === null || !versions.stale.has(base)) {
      return change;
    }
    return { ...change, payload: { ...change.payload, baseVersion: versions.current } };
  }

  private async pushOne(stored: PendingChange): Promise<DrainStep> {
    let target: string | null = null;
    if (stored.kind === 'delete') {
      target = stored.target;
    } else if (stored.kind === 'update') {
      const entry = this.ws.getByLocal(stored.localId);
      if (!entry || entry.remoteId === null) {
        this.resolveAgainstDeleted(stored);
        return 'continue';
      }
      target = entry.remoteId;
    }

    const change = this.withCurrentBase({ ...stored, target });
    this.checkStop();
    await this.changeLog.markInFlight(change.id);
    const outcome = await this.callPush(change);
    return this.handleOutcome(change, outcome, true);
  }

  private async handleOutcome(change: PendingChange, outcome: PushOutcome, allowRetry: boolean): Promise<DrainStep> {
    switch (outcome.type) {
      case 'accepted':
        this.onAccepted(change, outcome.remoteId, outcome.versionToken ?? null);
        return 'continue';
      case 'rejected':
        this.stageFailed(change, `rejected by remote: ${outcome.reason}`);
        await this.refreshAfterRejection(change);
        return 'continue';
      case 'retryable': {
        const attempts = change.attemptCount + 1;
        if (attempts >= this.options.config.maxPushAttempts) {
          this.stageFailed(change, `gave up after ${attempts} attempts: ${outcome.error}`);
          return 'continue';
        }
        this.marks.push({ type: 'attempt', id: change.id, error: outcome.error });
        return 'stop';
      }
      case 'conflict':
        return this.onConflict(change, outcome.remote, allowRetry);
    }
  }

  private async onConflict(change: PendingChange, remote: RemoteState, allowRetry: boolean): Promise<DrainStep> {
    this.conflictCount += 1;
    const resolution = resolveConflict(change, remote, this.policy);
    this.noteResolution(change, resolution);

    if (resolution.verdict === 'KeepRemote' || remote.deleted) {
      this.stageSynced(change);
      this.applyRemoteState(change.localId, remote);
      return 'continue';
    }

    const rebased = rebasePendingChange(change, remote.item);
    if (resolution.verdict === 'Reapply') {
      this.stageRewrite(rebased);
      this.skippedLocalIds.add(change.localId);
      return 'continue';
    }

    if (!allowRetry || this.shouldStop()) {
      this.stageRewrite(rebased);
      const attempts = change.attemptCount + 1;
      if (attempts >= this.options.config.maxPushAttempts) {
        this.stageFailed(change, `conflict persisted after ${attempts} attempts: ${resolution.reason}`);
        this.applyRemoteState(change.localId, remote);
        return 'continue';
      }
      this.marks.push({ type: 'attempt', id: change.id, error: `conflict persisted: ${resolution.reason}` });
      return 'stop';
    }
    this.stageRewrite(rebased);
    const retried = await this.callPush(rebased);
    return this.handleOutcome(rebased, retried, false);
  }

  private onAccepted(change: PendingChange, remoteId: string, versionToken: string | null) {
    this.stageSynced(change);
    this.pushedCount += 1;
    if (change.kind === 'delete') {
      return;
    }
    // The draft is gone remotely; the sent copy arrives through the remote listing.
    if (change.payload.op === 'send') {
      this.ws.remove(change.localId);
      return;
    }
    const entry = this.ws.getByLocal(change.localId);
    if (!entry) {
      return;
    }
    const fields = applyIntent(entry.fields, change.payload) ?? entry.fields;
    if (versionToken && entry.versionToken && versionToken !== entry.versionToken) {
      const versions = this.staleVersions.get(change.localId) ?? { stale: new Set<string>(), current: versionToken };
      versions.stale.add(entry.versionToken);
      versions.current = versionToken;
      this.staleVersions.set(change.localId, versions);
    }
    this.ws.put({ ...entry, remoteId, versionToken: versionToken ?? entry.versionToken, fields });
  }

  private applyRemoteState(localId: string, remote: RemoteState) {
    if (remote.deleted) {
      this.ws.remove(localId);
      return;
    }
    this.putRemoteFields(localId, remote.item.remoteId, remoteItemFields(remote.item), remote.item.versionToken);
  }

  // The speculative local state of a rejected change is wrong; pull the remote truth back.
  private async refreshAfterRejection(change: PendingChange) {
    if (change.target === null || this.shouldStop()) {
      return;
    }
    const target = change.target;
    try {
      const item = await this.callAdapter('fetchFullItem', () => this.adapter.fetchFullItem(target));
      this.applyRemoteState(change.localId, { deleted: false, item });
    } catch (error) {
      if (isSyncError(error, 'NotFound')) {
        this.ws.remove(change.localId);
        return;
      }
      if (isSyncError(error, 'AuthExpired') || error instanceof SyncCancelled) {
        throw error;
      }
      console.warn(`[reconciler] could not refresh ${target} after rejection: ${describeError(error)}`);
    }
  }

  private async commit(cursor: SyncCursor, clearFullResync: boolean) {
    const { upserts, deletes } = this.ws.toCommit();
    await this.options.storage.commitSync({
      accountId: this.accountId,
      cursor,
      snapshotSeq: this.drainLimitSeq,
      upserts,
      deletes,
      marks: this.marks,
      syncedAt: this.nowIso(),
      clearFullResync,
    });
    try {
      await this.changeLog.purgeSynced(this.accountId);
    } catch (error) {
      console.warn(`[reconciler] purge of synced changes failed for ${this.accountId}`, error);
    }
  }

  private result(cursor: SyncCursor | null, fullResync: boolean, startedAtMs: number): SyncRunResult {
    return {
      accountId: this.accountId,
      receivedCount: this.receivedCount,
      pushedCount: this.pushedCount,
      failedCount: this.failedCount,
      conflictCount: this.conflictCount,
      fullResync,
      blocked: this.blocked,
      cancelled: this.cancelled,
      cursor,
      durationMs: (this.options.clock ?? Date.now)() - startedAtMs,
    };
  }
}

/**
 * Runs one reconciliation per call: fetch remote changes, apply them to the replica, drain
 * the account's change log, then commit cursor, replica and change-log marks together.
 */
export class Reconciler {
  private readonly locks = new KeyedLock();

  constructor(private readonly options: ReconcilerOptions) {}

  isRunning(accountId: string) {
    return this.locks.isHeld(accountId);
  }

  async sync(accountId: string, runOptions: SyncRunOptions = {}): Promise<SyncRunResult> {
    if (!this.locks.tryAcquire(accountId)) {
      throw new SyncError('AlreadySyncing', `sync already running for account ${accountId}`);
    }
    try {
      return await this.syncLocked(accountId, runOptions.shouldStop ?? (() => false));
    } finally {
      this.locks.release(accountId);
    }
  }

  private now() {
    return (this.options.clock ?? Date.now)();
  }

  private async syncLocked(accountId: string, shouldStop: () => boolean): Promise<SyncRunResult> {
    const { storage, events, config } = this.options;
    const account = await storage.accounts.get(accountId);
    if (!account) {
      throw new SyncError('NotFound', `account ${accountId} does not exist`);
    }
    if (!(await storage.syncState.claim(accountId, config.syncClaimStaleMs))) {
      throw new SyncError('AlreadySyncing', `account ${accountId} is claimed by another sync`);
    }

    const heartbeatMs = Math.min(Math.max(Math.floor(config.syncClaimStaleMs / 3), 5_000), 15_000);
    const heartbeat = setInterval(() => {
      storage.syncState.heartbeat(accountId).catch((error: unknown) => {
        console.warn(`[reconciler] heartbeat failed for ${accountId}`, error);
      });
    }, heartbeatMs);
    heartbeat.unref();

    const startedAtMs = this.now();
    events.emit({ type: 'SyncStarted', accountId, at: new Date(startedAtMs).toISOString() });
    try {
      const state = await storage.syncState.load(account);
      const run = new SyncRun(account, this.options.adapters.adapterFor(account), this.options, shouldStop);
      const { result, committed } = await run.execute(state, startedAtMs);
      if (!committed) {
        await storage.syncState.release(accountId);
      }
      if (result.cancelled) {
        console.info(`[reconciler] sync for ${accountId} stopped early`);
        events.emit({
          type: 'SyncFailed',
          accountId,
          errorKind: 'Cancelled',
          message: 'sync stopped before completion',
          at: new Date(this.now()).toISOString(),
        });
        return result;
      }
      console.info(
        `[reconciler] synced ${accountId}: received=${result.receivedCount} pushed=${result.pushedCount} failed=${result.failedCount}`,
      );
      events.emit({
        type: 'SyncCompleted',
        accountId,
        receivedCount: result.receivedCount,
        pushedCount: result.pushedCount,
        failedCount: result.failedCount,
        fullResync: result.fullResync,
        at: new Date(this.now()).toISOString(),
      });
      return result;
    } catch (error) {
      const syncError = toSyncError(error);
      await storage.syncState.recordFailure(accountId, syncError.kind, syncError.message).catch((recordError: unknown) => {
        console.error(`[reconciler] failed to record sync failure for ${accountId}`, recordError);
      });
      console.warn(`[reconciler] sync failed for ${accountId}: ${syncError.kind}: ${syncError.message}`);
      const at = new Date(this.now()).toISOString();
      events.emit({ type: 'SyncFailed', accountId, errorKind: syncError.kind, message: syncError.message, at });
      if (syncError.kind === 'AuthExpired') {
        events.emit({ type: 'AuthRequired', accountId, at });
      }
      throw syncError;
    } finally {
      clearInterval(heartbeat);
    }
  }
}
