import { v4 as uuidv4 } from 'uuid';
import type {
  DraftContent,
  NewPendingChange,
  PendingChange,
  PendingChangePayload,
  ReplicaEntry,
} from '../shared/types.js';
import { emptyItemFields } from '../shared/types.js';
import type { SyncStorage } from '../storage/syncStorage.js';
import { InvalidPendingChangeError, assertValidPendingChange } from './changeLog.js';
import { applyIntent } from './replica.js';
import { SyncError } from './syncErrors.js';

export const ARCHIVE_LABEL = 'INBOX';

export interface LocalActionResult {
  entry: ReplicaEntry | null;
  change: PendingChange | null;
}

/**
 * User-facing mutations. Each one updates the replica speculatively and records the intent
 * in the change log in the same storage transaction; the next sync pushes it.
 */
export class LocalActions {
  constructor(
    private readonly storage: SyncStorage,
    private readonly clock: () => number = Date.now,
  ) {}

  private async requireEntry(accountId: string, localId: string) {
    const entry = await this.storage.replica.get(accountId, localId);
    if (!entry) {
      throw new SyncError('NotFound', `replica entry ${localId} not found for account ${accountId}`);
    }
    return entry;
  }

  private async record(entry: ReplicaEntry, kind: NewPendingChange['kind'], payload: PendingChangePayload): Promise<LocalActionResult> {
    const change: NewPendingChange = {
      accountId: entry.accountId,
      localId: entry.localId,
      target: kind === 'create' ? null : entry.remoteId,
      kind,
      payload,
    };
    assertValidPendingChange(change);

    const fields = applyIntent(entry.fields, payload);
    const updatedAt = new Date(this.clock()).toISOString();
    const upsert = fields ? { ...entry, fields, updatedAt } : null;
    const recorded = await this.storage.recordLocalMutation({
      accountId: entry.accountId,
      upsert,
      deleteLocalId: fields ? null : entry.localId,
      change,
    });
    return { entry: upsert, change: recorded };
  }

  async setRead(accountId: string, localId: string, isRead: boolean) {
    const entry = await this.requireEntry(accountId, localId);
    if (entry.fields.isRead === isRead) {
      return { entry, change: null };
    }
    return this.record(entry, 'update', {
      op: 'setFlags',
      isRead,
      base: { isRead: entry.fields.isRead },
      baseVersion: entry.versionToken,
    });
  }

  async setStarred(accountId: string, localId: string, isStarred: boolean) {
    const entry = await this.requireEntry(accountId, localId);
    if (entry.fields.isStarred === isStarred) {
      return { entry, change: null };
    }
    return this.record(entry, 'update', {
      op: 'setFlags',
      isStarred,
      base: { isStarred: entry.fields.isStarred },
      baseVersion: entry.versionToken,
    });
  }

  async modifyLabels(accountId: string, localId: string, add: string[], remove: string[]) {
    const entry = await this.requireEntry(accountId, localId);
    const current = new Set(entry.fields.labels);
    const toAdd = Array.from(new Set(add)).filter((label) => !current.has(label));
    const toRemove = Array.from(new Set(remove)).filter((label) => current.has(label) && !toAdd.includes(label));
    if (toAdd.length === 0 && toRemove.length === 0) {
      return { entry, change: null };
    }
    return this.record(entry, 'update', {
      op: 'modifyLabels',
      add: toAdd,
      remove: toRemove,
      base: { labels: [...entry.fields.labels] },
      baseVersion: entry.versionToken,
    });
  }

  archive(accountId: string, localId: string) {
    return this.modifyLabels(accountId, localId, [], [ARCHIVE_LABEL]);
  }

  async trash(accountId: string, localId: string) {
    const entry = await this.requireEntry(accountId, localId);
    if (!entry.remoteId) {
      throw new InvalidPendingChangeError(`entry ${localId} has not been synced yet and cannot be trashed`);
    }
    return this.record(entry, 'delete', { op: 'delete', baseVersion: entry.versionToken });
  }

  /** Creates a local draft when `localId` is null, otherwise edits an existing one. */
  async saveDraft(accountId: string, localId: string | null, draft: DraftContent) {
    const payload: PendingChangePayload = { op: 'saveDraft', draft, baseVersion: null };
    if (localId === null) {
      const entry: ReplicaEntry = {
        localId: uuidv4(),
        accountId,
        remoteId: null,
        versionToken: null,
        fields: emptyItemFields(),
        updatedAt: new Date(this.clock()).toISOString(),
      };
      return this.record(entry, 'create', payload);
    }

    const entry = await this.requireEntry(accountId, localId);
    if (!entry.fields.isDraft) {
      throw new InvalidPendingChangeError(`entry ${localId} is not a draft`);
    }
    return this.record(entry, 'update', { ...payload, baseVersion: entry.versionToken });
  }

  /** Queues sending a draft as it reads now. Locally it stops being a draft at once. */
  async send(accountId: string, localId: string) {
    const entry = await this.requireEntry(accountId, localId);
    if (!entry.fields.isDraft || !entry.fields.draft) {
      throw new InvalidPendingChangeError(`entry ${localId} is not a draft`);
    }
    return this.record(entry, 'update', { op: 'send', draft: entry.fields.draft, baseVersion: entry.versionToken });
  }
}
