import { v4 as uuidv4 } from 'uuid';
import type {
  ItemFields,
  PendingChange,
  PendingChangePayload,
  RemoteItem,
  RemoteItemPatch,
  ReplicaEntry,
} from '../shared/types.js';

const uniqueLabels = (labels: Iterable<string>) => Array.from(new Set(labels)).sort();

export const remoteItemFields = (item: RemoteItem): ItemFields => ({
  threadId: item.threadId,
  messageId: item.messageId,
  subject: item.subject,
  from: item.from,
  to: item.to,
  snippet: item.snippet,
  receivedAt: item.receivedAt,
  isRead: item.isRead,
  isStarred: item.isStarred,
  isDraft: item.isDraft,
  labels: uniqueLabels(item.labels),
  draft: item.draft ? { ...item.draft, to: [...item.draft.to], cc: [...item.draft.cc] } : null,
});

/** Merges a remote patch; label deltas are set operations, so re-applying is a no-op. */
export const applyPatch = (fields: ItemFields, patch: RemoteItemPatch): ItemFields => {
  const labels = new Set(patch.labels ?? fields.labels);
  for (const label of patch.labelsAdded ?? []) {
    labels.add(label);
  }
  for (const label of patch.labelsRemoved ?? []) {
    labels.delete(label);
  }
  return {
    ...fields,
    isRead: patch.isRead ?? fields.isRead,
    isStarred: patch.isStarred ?? fields.isStarred,
    isDraft: patch.isDraft ?? fields.isDraft,
    labels: uniqueLabels(labels),
  };
};

/** The speculative local effect of a pending mutation; `null` means the item is gone locally. */
export const applyIntent = (fields: ItemFields, payload: PendingChangePayload): ItemFields | null => {
  switch (payload.op) {
    case 'setFlags':
      return {
        ...fields,
        isRead: payload.isRead ?? fields.isRead,
        isStarred: payload.isStarred ?? fields.isStarred,
      };
    case 'modifyLabels': {
      const labels = new Set(fields.labels);
      for (const label of payload.add) {
        labels.add(label);
      }
      for (const label of payload.remove) {
        labels.delete(label);
      }
      return { ...fields, labels: uniqueLabels(labels) };
    }
    case 'saveDraft':
      return {
        ...fields,
        isDraft: true,
        subject: payload.draft.subject,
        to: payload.draft.to.join(', ') || null,
        snippet: payload.draft.bodyText.slice(0, 200) || null,
        draft: { ...payload.draft, to: [...payload.draft.to], cc: [...payload.draft.cc] },
      };
    case 'send':
      return { ...fields, isDraft: false, isRead: true };
    case 'delete':
      return null;
  }
};

/** Re-applies queued intents in sequence order on top of freshly merged remote fields. */
export const overlayIntents = (fields: ItemFields, pending: PendingChange[]): ItemFields | null => {
  let current: ItemFields | null = fields;
  const ordered = [...pending].sort((left, right) => left.seq - right.seq);
  for (const change of ordered) {
    if (!current) {
      return null;
    }
    current = applyIntent(current, change.payload);
  }
  return current;
};

/**
 * Local mutations recorded while a sync run was in progress are not part of its working set.
 * Before the run's entries are written, their queued intents are laid back on top; an entry
 * whose later intent deletes it moves to `deletes`.
 */
export const overlayLaterIntents = (upserts: ReplicaEntry[], later: PendingChange[]) => {
  const byLocal = new Map<string, PendingChange[]>();
  for (const change of later) {
    const list = byLocal.get(change.localId) ?? [];
    list.push(change);
    byLocal.set(change.localId, list);
  }
  const kept: ReplicaEntry[] = [];
  const deletes: string[] = [];
  for (const entry of upserts) {
    const pending = byLocal.get(entry.localId);
    if (!pending) {
      kept.push(entry);
      continue;
    }
    const overlaid = overlayIntents(entry.fields, pending);
    if (overlaid) {
      kept.push({ ...entry, fields: overlaid });
    } else {
      deletes.push(entry.localId);
    }
  }
  return { upserts: kept, deletes };
};

/**
 * Staged copy of the replica entries one sync run touches. Nothing here is durable until
 * `toCommit()` is handed to storage in the run's single transaction.
 */
export class ReplicaWorkingSet {
  private byLocal = new Map<string, ReplicaEntry>();
  private byRemote = new Map<string, string>();
  private dirty = new Set<string>();
  private removed = new Set<string>();

  constructor(
    readonly accountId: string,
    entries: ReplicaEntry[],
    private readonly now: () => string = () => new Date().toISOString(),
  ) {
    this.addLoaded(entries);
  }

  /** Adds entries read from storage, ignoring ones this run already holds or removed. */
  addLoaded(entries: ReplicaEntry[]) {
    for (const entry of entries) {
      if (this.byLocal.has(entry.localId) || this.removed.has(entry.localId)) {
        continue;
      }
      this.index(entry);
    }
  }

  private index(entry: ReplicaEntry) {
    const previous = this.byLocal.get(entry.localId);
    if (previous?.remoteId && this.byRemote.get(previous.remoteId) === entry.localId) {
      this.byRemote.delete(previous.remoteId);
    }
    this.byLocal.set(entry.localId, entry);
    if (entry.remoteId) {
      const holder = this.byRemote.get(entry.remoteId);
      if (holder && holder !== entry.localId) {
        const displaced = this.byLocal.get(holder);
        if (displaced) {
          this.byLocal.set(holder, { ...displaced, remoteId: null, versionToken: null });
          this.dirty.add(holder);
        }
      }
      this.byRemote.set(entry.remoteId, entry.localId);
    }
  }

  has(localId: string) {
    return this.byLocal.has(localId);
  }

  wasRemoved(localId: string) {
    return this.removed.has(localId);
  }

  getByLocal(localId: string) {
    return this.byLocal.get(localId) ?? null;
  }

  getByRemote(remoteId: string) {
    const localId = this.byRemote.get(remoteId);
    return localId ? this.byLocal.get(localId) ?? null : null;
  }

  findUnlinkedByMessageId(messageId: string | null) {
    if (!messageId) {
      return null;
    }
    for (const entry of this.byLocal.values()) {
      if (entry.remoteId === null && entry.fields.messageId === messageId) {
        return entry;
      }
    }
    return null;
  }

  put(entry: ReplicaEntry) {
    const staged = { ...entry, accountId: this.accountId, updatedAt: this.now() };
    this.removed.delete(staged.localId);
    this.index(staged);
    this.dirty.add(staged.localId);
    return staged;
  }

  insert(item: RemoteItem, fields: ItemFields) {
    return this.put({
      localId: uuidv4(),
      accountId: this.accountId,
      remoteId: item.remoteId,
      versionToken: item.versionToken,
      fields,
      updatedAt: this.now(),
    });
  }

  remove(localId: string) {
    const entry = this.byLocal.get(localId);
    if (!entry) {
      return;
    }
    if (entry.remoteId && this.byRemote.get(entry.remoteId) === localId) {
      this.byRemote.delete(entry.remoteId);
    }
    this.byLocal.delete(localId);
    this.dirty.delete(localId);
    this.removed.add(localId);
  }

  /**
   * Full-resync preparation: entries without queued work are dropped, the rest lose their
   * remote identity and wait to be relinked by message id.
   */
  unlinkAll(keepLocalIds: Set<string>) {
    for (const entry of Array.from(this.byLocal.values())) {
      if (!keepLocalIds.has(entry.localId)) {
        this.remove(entry.localId);
        continue;
      }
      this.put({ ...entry, remoteId: null, versionToken: null });
    }
  }

  entries() {
    return Array.from(this.byLocal.values());
  }

  toCommit() {
    return {
      upserts: Array.from(this.dirty)
        .map((localId) => this.byLocal.get(localId))
        .filter((entry): entry is ReplicaEntry => entry !== undefined),
      deletes: Array.from(this.removed),
    };
  }
}
