import type { SyncConfig } from '../../config/env.js';
import type {
  DraftContent,
  PendingChange,
  PushOutcome,
  RemoteChange,
  RemoteItem,
  RemoteItemPatch,
  SyncCursor,
} from '../../shared/types.js';
import { compareCursors } from '../cursor.js';
import { composeDraft, draftMessageId, parseDraftSource } from '../draftComposer.js';
import {
  GmailApiError,
  asRecord,
  readArray,
  readString,
  readStringArray,
} from '../gmailApi.js';
import type { GmailAccessTokenSource, GmailClient } from '../gmailApi.js';
import { mapWithConcurrency } from '../retry.js';
import { SyncError, isSyncError, toSyncError } from '../syncErrors.js';
import type { FetchResult, ProviderAdapter } from './types.js';

const FLAG_LABELS = new Set(['UNREAD', 'STARRED', 'DRAFT']);
const METADATA_HEADERS = ['Message-ID', 'Subject', 'From', 'To'];
const PAGE_SIZE = 500;

export type HistoryProviderConfig = Pick<
  SyncConfig,
  'fullSyncLimit' | 'gmailFullSyncQuery' | 'messageIdDomain' | 'metadataFetchConcurrency'
>;

export interface HistoryProviderOptions {
  accountId: string;
  fromAddress: string;
  client: GmailClient;
  tokens: GmailAccessTokenSource;
  config: HistoryProviderConfig;
}

export const gmailErrorToSyncError = (error: unknown): SyncError => {
  if (!(error instanceof GmailApiError)) {
    return toSyncError(error);
  }
  const options = { cause: error, retryAfterMs: error.retryAfterMs };
  if (error.status === 429 || (error.status === 403 && /rate.?limit|quota/i.test(error.body))) {
    return new SyncError('RateLimited', error.message, options);
  }
  if (error.status === 401 || error.status === 403) {
    return new SyncError('AuthExpired', error.message, options);
  }
  if (error.status === 404) {
    return new SyncError('NotFound', error.message, options);
  }
  if (error.status === 408 || error.status >= 500) {
    return new SyncError('NetworkError', error.message, options);
  }
  return new SyncError('PushRejected', error.message, options);
};

const isHistoryInvalidation = (error: unknown) =>
  error instanceof GmailApiError
  && (error.status === 404 || (error.status === 400 && /starthistoryid/i.test(error.body)));

export const gmailMessageToRemoteItem = (payload: unknown): RemoteItem => {
  const remoteId = readString(payload, 'id');
  if (!remoteId) {
    throw new Error('Gmail message payload has no id');
  }
  const labelIds = readStringArray(payload, 'labelIds');
  const headers = new Map<string, string>();
  for (const header of readArray(asRecord(payload).payload, 'headers')) {
    const name = readString(header, 'name');
    if (name) {
      headers.set(name.toLowerCase(), readString(header, 'value') ?? '');
    }
  }
  const internalDate = Number(readString(payload, 'internalDate'));

  return {
    remoteId,
    versionToken: readString(payload, 'historyId') ?? '0',
    threadId: readString(payload, 'threadId'),
    messageId: headers.get('message-id') || null,
    subject: headers.get('subject') ?? null,
    from: headers.get('from') ?? null,
    to: headers.get('to') ?? null,
    snippet: readString(payload, 'snippet'),
    receivedAt: Number.isFinite(internalDate) && internalDate > 0 ? new Date(internalDate).toISOString() : null,
    isRead: !labelIds.includes('UNREAD'),
    isStarred: labelIds.includes('STARRED'),
    isDraft: labelIds.includes('DRAFT'),
    labels: labelIds.filter((label) => !FLAG_LABELS.has(label)).sort(),
    draft: null,
  };
};

/** Translates a history label delta into a patch; UNREAD/STARRED/DRAFT become flags. */
export const labelDeltaToPatch = (added: string[], removed: string[]): RemoteItemPatch => {
  const patch: RemoteItemPatch = {};
  if (added.includes('UNREAD')) patch.isRead = false;
  if (removed.includes('UNREAD')) patch.isRead = true;
  if (added.includes('STARRED')) patch.isStarred = true;
  if (removed.includes('STARRED')) patch.isStarred = false;
  if (added.includes('DRAFT')) patch.isDraft = true;
  if (removed.includes('DRAFT')) patch.isDraft = false;

  const userAdded = added.filter((label) => !FLAG_LABELS.has(label));
  const userRemoved = removed.filter((label) => !FLAG_LABELS.has(label));
  if (userAdded.length > 0) patch.labelsAdded = userAdded;
  if (userRemoved.length > 0) patch.labelsRemoved = userRemoved;
  return patch;
};

const messageIdOf = (entry: unknown) => readString(asRecord(entry).message, 'id');

/**
 * Gmail REST variant. The cursor is the mailbox history id; item versions are the message
 * history ids, so a changed version means the message was modified since it was read.
 */
export class HistoryProvider implements ProviderAdapter {
  readonly kind = 'history' as const;

  constructor(private readonly options: HistoryProviderOptions) {}

  private get client() {
    return this.options.client;
  }

  async authenticate() {
    try {
      await this.options.tokens.getAccessToken(false);
      await this.client.request('/profile');
    } catch (error) {
      throw gmailErrorToSyncError(error);
    }
  }

  compareCursors(left: SyncCursor, right: SyncCursor) {
    return compareCursors(left, right);
  }

  async fetchChangesSince(cursor: SyncCursor | null): Promise<FetchResult> {
    if (cursor && cursor.kind !== 'history') {
      throw new SyncError('StorageCorruption', `account ${this.options.accountId} holds a ${cursor.kind} cursor`);
    }
    try {
      return cursor ? await this.fetchHistory(cursor.historyId) : await this.fetchFull();
    } catch (error) {
      throw gmailErrorToSyncError(error);
    }
  }

  private async fetchFull(): Promise<FetchResult> {
    const profile = await this.client.request('/profile');
    const historyId = readString(profile, 'historyId');
    if (!historyId) {
      throw new Error('Gmail profile has no historyId');
    }

    const { fullSyncLimit, gmailFullSyncQuery } = this.options.config;
    const ids = await this.client.listAllPages<string>(
      (pageToken) => {
        const query = new URLSearchParams();
        query.set('maxResults', String(Math.min(PAGE_SIZE, fullSyncLimit)));
        if (gmailFullSyncQuery) query.set('q', gmailFullSyncQuery);
        if (pageToken) query.set('pageToken', pageToken);
        return `/messages?${query.toString()}`;
      },
      (payload) => readArray(payload, 'messages')
        .map((message) => readString(message, 'id'))
        .filter((id): id is string => id !== null),
      fullSyncLimit,
    );

    const items = await mapWithConcurrency(
      Array.from(new Set(ids)),
      this.options.config.metadataFetchConcurrency,
      (id) => this.fetchMetadataOrNull(id),
    );
    const changes = items
      .filter((item): item is RemoteItem => item !== null)
      .map((item): RemoteChange => ({ type: 'new', item }));
    return { changes, cursor: { kind: 'history', historyId }, truncated: ids.length >= fullSyncLimit };
  }

  private async fetchHistory(startHistoryId: string): Promise<FetchResult> {
    const changes: RemoteChange[] = [];
    const fetchedIds = new Set<string>();
    let latestHistoryId = startHistoryId;
    let pageToken: string | undefined;

    do {
      const query = new URLSearchParams();
      query.set('startHistoryId', startHistoryId);
      query.set('maxResults', String(PAGE_SIZE));
      if (pageToken) query.set('pageToken', pageToken);

      let payload: unknown;
      try {
        payload = await this.client.request(`/history?${query.toString()}`);
      } catch (error) {
        if (isHistoryInvalidation(error)) {
          throw new SyncError('CursorInvalidated', `history ${startHistoryId} is no longer available`, { cause: error });
        }
        throw error;
      }
      latestHistoryId = readString(payload, 'historyId') ?? latestHistoryId;

      for (const record of readArray(payload, 'history')) {
        const recordId = readString(record, 'id') ?? latestHistoryId;
        for (const added of readArray(record, 'messagesAdded')) {
          const id = messageIdOf(added);
          if (!id || fetchedIds.has(id)) continue;
          fetchedIds.add(id);
          const item = await this.fetchMetadataOrNull(id);
          if (item) {
            changes.push({ type: 'new', item });
          }
        }
        for (const entry of readArray(record, 'labelsAdded')) {
          const id = messageIdOf(entry);
          if (!id || fetchedIds.has(id)) continue;
          changes.push({
            type: 'updated',
            remoteId: id,
            patch: labelDeltaToPatch(readStringArray(entry, 'labelIds'), []),
            versionToken: recordId,
          });
        }
        for (const entry of readArray(record, 'labelsRemoved')) {
          const id = messageIdOf(entry);
          if (!id || fetchedIds.has(id)) continue;
          changes.push({
            type: 'updated',
            remoteId: id,
            patch: labelDeltaToPatch([], readStringArray(entry, 'labelIds')),
            versionToken: recordId,
          });
        }
        for (const entry of readArray(record, 'messagesDeleted')) {
          const id = messageIdOf(entry);
          if (id) {
            changes.push({ type: 'deleted', remoteId: id });
          }
        }
      }
      pageToken = readString(payload, 'nextPageToken') || undefined;
    } while (pageToken);

    return { changes, cursor: { kind: 'history', historyId: latestHistoryId } };
  }

  private async fetchMetadata(remoteId: string) {
    const query = new URLSearchParams();
    query.set('format', 'metadata');
    for (const header of METADATA_HEADERS) {
      query.append('metadataHeaders', header);
    }
    const payload = await this.client.request(`/messages/${encodeURIComponent(remoteId)}?${query.toString()}`);
    return gmailMessageToRemoteItem(payload);
  }

  private async fetchMetadataOrNull(remoteId: string) {
    try {
      return await this.fetchMetadata(remoteId);
    } catch (error) {
      if (error instanceof GmailApiError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  async fetchFullItem(remoteId: string): Promise<RemoteItem> {
    try {
      const item = await this.fetchMetadata(remoteId);
      if (!item.isDraft) {
        return item;
      }
      const raw = await this.client.request(`/messages/${encodeURIComponent(remoteId)}?format=raw`);
      const encoded = readString(raw, 'raw');
      return encoded ? { ...item, draft: await parseDraftSource(Buffer.from(encoded, 'base64url')) } : item;
    } catch (error) {
      throw gmailErrorToSyncError(error);
    }
  }

  async pushChange(change: PendingChange): Promise<PushOutcome> {
    try {
      return await this.push(change);
    } catch (error) {
      const syncError = isSyncError(error) ? error : gmailErrorToSyncError(error);
      switch (syncError.kind) {
        case 'AuthExpired':
          throw syncError;
        case 'NetworkError':
        case 'RateLimited':
          return { type: 'retryable', error: syncError.message, retryAfterMs: syncError.retryAfterMs ?? undefined };
        case 'NotFound':
          return { type: 'conflict', remote: { deleted: true } };
        default:
          return { type: 'rejected', reason: syncError.message };
      }
    }
  }

  private async push(change: PendingChange): Promise<PushOutcome> {
    const { payload } = change;
    switch (payload.op) {
      case 'setFlags': {
        const add: string[] = [];
        const remove: string[] = [];
        if (payload.isRead !== undefined) (payload.isRead ? remove : add).push('UNREAD');
        if (payload.isStarred !== undefined) (payload.isStarred ? add : remove).push('STARRED');
        return this.modifyLabels(change, add, remove);
      }
      case 'modifyLabels':
        return this.modifyLabels(change, payload.add, payload.remove);
      case 'saveDraft':
        return this.saveDraft(change, payload.draft);
      case 'send':
        return this.send(change, payload.draft);
      case 'delete': {
        const target = this.requireTarget(change);
        await this.client.request(`/messages/${encodeURIComponent(target)}/trash`, { method: 'POST' });
        return { type: 'accepted', remoteId: target };
      }
    }
  }

  private requireTarget(change: PendingChange) {
    if (!change.target) {
      throw new SyncError('PushRejected', `${change.kind} change ${change.id} has no remote target`);
    }
    return change.target;
  }

  /** `null` when the target still matches the version the change was based on. */
  private async detectConflict(change: PendingChange, target: string): Promise<PushOutcome | null> {
    const current = await this.fetchMetadataOrNull(target);
    if (!current) {
      return { type: 'conflict', remote: { deleted: true } };
    }
    const base = change.payload.baseVersion;
    if (base !== null && current.versionToken !== base) {
      return { type: 'conflict', remote: { deleted: false, item: current } };
    }
    return null;
  }

  private async modifyLabels(change: PendingChange, add: string[], remove: string[]): Promise<PushOutcome> {
    const target = this.requireTarget(change);
    const conflict = await this.detectConflict(change, target);
    if (conflict) {
      return conflict;
    }
    await this.client.request(`/messages/${encodeURIComponent(target)}/modify`, {
      method: 'POST',
      body: JSON.stringify({ addLabelIds: add, removeLabelIds: remove }),
    });
    const after = await this.fetchMetadataOrNull(target);
    return { type: 'accepted', remoteId: target, versionToken: after?.versionToken };
  }

  private async findByMessageId(messageId: string) {
    const query = new URLSearchParams();
    query.set('q', `rfc822msgid:${messageId}`);
    query.set('includeSpamTrash', 'true');
    query.set('maxResults', '1');
    const payload = await this.client.request(`/messages?${query.toString()}`);
    const id = readString(readArray(payload, 'messages')[0], 'id');
    return id ? this.fetchMetadataOrNull(id) : null;
  }

  private async saveDraft(change: PendingChange, draft: DraftContent): Promise<PushOutcome> {
    const messageId = draftMessageId(change.id, this.options.config.messageIdDomain);
    const existing = await this.findByMessageId(messageId);
    if (!existing && change.target) {
      const conflict = await this.detectConflict(change, change.target);
      if (conflict) {
        return conflict;
      }
    }

    let created = existing;
    if (!created) {
      const raw = await composeDraft(draft, { from: this.options.fromAddress, messageId });
      const response = await this.client.request('/drafts', {
        method: 'POST',
        body: JSON.stringify({ message: { raw: raw.toString('base64url') } }),
      });
      const createdId = messageIdOf(response);
      if (!createdId) {
        return { type: 'rejected', reason: 'draft create returned no message id' };
      }
      created = await this.fetchMetadataOrNull(createdId);
      if (!created) {
        return { type: 'accepted', remoteId: createdId };
      }
    }

    if (change.target && change.target !== created.remoteId) {
      await this.deleteIfPresent(change.target);
    }
    return { type: 'accepted', remoteId: created.remoteId, versionToken: created.versionToken };
  }

  // The message goes out under the change's own Message-ID; a retry that finds it sent stops there.
  private async send(change: PendingChange, draft: DraftContent): Promise<PushOutcome> {
    const messageId = draftMessageId(change.id, this.options.config.messageIdDomain);
    const existing = await this.findByMessageId(messageId);
    let sentId = existing && !existing.isDraft ? existing.remoteId : null;

    if (!sentId) {
      if (change.target) {
        const conflict = await this.detectConflict(change, change.target);
        if (conflict) {
          return conflict;
        }
      }
      const raw = await composeDraft(draft, { from: this.options.fromAddress, messageId });
      const response = await this.client.request('/messages/send', {
        method: 'POST',
        body: JSON.stringify({ raw: raw.toString('base64url') }),
      });
      sentId = readString(response, 'id');
      if (!sentId) {
        return { type: 'rejected', reason: 'send returned no message id' };
      }
      console.info(`[gmail] sent ${messageId} for ${this.options.accountId}`);
    }

    if (change.target && change.target !== sentId) {
      await this.deleteIfPresent(change.target);
    }
    return { type: 'accepted', remoteId: sentId };
  }

  private async deleteIfPresent(remoteId: string) {
    try {
      await this.client.request(`/messages/${encodeURIComponent(remoteId)}`, { method: 'DELETE' });
    } catch (error) {
      if (!(error instanceof GmailApiError && error.status === 404)) {
        throw error;
      }
    }
  }
}
