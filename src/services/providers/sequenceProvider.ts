import type { SyncConfig } from '../../config/env.js';
import type {
  DraftContent,
  PendingChange,
  PushOutcome,
  RemoteChange,
  RemoteItem,
  SequenceCursor,
  SyncCursor,
} from '../../shared/types.js';
import { compactUidSet, compareCursors, expandUidSet } from '../cursor.js';
import { composeDraft, draftMessageId, parseDraftSource } from '../draftComposer.js';
import type { MailSender } from '../smtp.js';
import { SyncError, isRecoverableNetworkError, isSyncError, toSyncError } from '../syncErrors.js';
import type { ImapMailboxInfo, ImapMessageSummary, ImapSession, ImapSessionFactory } from './imapSession.js';
import type { FetchResult, ProviderAdapter } from './types.js';

const SEEN = '\\Seen';
const FLAGGED = '\\Flagged';
const DRAFT = '\\Draft';

export type SequenceProviderConfig = Pick<
  SyncConfig,
  | 'fullSyncLimit'
  | 'flagSyncWindow'
  | 'archiveMailbox'
  | 'trashMailbox'
  | 'draftsMailbox'
  | 'sentMailbox'
  | 'messageIdDomain'
>;

export interface SequenceProviderOptions {
  accountId: string;
  fromAddress: string;
  mailbox: string;
  openSession: ImapSessionFactory;
  /** Outgoing transport for `send` changes; without one they are rejected. */
  sendMail?: MailSender;
  config: SequenceProviderConfig;
}

const readProp = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;

export const imapErrorToSyncError = (error: unknown): SyncError => {
  if (isSyncError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (
    readProp(error, 'authenticationFailed') === true
    || /authenticationfailed|invalid credentials|authentication failed/i.test(message)
  ) {
    return new SyncError('AuthExpired', message, { cause: error });
  }
  if (isRecoverableNetworkError(error)) {
    return new SyncError('NetworkError', message, { cause: error });
  }
  // Tagged NO/BAD responses: the server understood the command and refused it.
  const status = readProp(error, 'responseStatus');
  if (status === 'NO' || status === 'BAD') {
    return new SyncError('PushRejected', message, { cause: error });
  }
  return toSyncError(error);
};

export const toRemoteId = (mailbox: string, uid: number) => `${mailbox}:${uid}`;

// No spread: a large mailbox's UID list exceeds the call-argument limit.
export const highestUid = (uids: Iterable<number>, floor = 0) => {
  let highest = floor;
  for (const uid of uids) {
    if (uid > highest) {
      highest = uid;
    }
  }
  return highest;
};

export const parseRemoteId = (remoteId: string) => {
  const separator = remoteId.lastIndexOf(':');
  const uid = Number(remoteId.slice(separator + 1));
  if (separator <= 0 || !Number.isInteger(uid) || uid <= 0) {
    throw new SyncError('PushRejected', `malformed remote id ${remoteId}`);
  }
  return { mailbox: remoteId.slice(0, separator), uid };
};

/** Version token for servers without CONDSTORE: changes whenever the flag set does. */
export const flagSignature = (flags: string[]) => `flags:${[...flags].sort().join(',')}`;

export const summaryToRemoteItem = (mailbox: string, summary: ImapMessageSummary): RemoteItem => {
  const keywords = summary.flags.filter((flag) => !flag.startsWith('\\'));
  return {
    remoteId: toRemoteId(mailbox, summary.uid),
    versionToken: summary.modseq ?? flagSignature(summary.flags),
    threadId: summary.threadId,
    messageId: summary.messageId,
    subject: summary.subject,
    from: summary.from,
    to: summary.to,
    snippet: null,
    receivedAt: summary.internalDate,
    isRead: summary.flags.includes(SEEN),
    isStarred: summary.flags.includes(FLAGGED),
    isDraft: summary.flags.includes(DRAFT),
    labels: Array.from(new Set([mailbox, ...keywords])).sort(),
    draft: null,
  };
};

/**
 * IMAP variant for one mailbox. The cursor pins the UIDVALIDITY epoch; a changed epoch
 * invalidates it. Expunges are found by diffing the known UID set against the server's.
 */
export class SequenceProvider implements ProviderAdapter {
  readonly kind = 'sequence' as const;

  constructor(private readonly options: SequenceProviderOptions) {}

  private async withSession<T>(operation: (session: ImapSession) => Promise<T>): Promise<T> {
    let session: ImapSession | null = null;
    try {
      session = await this.options.openSession();
      await session.connect();
      return await operation(session);
    } catch (error) {
      throw imapErrorToSyncError(error);
    } finally {
      if (session) {
        await session.logout().catch((error: unknown) => {
          console.warn(`[imap] logout failed for ${this.options.accountId}`, error);
        });
      }
    }
  }

  async authenticate() {
    await this.withSession(async () => undefined);
  }

  compareCursors(left: SyncCursor, right: SyncCursor) {
    return compareCursors(left, right);
  }

  async fetchChangesSince(cursor: SyncCursor | null): Promise<FetchResult> {
    if (cursor && cursor.kind !== 'sequence') {
      throw new SyncError('StorageCorruption', `account ${this.options.accountId} holds a ${cursor.kind} cursor`);
    }
    return this.withSession(async (session) => {
      const mailbox = await session.openMailbox(this.options.mailbox);
      if (!cursor) {
        return this.fetchFull(session, mailbox);
      }
      if (cursor.mailbox !== mailbox.path || cursor.uidValidity !== mailbox.uidValidity) {
        throw new SyncError(
          'CursorInvalidated',
          `UIDVALIDITY of ${mailbox.path} changed from ${cursor.uidValidity} to ${mailbox.uidValidity}`,
        );
      }
      return this.fetchIncremental(session, mailbox, cursor);
    });
  }

  private async fetchFull(session: ImapSession, mailbox: ImapMailboxInfo): Promise<FetchResult> {
    const uids = await session.listUids();
    const selected = uids.slice(-this.options.config.fullSyncLimit);
    const summaries = await session.fetchSummaries(selected);
    return {
      changes: summaries.map((summary): RemoteChange => ({ type: 'new', item: summaryToRemoteItem(mailbox.path, summary) })),
      cursor: {
        kind: 'sequence',
        mailbox: mailbox.path,
        uidValidity: mailbox.uidValidity,
        lastSeenUid: highestUid(uids),
        modseq: mailbox.highestModseq,
        knownUids: compactUidSet(selected),
      },
      truncated: selected.length < uids.length,
    };
  }

  private async fetchIncremental(
    session: ImapSession,
    mailbox: ImapMailboxInfo,
    cursor: SequenceCursor,
  ): Promise<FetchResult> {
    const known = new Set(expandUidSet(cursor.knownUids));
    const current = await session.listUids();
    const currentSet = new Set(current);
    const newUids = current.filter((uid) => uid > cursor.lastSeenUid);
    const changes: RemoteChange[] = [];

    for (const summary of await session.fetchSummaries(newUids)) {
      changes.push({ type: 'new', item: summaryToRemoteItem(mailbox.path, summary) });
    }

    const stillKnown = Array.from(known).filter((uid) => currentSet.has(uid)).sort((left, right) => left - right);
    for (const summary of await this.fetchFlagChanges(session, mailbox, cursor, stillKnown)) {
      if (!known.has(summary.uid) || summary.uid > cursor.lastSeenUid) {
        continue;
      }
      const item = summaryToRemoteItem(mailbox.path, summary);
      changes.push({
        type: 'updated',
        remoteId: item.remoteId,
        patch: { isRead: item.isRead, isStarred: item.isStarred, isDraft: item.isDraft, labels: item.labels },
        versionToken: item.versionToken,
      });
    }

    for (const uid of known) {
      if (!currentSet.has(uid)) {
        changes.push({ type: 'deleted', remoteId: toRemoteId(mailbox.path, uid) });
      }
    }

    const nextKnown = [...stillKnown, ...newUids];
    return {
      changes,
      cursor: {
        kind: 'sequence',
        mailbox: mailbox.path,
        uidValidity: mailbox.uidValidity,
        lastSeenUid: highestUid(newUids, cursor.lastSeenUid),
        modseq: mailbox.highestModseq ?? cursor.modseq,
        knownUids: compactUidSet(nextKnown),
      },
    };
  }

  // CHANGEDSINCE when both sides have a modseq; otherwise re-read the newest window of known UIDs.
  private async fetchFlagChanges(
    session: ImapSession,
    mailbox: ImapMailboxInfo,
    cursor: SequenceCursor,
    stillKnown: number[],
  ) {
    if (cursor.modseq && mailbox.highestModseq) {
      if (cursor.modseq === mailbox.highestModseq) {
        return [];
      }
      return session.fetchSummaries('1:*', { changedSince: cursor.modseq });
    }
    return session.fetchSummaries(stillKnown.slice(-this.options.config.flagSyncWindow));
  }

  async fetchFullItem(remoteId: string): Promise<RemoteItem> {
    const { mailbox, uid } = parseRemoteId(remoteId);
    return this.withSession(async (session) => {
      await session.openMailbox(mailbox);
      const item = await this.readItem(session, mailbox, uid);
      if (!item) {
        throw new SyncError('NotFound', `${remoteId} no longer exists`);
      }
      if (!item.isDraft) {
        return item;
      }
      const source = await session.fetchSource(uid);
      return source ? { ...item, draft: await parseDraftSource(source) } : item;
    });
  }

  private async readItem(session: ImapSession, mailbox: string, uid: number) {
    const [summary] = await session.fetchSummaries([uid]);
    return summary ? summaryToRemoteItem(mailbox, summary) : null;
  }

  async pushChange(change: PendingChange): Promise<PushOutcome> {
    try {
      return await this.withSession((session) => this.push(session, change));
    } catch (error) {
      const syncError = imapErrorToSyncError(error);
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

  private async push(session: ImapSession, change: PendingChange): Promise<PushOutcome> {
    const { payload } = change;
    if (payload.op === 'saveDraft') {
      return this.pushDraft(session, change, payload.draft);
    }
    if (payload.op === 'send') {
      return this.pushSend(session, change, payload.draft);
    }
    if (!change.target) {
      return { type: 'rejected', reason: `${change.kind} change ${change.id} has no remote target` };
    }

    const { mailbox, uid } = parseRemoteId(change.target);
    await session.openMailbox(mailbox);
    const current = await this.readItem(session, mailbox, uid);
    if (!current) {
      return { type: 'conflict', remote: { deleted: true } };
    }

    switch (payload.op) {
      case 'delete':
        return this.moveOrDelete(session, mailbox, uid, this.options.config.trashMailbox);
      case 'setFlags': {
        if (payload.baseVersion !== null && current.versionToken !== payload.baseVersion) {
          return { type: 'conflict', remote: { deleted: false, item: current } };
        }
        const add: string[] = [];
        const remove: string[] = [];
        if (payload.isRead !== undefined) (payload.isRead ? add : remove).push(SEEN);
        if (payload.isStarred !== undefined) (payload.isStarred ? add : remove).push(FLAGGED);
        if (add.length > 0) await session.addFlags(uid, add);
        if (remove.length > 0) await session.removeFlags(uid, remove);
        return this.acceptedAfterWrite(session, mailbox, uid);
      }
      case 'modifyLabels': {
        if (payload.baseVersion !== null && current.versionToken !== payload.baseVersion) {
          return { type: 'conflict', remote: { deleted: false, item: current } };
        }
        if (payload.add.includes(mailbox)) {
          return { type: 'rejected', reason: `cannot add mailbox label ${mailbox}` };
        }
        const addKeywords = payload.add.filter((label) => label !== mailbox);
        const removeKeywords = payload.remove.filter((label) => label !== mailbox);
        if (addKeywords.length > 0) await session.addFlags(uid, addKeywords);
        if (removeKeywords.length > 0) await session.removeFlags(uid, removeKeywords);
        if (payload.remove.includes(mailbox)) {
          return this.moveOrDelete(session, mailbox, uid, this.options.config.archiveMailbox);
        }
        return this.acceptedAfterWrite(session, mailbox, uid);
      }
    }
  }

  private async acceptedAfterWrite(session: ImapSession, mailbox: string, uid: number): Promise<PushOutcome> {
    const after = await this.readItem(session, mailbox, uid);
    return { type: 'accepted', remoteId: toRemoteId(mailbox, uid), versionToken: after?.versionToken };
  }

  private async moveOrDelete(session: ImapSession, mailbox: string, uid: number, destination: string): Promise<PushOutcome> {
    if (mailbox === destination) {
      await session.deleteMessage(uid);
      return { type: 'accepted', remoteId: toRemoteId(mailbox, uid) };
    }
    const movedUid = await session.moveMessage(uid, destination);
    return {
      type: 'accepted',
      remoteId: movedUid === null ? toRemoteId(mailbox, uid) : toRemoteId(destination, movedUid),
    };
  }

  private async pushDraft(session: ImapSession, change: PendingChange, draft: DraftContent): Promise<PushOutcome> {
    const drafts = this.options.config.draftsMailbox;
    const messageId = draftMessageId(change.id, this.options.config.messageIdDomain);
    const previous = change.target ? parseRemoteId(change.target) : null;

    if (previous) {
      await session.openMailbox(previous.mailbox);
      const current = await this.readItem(session, previous.mailbox, previous.uid);
      if (!current) {
        return { type: 'conflict', remote: { deleted: true } };
      }
      if (change.payload.baseVersion !== null && current.versionToken !== change.payload.baseVersion) {
        return { type: 'conflict', remote: { deleted: false, item: current } };
      }
    }

    await session.openMailbox(drafts);
    let uid: number | undefined = (await session.searchHeader('message-id', messageId))[0];
    if (uid === undefined) {
      const raw = await composeDraft(draft, { from: this.options.fromAddress, messageId });
      const appended = await session.appendMessage(drafts, raw, [DRAFT, SEEN]);
      uid = appended ?? (await session.searchHeader('message-id', messageId))[0];
    }
    if (uid === undefined) {
      return { type: 'retryable', error: `appended draft ${messageId} not found in ${drafts}` };
    }

    if (previous && !(previous.mailbox === drafts && previous.uid === uid)) {
      await session.openMailbox(previous.mailbox);
      await session.deleteMessage(previous.uid);
      await session.openMailbox(drafts);
    }
    const created = await this.readItem(session, drafts, uid);
    return { type: 'accepted', remoteId: toRemoteId(drafts, uid), versionToken: created?.versionToken };
  }

  // The Sent copy carries the change's Message-ID; finding it means an earlier attempt already sent.
  private async pushSend(session: ImapSession, change: PendingChange, draft: DraftContent): Promise<PushOutcome> {
    const sent = this.options.config.sentMailbox;
    const messageId = draftMessageId(change.id, this.options.config.messageIdDomain);
    const previous = change.target ? parseRemoteId(change.target) : null;

    await session.openMailbox(sent);
    let uid: number | undefined = (await session.searchHeader('message-id', messageId))[0];
    if (uid === undefined) {
      if (previous) {
        await session.openMailbox(previous.mailbox);
        const current = await this.readItem(session, previous.mailbox, previous.uid);
        if (!current) {
          return { type: 'conflict', remote: { deleted: true } };
        }
        if (change.payload.baseVersion !== null && current.versionToken !== change.payload.baseVersion) {
          return { type: 'conflict', remote: { deleted: false, item: current } };
        }
      }
      if (!this.options.sendMail) {
        return { type: 'rejected', reason: `account ${this.options.accountId} has no outgoing mail server` };
      }
      const raw = await composeDraft(draft, { from: this.options.fromAddress, messageId });
      await this.options.sendMail(raw, { from: this.options.fromAddress, to: [...draft.to, ...draft.cc] });
      console.info(`[imap] sent ${messageId} for ${this.options.accountId}`);
      uid = (await session.appendMessage(sent, raw, [SEEN])) ?? undefined;
    }

    if (previous) {
      await session.openMailbox(previous.mailbox);
      await session.deleteMessage(previous.uid);
    }
    return { type: 'accepted', remoteId: uid === undefined ? messageId : toRemoteId(sent, uid) };
  }
}
