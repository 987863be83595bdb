import assert from 'node:assert/strict';
import { isSyncError } from '../../syncErrors.js';
import { pendingChange, sequenceAccount } from '../../__tests__/fixtures.js';
import type { ImapMailboxInfo, ImapMessageSummary, ImapSession } from '../imapSession.js';
import {
  SequenceProvider,
  highestUid,
  imapErrorToSyncError,
  parseRemoteId,
  summaryToRemoteItem,
} from '../sequenceProvider.js';
import type { SequenceProviderConfig } from '../sequenceProvider.js';
import type { MailSender, OutgoingEnvelope } from '../../smtp.js';

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

interface FakeMailbox {
  uidValidity: string;
  highestModseq: string | null;
  nextUid: number;
  messages: Map<number, ImapMessageSummary>;
}

const summary = (uid: number, overrides: Partial<ImapMessageSummary> = {}): ImapMessageSummary => ({
  uid,
  flags: [],
  modseq: null,
  messageId: `<uid-${uid}@example.test>`,
  threadId: null,
  subject: `Subject ${uid}`,
  from: 'sender@example.test',
  to: 'reader@example.test',
  internalDate: '2026-03-01T09:00:00.000Z',
  ...overrides,
});

/** In-memory IMAP server: one selected mailbox at a time, UIDs assigned per mailbox. */
class FakeImapSession implements ImapSession {
  readonly mailboxes = new Map<string, FakeMailbox>();
  readonly log: string[] = [];
  connectError: Error | null = null;
  /** Stands in for SEARCH ALL on mailboxes too large to populate message by message. */
  uidListOverride: number[] | null = null;
  private selected: FakeMailbox | null = null;
  private selectedPath = '';

  addMailbox(path: string, options: { uidValidity?: string; highestModseq?: string | null } = {}, messages: ImapMessageSummary[] = []) {
    const byUid = new Map(messages.map((message) => [message.uid, message]));
    this.mailboxes.set(path, {
      uidValidity: options.uidValidity ?? '77',
      highestModseq: options.highestModseq ?? null,
      nextUid: Math.max(0, ...byUid.keys()) + 1,
      messages: byUid,
    });
  }

  private requireSelected() {
    if (!this.selected) {
      throw new Error('no mailbox selected');
    }
    return this.selected;
  }

  private bumpModseq(mailbox: FakeMailbox, message: ImapMessageSummary) {
    if (mailbox.highestModseq === null) {
      return;
    }
    mailbox.highestModseq = String(BigInt(mailbox.highestModseq) + 1n);
    message.modseq = mailbox.highestModseq;
  }

  async connect() {
    this.log.push('connect');
    if (this.connectError) {
      throw this.connectError;
    }
  }

  async logout() {
    this.log.push('logout');
  }

  async openMailbox(path: string): Promise<ImapMailboxInfo> {
    const mailbox = this.mailboxes.get(path);
    if (!mailbox) {
      throw Object.assign(new Error(`Mailbox ${path} does not exist`), { responseStatus: 'NO' });
    }
    this.selected = mailbox;
    this.selectedPath = path;
    return { path, uidValidity: mailbox.uidValidity, uidNext: mailbox.nextUid, highestModseq: mailbox.highestModseq };
  }

  async listUids() {
    if (this.uidListOverride) {
      return this.uidListOverride;
    }
    return Array.from(this.requireSelected().messages.keys()).sort((left, right) => left - right);
  }

  async fetchSummaries(uids: number[] | '1:*', options: { changedSince?: string } = {}) {
    const mailbox = this.requireSelected();
    const wanted = uids === '1:*' ? await this.listUids() : uids;
    const changedSince = options.changedSince;
    return wanted
      .map((uid) => mailbox.messages.get(uid))
      .filter((message): message is ImapMessageSummary => message !== undefined)
      .filter((message) => changedSince === undefined || (message.modseq !== null && BigInt(message.modseq) > BigInt(changedSince)))
      .map((message) => ({ ...message, flags: [...message.flags] }));
  }

  async fetchSource() {
    return null;
  }

  async addFlags(uid: number, flags: string[]) {
    const mailbox = this.requireSelected();
    const message = mailbox.messages.get(uid);
    if (message) {
      message.flags = Array.from(new Set([...message.flags, ...flags]));
      this.bumpModseq(mailbox, message);
    }
    this.log.push(`add ${uid} ${flags.join(' ')}`);
  }

  async removeFlags(uid: number, flags: string[]) {
    const mailbox = this.requireSelected();
    const message = mailbox.messages.get(uid);
    if (message) {
      message.flags = message.flags.filter((flag) => !flags.includes(flag));
      this.bumpModseq(mailbox, message);
    }
    this.log.push(`remove ${uid} ${flags.join(' ')}`);
  }

  async moveMessage(uid: number, destination: string) {
    const source = this.requireSelected();
    const target = this.mailboxes.get(destination);
    const message = source.messages.get(uid);
    if (!target || !message) {
      throw new Error(`cannot move ${uid} to ${destination}`);
    }
    source.messages.delete(uid);
    const movedUid = target.nextUid;
    target.nextUid += 1;
    target.messages.set(movedUid, { ...message, uid: movedUid });
    this.log.push(`move ${this.selectedPath}:${uid} ${destination}:${movedUid}`);
    return movedUid;
  }

  async appendMessage(path: string, raw: Buffer, flags: string[]) {
    const mailbox = this.mailboxes.get(path);
    if (!mailbox) {
      throw new Error(`Mailbox ${path} does not exist`);
    }
    const uid = mailbox.nextUid;
    mailbox.nextUid += 1;
    const messageId = /^Message-ID:\s*(<[^>]+>)/im.exec(raw.toString('utf8'))?.[1] ?? null;
    mailbox.messages.set(uid, summary(uid, { flags, messageId }));
    this.log.push(`append ${path}:${uid}`);
    return uid;
  }

  async deleteMessage(uid: number) {
    this.requireSelected().messages.delete(uid);
    this.log.push(`delete ${this.selectedPath}:${uid}`);
  }

  async searchHeader(name: string, value: string) {
    assert.equal(name, 'message-id');
    return Array.from(this.requireSelected().messages.values())
      .filter((message) => message.messageId === value)
      .map((message) => message.uid);
  }
}

const config: SequenceProviderConfig = {
  fullSyncLimit: 3,
  flagSyncWindow: 2,
  archiveMailbox: 'Archive',
  trashMailbox: 'Trash',
  draftsMailbox: 'Drafts',
  sentMailbox: 'Sent',
  messageIdDomain: 'mailsync.test',
};

const setup = (options: { sendMail?: MailSender } = {}) => {
  const session = new FakeImapSession();
  session.addMailbox('Archive');
  session.addMailbox('Trash');
  session.addMailbox('Drafts');
  session.addMailbox('Sent');
  const account = sequenceAccount();
  const provider = new SequenceProvider({
    accountId: account.id,
    fromAddress: account.emailAddress,
    mailbox: 'INBOX',
    openSession: async () => session,
    sendMail: options.sendMail,
    config,
  });
  return { session, provider };
};

await test('summaries map flags to fields and keywords to labels', () => {
  const item = summaryToRemoteItem('INBOX', summary(42, { flags: ['\\Seen', 'Work', '$label1'] }));
  assert.equal(item.remoteId, 'INBOX:42');
  assert.equal(item.versionToken, 'flags:$label1,Work,\\Seen');
  assert.deepEqual(item.labels, ['$label1', 'INBOX', 'Work']);
  assert.equal(item.isRead, true);
  assert.equal(item.isStarred, false);

  assert.equal(summaryToRemoteItem('INBOX', summary(42, { modseq: '900' })).versionToken, '900');
});

await test('remote ids split on the last colon', () => {
  assert.deepEqual(parseRemoteId('INBOX:42'), { mailbox: 'INBOX', uid: 42 });
  assert.deepEqual(parseRemoteId('Team:Ops:7'), { mailbox: 'Team:Ops', uid: 7 });
  assert.throws(() => parseRemoteId('INBOX:0'), (error: unknown) => isSyncError(error, 'PushRejected'));
  assert.throws(() => parseRemoteId('no-uid'), (error: unknown) => isSyncError(error, 'PushRejected'));
});

await test('a full fetch reads the newest window and records the known uid set', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', { highestModseq: '500' }, [summary(3), summary(4), summary(5), summary(9)]);

  const result = await provider.fetchChangesSince(null);

  assert.deepEqual(result.changes.map((change) => (change.type === 'new' ? change.item.remoteId : change.type)), [
    'INBOX:4',
    'INBOX:5',
    'INBOX:9',
  ]);
  assert.deepEqual(result.cursor, {
    kind: 'sequence',
    mailbox: 'INBOX',
    uidValidity: '77',
    lastSeenUid: 9,
    modseq: '500',
    knownUids: '4:5,9',
  });
  assert.deepEqual(session.log, ['connect', 'logout']);
});

await test('a full fetch of a very large mailbox keeps only the newest window', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', {}, [summary(299_998), summary(300_000)]);
  session.uidListOverride = Array.from({ length: 300_000 }, (_, index) => index + 1);

  const result = await provider.fetchChangesSince(null);

  assert.deepEqual(result.changes.map((change) => (change.type === 'new' ? change.item.remoteId : change.type)), [
    'INBOX:299998',
    'INBOX:300000',
  ]);
  assert.deepEqual(result.cursor, {
    kind: 'sequence',
    mailbox: 'INBOX',
    uidValidity: '77',
    lastSeenUid: 300_000,
    modseq: null,
    knownUids: '299998:300000',
  });
  assert.equal(result.truncated, true);
});

await test('highestUid scans without spreading and respects the floor', () => {
  assert.equal(highestUid(Array.from({ length: 500_000 }, (_, index) => index + 1)), 500_000);
  assert.equal(highestUid([], 12), 12);
  assert.equal(highestUid([3, 40, 7], 9), 40);
});

await test('an incremental fetch reports new, changed and expunged messages', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', { highestModseq: '510' }, [
    summary(5, { flags: ['\\Seen'], modseq: '510' }),
    summary(9, { modseq: '400' }),
    summary(12, { modseq: '505' }),
  ]);

  const result = await provider.fetchChangesSince({
    kind: 'sequence',
    mailbox: 'INBOX',
    uidValidity: '77',
    lastSeenUid: 9,
    modseq: '500',
    knownUids: '4:5,9',
  });

  assert.deepEqual(result.changes, [
    { type: 'new', item: summaryToRemoteItem('INBOX', summary(12, { modseq: '505' })) },
    {
      type: 'updated',
      remoteId: 'INBOX:5',
      patch: { isRead: true, isStarred: false, isDraft: false, labels: ['INBOX'] },
      versionToken: '510',
    },
    { type: 'deleted', remoteId: 'INBOX:4' },
  ]);
  assert.deepEqual(result.cursor, {
    kind: 'sequence',
    mailbox: 'INBOX',
    uidValidity: '77',
    lastSeenUid: 12,
    modseq: '510',
    knownUids: '5,9,12',
  });
});

await test('without CONDSTORE the newest known uids are re-read for flag changes', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', {}, [summary(1), summary(2), summary(3, { flags: ['\\Flagged'] })]);

  const result = await provider.fetchChangesSince({
    kind: 'sequence',
    mailbox: 'INBOX',
    uidValidity: '77',
    lastSeenUid: 3,
    modseq: null,
    knownUids: '1:3',
  });

  assert.deepEqual(result.changes.map((change) => (change.type === 'updated' ? change.remoteId : change.type)), [
    'INBOX:2',
    'INBOX:3',
  ]);
  assert.equal(result.cursor.kind === 'sequence' ? result.cursor.knownUids : null, '1:3');
});

await test('a changed UIDVALIDITY invalidates the cursor', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', { uidValidity: '78' }, [summary(1)]);

  await assert.rejects(
    provider.fetchChangesSince({
      kind: 'sequence',
      mailbox: 'INBOX',
      uidValidity: '77',
      lastSeenUid: 1,
      modseq: null,
      knownUids: '1',
    }),
    (error: unknown) => isSyncError(error, 'CursorInvalidated'),
  );
  assert.deepEqual(session.log, ['connect', 'logout']);
});

await test('flag changes are stored as IMAP flags when the version still matches', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', { highestModseq: '510' }, [summary(5, { flags: ['\\Seen'], modseq: '510' })]);

  const outcome = await provider.pushChange(pendingChange('c1', {
    op: 'setFlags',
    isRead: false,
    isStarred: true,
    base: { isRead: true, isStarred: false },
    baseVersion: '510',
  }, { target: 'INBOX:5' }));

  assert.deepEqual(outcome, { type: 'accepted', remoteId: 'INBOX:5', versionToken: '512' });
  assert.deepEqual(session.mailboxes.get('INBOX')?.messages.get(5)?.flags, ['\\Flagged']);
  assert.deepEqual(session.log, ['connect', 'add 5 \\Flagged', 'remove 5 \\Seen', 'logout']);
});

await test('a stale base version comes back as a conflict without writing', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', { highestModseq: '520' }, [summary(5, { modseq: '520' })]);

  const outcome = await provider.pushChange(pendingChange('c1', {
    op: 'setFlags',
    isRead: true,
    base: { isRead: false },
    baseVersion: '510',
  }, { target: 'INBOX:5' }));

  assert.deepEqual(outcome, {
    type: 'conflict',
    remote: { deleted: false, item: summaryToRemoteItem('INBOX', summary(5, { modseq: '520' })) },
  });
  assert.deepEqual(session.log, ['connect', 'logout']);
});

await test('removing the mailbox label archives the message', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', {}, [summary(5)]);

  const outcome = await provider.pushChange(pendingChange('c1', {
    op: 'modifyLabels',
    add: [],
    remove: ['INBOX'],
    base: { labels: ['INBOX'] },
    baseVersion: null,
  }, { target: 'INBOX:5' }));

  assert.deepEqual(outcome, { type: 'accepted', remoteId: 'Archive:1' });
  assert.equal(session.mailboxes.get('INBOX')?.messages.size, 0);
});

await test('keywords are added and the mailbox label cannot be', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', {}, [summary(5)]);

  const added = await provider.pushChange(pendingChange('c1', {
    op: 'modifyLabels',
    add: ['Work'],
    remove: [],
    base: { labels: ['INBOX'] },
    baseVersion: null,
  }, { target: 'INBOX:5' }));
  assert.deepEqual(added, { type: 'accepted', remoteId: 'INBOX:5', versionToken: 'flags:Work' });

  const rejected = await provider.pushChange(pendingChange('c2', {
    op: 'modifyLabels',
    add: ['INBOX'],
    remove: [],
    base: { labels: ['Work'] },
    baseVersion: null,
  }, { target: 'INBOX:5' }));
  assert.deepEqual(rejected, { type: 'rejected', reason: 'cannot add mailbox label INBOX' });
});

await test('a delete moves the message to trash and a missing target is a delete conflict', async () => {
  const { session, provider } = setup();
  session.addMailbox('INBOX', {}, [summary(5)]);

  const trashed = await provider.pushChange(pendingChange('c1', { op: 'delete', baseVersion: null }, { target: 'INBOX:5' }));
  assert.deepEqual(trashed, { type: 'accepted', remoteId: 'Trash:1' });

  const gone = await provider.pushChange(pendingChange('c2', { op: 'delete', baseVersion: null }, { target: 'INBOX:5' }));
  assert.deepEqual(gone, { type: 'conflict', remote: { deleted: true } });
});

await test('a draft is appended once and found by its message id when pushed again', async () => {
  const { session, provider } = setup();
  const change = pendingChange('c9', {
    op: 'saveDraft',
    draft: { to: ['friend@example.test'], cc: [], subject: 'Lunch', bodyText: 'Noon?' },
    baseVersion: null,
  }, { kind: 'create', target: null });

  const first = await provider.pushChange(change);
  const second = await provider.pushChange(change);

  assert.deepEqual(first, { type: 'accepted', remoteId: 'Drafts:1', versionToken: 'flags:\\Draft,\\Seen' });
  assert.deepEqual(second, first);
  assert.equal(session.log.filter((entry) => entry.startsWith('append')).length, 1);
  assert.equal(session.mailboxes.get('Drafts')?.messages.get(1)?.messageId, '<c9@mailsync.test>');
});

await test('a send goes out once, is filed in Sent and removes the draft', async () => {
  const outgoing: Array<{ raw: string; envelope: OutgoingEnvelope }> = [];
  const { session, provider } = setup({
    sendMail: async (raw, envelope) => {
      outgoing.push({ raw: raw.toString('utf8'), envelope });
    },
  });
  session.addMailbox('Drafts', {}, [summary(4, { flags: ['\\Draft', '\\Seen'] })]);
  const change = pendingChange('c5', {
    op: 'send',
    draft: { to: ['friend@example.test'], cc: ['copy@example.test'], subject: 'Lunch', bodyText: 'Noon?' },
    baseVersion: 'flags:\\Draft,\\Seen',
  }, { target: 'Drafts:4' });

  const first = await provider.pushChange(change);
  const second = await provider.pushChange(change);

  assert.deepEqual(first, { type: 'accepted', remoteId: 'Sent:1' });
  assert.deepEqual(second, first);
  assert.equal(outgoing.length, 1);
  assert.deepEqual(outgoing[0]?.envelope, {
    from: 'reader@example.test',
    to: ['friend@example.test', 'copy@example.test'],
  });
  assert.match(outgoing[0]?.raw ?? '', /Subject: Lunch/);
  assert.equal(session.mailboxes.get('Sent')?.messages.get(1)?.messageId, '<c5@mailsync.test>');
  assert.equal(session.mailboxes.get('Drafts')?.messages.has(4), false);
});

await test('a send against a draft edited elsewhere is a conflict and sends nothing', async () => {
  let calls = 0;
  const { session, provider } = setup({
    sendMail: async () => {
      calls += 1;
    },
  });
  session.addMailbox('Drafts', {}, [summary(4, { flags: ['\\Draft', '\\Seen'] })]);

  const outcome = await provider.pushChange(pendingChange('c5', {
    op: 'send',
    draft: { to: ['friend@example.test'], cc: [], subject: 'Lunch', bodyText: 'Noon?' },
    baseVersion: 'flags:\\Draft',
  }, { target: 'Drafts:4' }));

  assert.equal(outcome.type, 'conflict');
  assert.ok(outcome.type === 'conflict' && !outcome.remote.deleted && outcome.remote.item.remoteId === 'Drafts:4');
  assert.equal(calls, 0);
});

await test('a send without an outgoing server is rejected', async () => {
  const { provider } = setup();
  const outcome = await provider.pushChange(pendingChange('c5', {
    op: 'send',
    draft: { to: ['friend@example.test'], cc: [], subject: 'Lunch', bodyText: 'Noon?' },
    baseVersion: null,
  }, { target: null }));

  assert.deepEqual(outcome, { type: 'rejected', reason: 'account acct-sequence has no outgoing mail server' });
});

await test('failed logins are AuthExpired and dropped connections are retryable pushes', async () => {
  const { session, provider } = setup();
  session.connectError = Object.assign(new Error('Invalid credentials (Failure)'), { authenticationFailed: true });
  await assert.rejects(provider.authenticate(), (error: unknown) => isSyncError(error, 'AuthExpired'));
  assert.deepEqual(session.log, ['connect', 'logout']);

  session.connectError = new Error('Connection not available');
  const outcome = await provider.pushChange(pendingChange('c1', { op: 'delete', baseVersion: null }, { target: 'INBOX:5' }));
  assert.deepEqual(outcome, { type: 'retryable', error: 'Connection not available', retryAfterMs: undefined });
});

await test('tagged NO responses are rejections', () => {
  const error = Object.assign(new Error('Command failed'), { responseStatus: 'NO' });
  assert.equal(imapErrorToSyncError(error).kind, 'PushRejected');
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
