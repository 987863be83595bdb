import { ImapFlow } from 'imapflow';
import type { FetchMessageObject } from 'imapflow';

export interface ImapMailboxInfo {
  path: string;
  uidValidity: string;
  uidNext: number;
  /** Present only when the server supports CONDSTORE. */
  highestModseq: string | null;
}

export interface ImapMessageSummary {
  uid: number;
  flags: string[];
  modseq: string | null;
  messageId: string | null;
  threadId: string | null;
  subject: string | null;
  from: string | null;
  to: string | null;
  internalDate: string | null;
}

/** The slice of an IMAP connection the sequence provider uses. All UIDs are in the open mailbox. */
export interface ImapSession {
  connect(): Promise<void>;
  logout(): Promise<void>;
  openMailbox(path: string): Promise<ImapMailboxInfo>;
  listUids(): Promise<number[]>;
  fetchSummaries(uids: number[] | '1:*', options?: { changedSince?: string }): Promise<ImapMessageSummary[]>;
  fetchSource(uid: number): Promise<Buffer | null>;
  addFlags(uid: number, flags: string[]): Promise<void>;
  removeFlags(uid: number, flags: string[]): Promise<void>;
  /** Returns the UID in the destination when the server reports it. */
  moveMessage(uid: number, destination: string): Promise<number | null>;
  appendMessage(path: string, raw: Buffer, flags: string[]): Promise<number | null>;
  deleteMessage(uid: number): Promise<void>;
  searchHeader(name: string, value: string): Promise<number[]>;
}

export interface ImapConnectionSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass?: string;
  accessToken?: string;
}

export type ImapSessionFactory = () => Promise<ImapSession>;

const formatAddresses = (addresses: Array<{ name?: string; address?: string }> | undefined): string | null => {
  const formatted = (addresses ?? [])
    .map((addr) => [addr.name, addr.address ? `<${addr.address}>` : undefined].filter(Boolean).join(' '))
    .filter(Boolean)
    .join(', ');
  return formatted || null;
};

const toSummary = (message: FetchMessageObject): ImapMessageSummary => ({
  uid: message.uid,
  flags: Array.from(message.flags ?? []),
  modseq: message.modseq === undefined ? null : String(message.modseq),
  messageId: message.envelope?.messageId ?? null,
  threadId: message.threadId ?? null,
  subject: message.envelope?.subject ?? null,
  from: formatAddresses(message.envelope?.from),
  to: formatAddresses(message.envelope?.to),
  internalDate: message.internalDate ? new Date(message.internalDate).toISOString() : null,
});

const SUMMARY_QUERY = { uid: true, envelope: true, internalDate: true, flags: true } as const;

export const createImapFlowSession = (settings: ImapConnectionSettings): ImapSession => {
  const client = new ImapFlow({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    auth: settings.accessToken
      ? { user: settings.user, accessToken: settings.accessToken }
      : { user: settings.user, pass: settings.pass },
    logger: false,
    disableAutoIdle: true,
  });

  return {
    connect: () => client.connect(),
    logout: () => client.logout(),
    async openMailbox(path) {
      const mailbox = await client.mailboxOpen(path);
      return {
        path: mailbox.path,
        uidValidity: String(mailbox.uidValidity),
        uidNext: Number(mailbox.uidNext),
        highestModseq: mailbox.highestModseq ? String(mailbox.highestModseq) : null,
      };
    },
    async listUids() {
      const uids = await client.search({ all: true }, { uid: true });
      return Array.isArray(uids) ? [...uids].sort((left, right) => left - right) : [];
    },
    async fetchSummaries(uids, options = {}) {
      if (Array.isArray(uids) && uids.length === 0) {
        return [];
      }
      const range = Array.isArray(uids) ? uids.join(',') : uids;
      const summaries: ImapMessageSummary[] = [];
      const fetchOptions = options.changedSince
        ? { uid: true, changedSince: BigInt(options.changedSince) }
        : { uid: true };
      for await (const message of client.fetch(range, SUMMARY_QUERY, fetchOptions)) {
        summaries.push(toSummary(message));
      }
      return summaries;
    },
    async fetchSource(uid) {
      const message = await client.fetchOne(String(uid), { source: true }, { uid: true });
      return message && message.source ? message.source : null;
    },
    async addFlags(uid, flags) {
      await client.messageFlagsAdd(String(uid), flags, { uid: true });
    },
    async removeFlags(uid, flags) {
      await client.messageFlagsRemove(String(uid), flags, { uid: true });
    },
    async moveMessage(uid, destination) {
      const result = await client.messageMove(String(uid), destination, { uid: true });
      return (result && result.uidMap?.get(uid)) ?? null;
    },
    async appendMessage(path, raw, flags) {
      const result = await client.append(path, raw, flags);
      return (result && result.uid) ?? null;
    },
    async deleteMessage(uid) {
      await client.messageDelete(String(uid), { uid: true });
    },
    async searchHeader(name, value) {
      const uids = await client.search({ header: { [name]: value } }, { uid: true });
      return Array.isArray(uids) ? uids : [];
    },
  };
};
