import type {
  AccountRecord,
  ItemFields,
  PendingChange,
  PendingChangePayload,
  RemoteItem,
  ReplicaEntry,
} from '../../shared/types.js';
import { emptyItemFields } from '../../shared/types.js';

export const FIXED_NOW = Date.parse('2026-03-01T10:00:00.000Z');

export const historyAccount = (overrides: Partial<AccountRecord> = {}): AccountRecord => ({
  id: 'acct-history',
  kind: 'history',
  emailAddress: 'reader@example.test',
  credential: {
    authType: 'oauth2',
    refreshToken: 'test-refresh-token',
    accessToken: 'test-access-token',
    tokenExpiresAt: '2026-03-01T11:00:00.000Z',
  },
  serverConfig: {},
  syncEnabled: true,
  ...overrides,
});

export const sequenceAccount = (overrides: Partial<AccountRecord> = {}): AccountRecord => ({
  id: 'acct-sequence',
  kind: 'sequence',
  emailAddress: 'reader@example.test',
  credential: { authType: 'password', username: 'reader', password: 'test-secret' },
  serverConfig: { host: 'imap.example.test', port: 993, tls: true, mailbox: 'INBOX' },
  syncEnabled: true,
  ...overrides,
});

export const fields = (overrides: Partial<ItemFields> = {}): ItemFields => ({
  ...emptyItemFields(),
  ...overrides,
});

export const remoteItem = (remoteId: string, overrides: Partial<RemoteItem> = {}): RemoteItem => ({
  ...emptyItemFields(),
  remoteId,
  versionToken: 'v1',
  messageId: `<${remoteId}@example.test>`,
  subject: `Subject ${remoteId}`,
  labels: ['INBOX'],
  ...overrides,
});

export const replicaEntry = (localId: string, overrides: Partial<ReplicaEntry> = {}): ReplicaEntry => ({
  localId,
  accountId: 'acct-history',
  remoteId: null,
  versionToken: null,
  fields: emptyItemFields(),
  updatedAt: '2026-03-01T09:00:00.000Z',
  ...overrides,
});

export const pendingChange = (
  id: string,
  payload: PendingChangePayload,
  overrides: Partial<PendingChange> = {},
): PendingChange => ({
  id,
  accountId: 'acct-history',
  seq: 1,
  localId: 'local-1',
  target: 'remote-1',
  kind: payload.op === 'delete' ? 'delete' : 'update',
  payload,
  status: 'queued',
  attemptCount: 0,
  lastError: null,
  createdAt: '2026-03-01T09:00:00.000Z',
  updatedAt: '2026-03-01T09:00:00.000Z',
  ...overrides,
});
