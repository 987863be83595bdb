export type ProviderKind = 'history' | 'sequence';
export type AuthType = 'oauth2' | 'password';

export interface AccountCredential {
  authType: AuthType;
  username?: string;
  password?: string;
  refreshToken?: string;
  accessToken?: string | null;
  tokenExpiresAt?: string | null;
  oauthClientId?: string;
  oauthClientSecret?: string;
}

export interface AccountServerConfig {
  host?: string;
  port?: number;
  tls?: boolean;
  mailbox?: string;
  smtpHost?: string;
  smtpPort?: number;
  smtpSecure?: boolean;
}

export interface AccountRecord {
  id: string;
  kind: ProviderKind;
  emailAddress: string;
  credential: AccountCredential;
  serverConfig: AccountServerConfig;
  syncEnabled: boolean;
}

export interface HistoryCursor {
  kind: 'history';
  historyId: string;
}

export interface SequenceCursor {
  kind: 'sequence';
  mailbox: string;
  uidValidity: string;
  lastSeenUid: number;
  modseq: string | null;
  knownUids: string;
}

export type SyncCursor = HistoryCursor | SequenceCursor;

export interface DraftContent {
  to: string[];
  cc: string[];
  subject: string;
  bodyText: string;
  inReplyTo?: string | null;
}

export interface ItemFields {
  threadId: string | null;
  messageId: string | null;
  subject: string | null;
  from: string | null;
  to: string | null;
  snippet: string | null;
  receivedAt: string | null;
  isRead: boolean;
  isStarred: boolean;
  isDraft: boolean;
  labels: string[];
  draft: DraftContent | null;
}

export interface RemoteItem extends ItemFields {
  remoteId: string;
  versionToken: string;
}

export interface RemoteItemPatch {
  isRead?: boolean;
  isStarred?: boolean;
  isDraft?: boolean;
  labels?: string[];
  labelsAdded?: string[];
  labelsRemoved?: string[];
}

export type RemoteChange =
  | { type: 'new'; item: RemoteItem }
  | { type: 'updated'; remoteId: string; patch: RemoteItemPatch; versionToken: string }
  | { type: 'deleted'; remoteId: string };

export interface ReplicaEntry {
  localId: string;
  accountId: string;
  remoteId: string | null;
  versionToken: string | null;
  fields: ItemFields;
  updatedAt: string;
}

export type PendingChangeKind = 'create' | 'update' | 'delete';
export type PendingChangeStatus = 'queued' | 'in_flight' | 'synced' | 'failed';

export type FlagField = 'isRead' | 'isStarred';
export type PolicyField = FlagField | 'labels';

export type PendingChangePayload =
  | {
    op: 'setFlags';
    isRead?: boolean;
    isStarred?: boolean;
    base: { isRead?: boolean; isStarred?: boolean };
    baseVersion: string | null;
  }
  | {
    op: 'modifyLabels';
    add: string[];
    remove: string[];
    base: { labels: string[] };
    baseVersion: string | null;
  }
  | { op: 'saveDraft'; draft: DraftContent; baseVersion: string | null }
  | { op: 'send'; draft: DraftContent; baseVersion: string | null }
  | { op: 'delete'; baseVersion: string | null };

export interface PendingChange {
  id: string;
  accountId: string;
  seq: number;
  localId: string;
  target: string | null;
  kind: PendingChangeKind;
  payload: PendingChangePayload;
  status: PendingChangeStatus;
  attemptCount: number;
  lastError: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewPendingChange {
  id?: string;
  accountId: string;
  localId: string;
  target: string | null;
  kind: PendingChangeKind;
  payload: PendingChangePayload;
}

export type RemoteState = { deleted: true } | { deleted: false; item: RemoteItem };

export type PushOutcome =
  | { type: 'accepted'; remoteId: string; versionToken?: string }
  | { type: 'conflict'; remote: RemoteState }
  | { type: 'rejected'; reason: string }
  | { type: 'retryable'; error: string; retryAfterMs?: number };

export interface SyncStateRecord {
  accountId: string;
  cursor: SyncCursor | null;
  status: 'idle' | 'syncing' | 'error';
  fullResyncRequested: boolean;
  lastSyncedAt: string | null;
  lastErrorKind: string | null;
  lastErrorMessage: string | null;
}

export interface SyncRunResult {
  accountId: string;
  receivedCount: number;
  pushedCount: number;
  failedCount: number;
  conflictCount: number;
  fullResync: boolean;
  blocked: boolean;
  cancelled: boolean;
  cursor: SyncCursor | null;
  durationMs: number;
}

export const emptyItemFields = (): ItemFields => ({
  threadId: null,
  messageId: null,
  subject: null,
  from: null,
  to: null,
  snippet: null,
  receivedAt: null,
  isRead: false,
  isStarred: false,
  isDraft: false,
  labels: [],
  draft: null,
});
