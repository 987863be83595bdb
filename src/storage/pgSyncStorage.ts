import { v4 as uuidv4 } from 'uuid';
import { pool, query, withTransaction } from '../db/pool.js';
import type { Queryable } from '../db/pool.js';
import type {
  AccountCredential,
  AccountRecord,
  AccountServerConfig,
  DraftContent,
  NewPendingChange,
  PendingChange,
  PendingChangeKind,
  PendingChangePayload,
  PendingChangeStatus,
  ProviderKind,
  ReplicaEntry,
  SyncStateRecord,
} from '../shared/types.js';
import { parseStoredCursor } from '../services/cursor.js';
import { overlayLaterIntents } from '../services/replica.js';
import { SyncError } from '../services/syncErrors.js';
import type {
  AccountStore,
  ChangeLogMark,
  ChangeLogStore,
  LocalMutation,
  ReplicaFilter,
  ReplicaStore,
  SyncCommit,
  SyncEventRecord,
  SyncEventStore,
  SyncStateStore,
  SyncStorage,
} from './syncStorage.js';

const SYNC_EVENTS_NOTIFY_CHANNEL = 'mailsync_sync_events';

type AccountRow = {
  id: string;
  kind: string;
  email_address: string;
  credential: unknown;
  server_config: unknown;
  sync_enabled: boolean;
};

type SyncStateRow = {
  cursor: unknown;
  status: string;
  full_resync_requested: boolean;
  last_synced_at: Date | null;
  last_error_kind: string | null;
  last_error_message: string | null;
};

type ReplicaRow = {
  local_id: string;
  account_id: string;
  remote_id: string | null;
  version_token: string | null;
  thread_id: string | null;
  message_id: string | null;
  subject: string | null;
  from_header: string | null;
  to_header: string | null;
  snippet: string | null;
  received_at: Date | null;
  is_read: boolean;
  is_starred: boolean;
  is_draft: boolean;
  labels: string[] | null;
  draft: unknown;
  updated_at: Date;
};

type PendingChangeRow = {
  id: string;
  account_id: string;
  seq: string | number;
  local_id: string;
  target: string | null;
  kind: string;
  payload: unknown;
  status: string;
  attempt_count: number;
  last_error: string | null;
  created_at: Date;
  updated_at: Date;
};

type SyncEventRow = {
  id: string | number;
  account_id: string;
  event_type: string;
  payload: unknown;
  created_at: Date;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const optionalString = (value: unknown) => (typeof value === 'string' ? value : undefined);
const optionalBoolean = (value: unknown) => (typeof value === 'boolean' ? value : undefined);

const toIso = (value: Date | null) => (value ? value.toISOString() : null);

const PROVIDER_KINDS: ProviderKind[] = ['history', 'sequence'];
const CHANGE_KINDS: PendingChangeKind[] = ['create', 'update', 'delete'];
const CHANGE_STATUSES: PendingChangeStatus[] = ['queued', 'in_flight', 'synced', 'failed'];

const parseCredential = (raw: unknown): AccountCredential => {
  const value = isRecord(raw) ? raw : {};
  return {
    authType: value.authType === 'oauth2' ? 'oauth2' : 'password',
    username: optionalString(value.username),
    password: optionalString(value.password),
    refreshToken: optionalString(value.refreshToken),
    accessToken: optionalString(value.accessToken) ?? null,
    tokenExpiresAt: optionalString(value.tokenExpiresAt) ?? null,
    oauthClientId: optionalString(value.oauthClientId),
    oauthClientSecret: optionalString(value.oauthClientSecret),
  };
};

const parseServerConfig = (raw: unknown): AccountServerConfig => {
  const value = isRecord(raw) ? raw : {};
  return {
    host: optionalString(value.host),
    port: typeof value.port === 'number' ? value.port : undefined,
    tls: optionalBoolean(value.tls),
    mailbox: optionalString(value.mailbox),
    smtpHost: optionalString(value.smtpHost),
    smtpPort: typeof value.smtpPort === 'number' ? value.smtpPort : undefined,
    smtpSecure: optionalBoolean(value.smtpSecure),
  };
};

const mapAccount = (row: AccountRow): AccountRecord => {
  const kind = PROVIDER_KINDS.find((candidate) => candidate === row.kind);
  if (!kind) {
    throw new SyncError('StorageCorruption', `account ${row.id} has unknown provider kind ${row.kind}`);
  }
  return {
    id: row.id,
    kind,
    emailAddress: row.email_address,
    credential: parseCredential(row.credential),
    serverConfig: parseServerConfig(row.server_config),
    syncEnabled: row.sync_enabled,
  };
};

export const parseDraftContent = (raw: unknown): DraftContent | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const { to, cc, subject, bodyText, inReplyTo } = raw;
  if (!isStringArray(to) || !isStringArray(cc) || typeof subject !== 'string' || typeof bodyText !== 'string') {
    return null;
  }
  return {
    to,
    cc,
    subject,
    bodyText,
    inReplyTo: typeof inReplyTo === 'string' ? inReplyTo : null,
  };
};

const baseVersionOf = (value: Record<string, unknown>): string | null | undefined => {
  if (value.baseVersion === null) {
    return null;
  }
  return typeof value.baseVersion === 'string' ? value.baseVersion : undefined;
};

/** Returns null when the blob is not a recognizable payload. */
export const parsePendingChangePayload = (raw: unknown): PendingChangePayload | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const baseVersion = baseVersionOf(raw);
  if (baseVersion === undefined) {
    return null;
  }
  switch (raw.op) {
    case 'setFlags': {
      const base = isRecord(raw.base) ? raw.base : null;
      if (!base) {
        return null;
      }
      const isRead = optionalBoolean(raw.isRead);
      const isStarred = optionalBoolean(raw.isStarred);
      if (isRead === undefined && isStarred === undefined) {
        return null;
      }
      return {
        op: 'setFlags',
        ...(isRead === undefined ? {} : { isRead }),
        ...(isStarred === undefined ? {} : { isStarred }),
        base: { isRead: optionalBoolean(base.isRead), isStarred: optionalBoolean(base.isStarred) },
        baseVersion,
      };
    }
    case 'modifyLabels': {
      const base = isRecord(raw.base) ? raw.base : null;
      if (!isStringArray(raw.add) || !isStringArray(raw.remove) || !base || !isStringArray(base.labels)) {
        return null;
      }
      return { op: 'modifyLabels', add: raw.add, remove: raw.remove, base: { labels: base.labels }, baseVersion };
    }
    case 'saveDraft': {
      const draft = parseDraftContent(raw.draft);
      return draft ? { op: 'saveDraft', draft, baseVersion } : null;
    }
    case 'send': {
      const draft = parseDraftContent(raw.draft);
      return draft ? { op: 'send', draft, baseVersion } : null;
    }
    case 'delete':
      return { op: 'delete', baseVersion };
    default:
      return null;
  }
};

const mapPendingChange = (row: PendingChangeRow): PendingChange => {
  const kind = CHANGE_KINDS.find((candidate) => candidate === row.kind);
  const status = CHANGE_STATUSES.find((candidate) => candidate === row.status);
  const payload = parsePendingChangePayload(row.payload);
  if (!kind || !status || !payload) {
    throw new SyncError('StorageCorruption', `pending change ${row.id} failed validation on load`);
  }
  return {
    id: row.id,
    accountId: row.account_id,
    seq: Number(row.seq),
    localId: row.local_id,
    target: row.target,
    kind,
    payload,
    status,
    attemptCount: row.attempt_count,
    lastError: row.last_error,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
};

const mapReplicaEntry = (row: ReplicaRow): ReplicaEntry => ({
  localId: row.local_id,
  accountId: row.account_id,
  remoteId: row.remote_id,
  versionToken: row.version_token,
  fields: {
    threadId: row.thread_id,
    messageId: row.message_id,
    subject: row.subject,
    from: row.from_header,
    to: row.to_header,
    snippet: row.snippet,
    receivedAt: toIso(row.received_at),
    isRead: row.is_read,
    isStarred: row.is_starred,
    isDraft: row.is_draft,
    labels: row.labels ?? [],
    draft: parseDraftContent(row.draft),
  },
  updatedAt: row.updated_at.toISOString(),
});

const mapSyncEvent = (row: SyncEventRow): SyncEventRecord => ({
  id: Number(row.id),
  accountId: row.account_id,
  eventType: row.event_type,
  payload: isRecord(row.payload) ? row.payload : {},
  createdAt: row.created_at.toISOString(),
});

const PENDING_COLUMNS = `id, account_id, seq, local_id, target, kind, payload, status, attempt_count, last_error, created_at, updated_at`;
const REPLICA_COLUMNS = `local_id, account_id, remote_id, version_token, thread_id, message_id, subject, from_header,
  to_header, snippet, received_at, is_read, is_starred, is_draft, labels, draft, updated_at`;

const enqueueWith = async (client: Queryable, input: NewPendingChange): Promise<PendingChange> => {
  const sequence = await query<{ last_seq: string }>(
    `INSERT INTO change_log_sequences (account_id, last_seq)
     VALUES ($1, 1)
     ON CONFLICT (account_id) DO UPDATE SET last_seq = change_log_sequences.last_seq + 1
     RETURNING last_seq`,
    [input.accountId],
    client,
  );
  const seq = Number(sequence.rows[0]?.last_seq ?? 0);
  const result = await query<PendingChangeRow>(
    `INSERT INTO pending_changes (id, account_id, seq, local_id, target, kind, payload)
     VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)
     RETURNING ${PENDING_COLUMNS}`,
    [input.id ?? uuidv4(), input.accountId, seq, input.localId, input.target, input.kind, JSON.stringify(input.payload)],
    client,
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error(`failed to enqueue pending change for account ${input.accountId}`);
  }
  return mapPendingChange(row);
};

// Marks only touch non-terminal rows, so replays after a crash are no-ops.
const applyMarkWith = async (client: Queryable, mark: ChangeLogMark) => {
  switch (mark.type) {
    case 'synced':
      await query(
        `UPDATE pending_changes SET status = 'synced', updated_at = NOW()
          WHERE id = $1 AND status IN ('queued', 'in_flight')`,
        [mark.id],
        client,
      );
      return;
    case 'failed':
      await query(
        `UPDATE pending_changes SET status = 'failed', last_error = $2, updated_at = NOW()
          WHERE id = $1 AND status IN ('queued', 'in_flight')`,
        [mark.id, mark.reason],
        client,
      );
      return;
    case 'attempt':
      await query(
        `UPDATE pending_changes
            SET status = 'queued', attempt_count = attempt_count + 1, last_error = $2, updated_at = NOW()
          WHERE id = $1 AND status IN ('queued', 'in_flight')`,
        [mark.id, mark.error],
        client,
      );
      return;
    case 'rewrite':
      await query(
        `UPDATE pending_changes
            SET status = 'queued', payload = $2::jsonb, target = $3, updated_at = NOW()
          WHERE id = $1 AND status IN ('queued', 'in_flight')`,
        [mark.id, JSON.stringify(mark.payload), mark.target],
        client,
      );
      return;
  }
};

const upsertEntryWith = async (client: Queryable, entry: ReplicaEntry) => {
  const { fields } = entry;
  await query(
    `INSERT INTO replica_entries (${REPLICA_COLUMNS})
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15::text[], $16::jsonb, $17)
     ON CONFLICT (local_id) DO UPDATE
        SET remote_id = EXCLUDED.remote_id,
            version_token = EXCLUDED.version_token,
            thread_id = EXCLUDED.thread_id,
            message_id = EXCLUDED.message_id,
            subject = EXCLUDED.subject,
            from_header = EXCLUDED.from_header,
            to_header = EXCLUDED.to_header,
            snippet = EXCLUDED.snippet,
            received_at = EXCLUDED.received_at,
            is_read = EXCLUDED.is_read,
            is_starred = EXCLUDED.is_starred,
            is_draft = EXCLUDED.is_draft,
            labels = EXCLUDED.labels,
            draft = EXCLUDED.draft,
            updated_at = EXCLUDED.updated_at`,
    [
      entry.localId,
      entry.accountId,
      entry.remoteId,
      entry.versionToken,
      fields.threadId,
      fields.messageId,
      fields.subject,
      fields.from,
      fields.to,
      fields.snippet,
      fields.receivedAt,
      fields.isRead,
      fields.isStarred,
      fields.isDraft,
      fields.labels,
      fields.draft ? JSON.stringify(fields.draft) : null,
      entry.updatedAt,
    ],
    client,
  );
};

const writeReplicaWith = async (client: Queryable, accountId: string, upserts: ReplicaEntry[], deletes: string[]) => {
  if (deletes.length > 0) {
    await query(
      'DELETE FROM replica_entries WHERE account_id = $1 AND local_id = ANY($2::uuid[])',
      [accountId, deletes],
      client,
    );
  }
  if (upserts.length === 0) {
    return;
  }
  // Remote ids may move between entries within one commit (relink after resync), so the
  // unique (account_id, remote_id) index must not see the intermediate state.
  await query(
    'UPDATE replica_entries SET remote_id = NULL WHERE account_id = $1 AND local_id = ANY($2::uuid[])',
    [accountId, upserts.map((entry) => entry.localId)],
    client,
  );
  for (const entry of upserts) {
    await upsertEntryWith(client, entry);
  }
};

// Row locks first: a local action writing one of these entries either committed already (its
// change is visible below) or waits for this transaction and writes on top of it.
const laterIntentsWith = async (client: Queryable, commit: SyncCommit): Promise<PendingChange[]> => {
  const localIds = commit.upserts.map((entry) => entry.localId);
  if (localIds.length === 0) {
    return [];
  }
  await query(
    'SELECT local_id FROM replica_entries WHERE account_id = $1 AND local_id = ANY($2::uuid[]) FOR UPDATE',
    [commit.accountId, localIds],
    client,
  );
  const result = await query<PendingChangeRow>(
    `SELECT ${PENDING_COLUMNS}
       FROM pending_changes
      WHERE account_id = $1
        AND seq > $2
        AND local_id = ANY($3::uuid[])
        AND status IN ('queued', 'in_flight')
      ORDER BY seq ASC`,
    [commit.accountId, commit.snapshotSeq, localIds],
    client,
  );
  const marked = new Set(commit.marks.map((mark) => mark.id));
  return result.rows.map(mapPendingChange).filter((change) => !marked.has(change.id));
};

export class PgAccountStore implements AccountStore {
  async list() {
    const result = await query<AccountRow>(
      `SELECT id, kind, email_address, credential, server_config, sync_enabled
         FROM mail_accounts
        ORDER BY created_at ASC`,
    );
    return result.rows.map(mapAccount);
  }

  async get(accountId: string) {
    const result = await query<AccountRow>(
      `SELECT id, kind, email_address, credential, server_config, sync_enabled
         FROM mail_accounts
        WHERE id = $1`,
      [accountId],
    );
    const row = result.rows[0];
    return row ? mapAccount(row) : null;
  }

  async saveCredential(accountId: string, credential: AccountCredential) {
    await query(
      'UPDATE mail_accounts SET credential = $2::jsonb, updated_at = NOW() WHERE id = $1',
      [accountId, JSON.stringify(credential)],
    );
  }
}

export class PgSyncStateStore implements SyncStateStore {
  async load(account: AccountRecord): Promise<SyncStateRecord> {
    await query(
      `INSERT INTO sync_states (account_id) VALUES ($1) ON CONFLICT (account_id) DO NOTHING`,
      [account.id],
    );
    const result = await query<SyncStateRow>(
      `SELECT cursor, status, full_resync_requested, last_synced_at, last_error_kind, last_error_message
         FROM sync_states
        WHERE account_id = $1`,
      [account.id],
    );
    const row = result.rows[0];
    if (!row) {
      throw new SyncError('StorageCorruption', `sync state row missing for account ${account.id}`);
    }
    const status = row.status === 'syncing' || row.status === 'error' ? row.status : 'idle';
    return {
      accountId: account.id,
      cursor: parseStoredCursor(account.id, account.kind, row.cursor),
      status,
      fullResyncRequested: row.full_resync_requested,
      lastSyncedAt: toIso(row.last_synced_at),
      lastErrorKind: row.last_error_kind,
      lastErrorMessage: row.last_error_message,
    };
  }

  async claim(accountId: string, staleMs: number) {
    await query(
      `INSERT INTO sync_states (account_id) VALUES ($1) ON CONFLICT (account_id) DO NOTHING`,
      [accountId],
    );
    const result = await query<{ account_id: string }>(
      `UPDATE sync_states
          SET status = 'syncing',
              sync_started_at = NOW(),
              updated_at = NOW()
        WHERE account_id = $1
          AND (
            status IS DISTINCT FROM 'syncing'
            OR sync_started_at IS NULL
            OR updated_at < NOW() - ($2::double precision * INTERVAL '1 millisecond')
          )
      RETURNING account_id`,
      [accountId, staleMs],
    );
    return result.rows.length > 0;
  }

  async heartbeat(accountId: string) {
    await query(
      `UPDATE sync_states SET updated_at = NOW() WHERE account_id = $1 AND status = 'syncing'`,
      [accountId],
    );
  }

  async release(accountId: string) {
    await query(
      `UPDATE sync_states
          SET status = CASE WHEN last_error_kind IS NULL THEN 'idle' ELSE 'error' END,
              sync_started_at = NULL,
              updated_at = NOW()
        WHERE account_id = $1`,
      [accountId],
    );
  }

  async recordFailure(accountId: string, kind: string, message: string) {
    await query(
      `UPDATE sync_states
          SET status = 'error',
              sync_started_at = NULL,
              last_error_kind = $2,
              last_error_message = $3,
              updated_at = NOW()
        WHERE account_id = $1`,
      [accountId, kind, message.slice(0, 2000)],
    );
  }

  async requestFullResync(accountId: string) {
    await query(
      `INSERT INTO sync_states (account_id, full_resync_requested)
       VALUES ($1, TRUE)
       ON CONFLICT (account_id) DO UPDATE
          SET full_resync_requested = TRUE,
              cursor = NULL,
              last_error_kind = NULL,
              last_error_message = NULL,
              status = CASE WHEN sync_states.status = 'error' THEN 'idle' ELSE sync_states.status END,
              updated_at = NOW()`,
      [accountId],
    );
  }

  async reapStaleClaims(staleMs: number) {
    const result = await query<{ account_id: string }>(
      `UPDATE sync_states
          SET status = 'idle', sync_started_at = NULL, updated_at = NOW()
        WHERE status = 'syncing'
          AND updated_at < NOW() - ($1::double precision * INTERVAL '1 millisecond')
      RETURNING account_id`,
      [staleMs],
    );
    return result.rows.length;
  }
}

export class PgReplicaStore implements ReplicaStore {
  async load(accountId: string, filter?: ReplicaFilter) {
    if (!filter) {
      const result = await query<ReplicaRow>(
        `SELECT ${REPLICA_COLUMNS} FROM replica_entries WHERE account_id = $1`,
        [accountId],
      );
      return result.rows.map(mapReplicaEntry);
    }
    const remoteIds = filter.remoteIds ?? [];
    const localIds = filter.localIds ?? [];
    const messageIds = filter.messageIds ?? [];
    if (remoteIds.length === 0 && localIds.length === 0 && messageIds.length === 0) {
      return [];
    }
    const result = await query<ReplicaRow>(
      `SELECT ${REPLICA_COLUMNS}
         FROM replica_entries
        WHERE account_id = $1
          AND (remote_id = ANY($2::text[]) OR local_id = ANY($3::uuid[]) OR message_id = ANY($4::text[]))`,
      [accountId, remoteIds, localIds, messageIds],
    );
    return result.rows.map(mapReplicaEntry);
  }

  async get(accountId: string, localId: string) {
    const result = await query<ReplicaRow>(
      `SELECT ${REPLICA_COLUMNS} FROM replica_entries WHERE account_id = $1 AND local_id = $2`,
      [accountId, localId],
    );
    const row = result.rows[0];
    return row ? mapReplicaEntry(row) : null;
  }
}

export class PgChangeLogStore implements ChangeLogStore {
  async enqueue(input: NewPendingChange) {
    return withTransaction((client) => enqueueWith(client, input));
  }

  async nextBatch(accountId: string, limit: number, afterSeq = 0) {
    const result = await query<PendingChangeRow>(
      `SELECT ${PENDING_COLUMNS}
         FROM pending_changes
        WHERE account_id = $1
          AND seq > $2
          AND status IN ('queued', 'in_flight')
        ORDER BY seq ASC
        LIMIT $3`,
      [accountId, afterSeq, limit],
    );
    return result.rows.map(mapPendingChange);
  }

  async list(accountId: string, statuses?: PendingChangeStatus[]) {
    const result = await query<PendingChangeRow>(
      `SELECT ${PENDING_COLUMNS}
         FROM pending_changes
        WHERE account_id = $1
          AND ($2::text[] IS NULL OR status = ANY($2::text[]))
        ORDER BY seq ASC`,
      [accountId, statuses ?? null],
    );
    return result.rows.map(mapPendingChange);
  }

  async get(id: string) {
    const result = await query<PendingChangeRow>(
      `SELECT ${PENDING_COLUMNS} FROM pending_changes WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapPendingChange(row) : null;
  }

  async markInFlight(id: string) {
    await query(
      `UPDATE pending_changes SET status = 'in_flight', updated_at = NOW() WHERE id = $1 AND status = 'queued'`,
      [id],
    );
  }

  async markSynced(id: string) {
    await applyMarkWith(pool, { type: 'synced', id });
  }

  async markFailed(id: string, reason: string) {
    await applyMarkWith(pool, { type: 'failed', id, reason });
  }

  async recordAttempt(id: string, error: string) {
    await applyMarkWith(pool, { type: 'attempt', id, error });
  }

  async rewrite(id: string, payload: PendingChangePayload, target: string | null) {
    await applyMarkWith(pool, { type: 'rewrite', id, payload, target });
  }

  async retry(id: string) {
    const result = await query<PendingChangeRow>(
      `UPDATE pending_changes
          SET status = 'queued', attempt_count = 0, last_error = NULL, updated_at = NOW()
        WHERE id = $1 AND status = 'failed'
      RETURNING ${PENDING_COLUMNS}`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapPendingChange(row) : null;
  }

  async discard(id: string) {
    const result = await query(
      `DELETE FROM pending_changes WHERE id = $1 AND status = 'failed'`,
      [id],
    );
    return result.rowCount > 0;
  }

  async purgeSynced(accountId?: string) {
    const result = await query(
      `DELETE FROM pending_changes WHERE status = 'synced' AND ($1::uuid IS NULL OR account_id = $1::uuid)`,
      [accountId ?? null],
    );
    return result.rowCount;
  }
}

export class PgSyncEventStore implements SyncEventStore {
  async append(accountId: string, eventType: string, payload: Record<string, unknown>) {
    const result = await query<{ id: string }>(
      `WITH inserted AS (
         INSERT INTO sync_events (account_id, event_type, payload)
         VALUES ($1, $2, $3::jsonb)
         RETURNING id, account_id
       ),
       notifier AS (
         SELECT pg_notify($4, json_build_object('accountId', inserted.account_id, 'eventId', inserted.id)::text)
           FROM inserted
       )
       SELECT inserted.id::text AS id
         FROM inserted
         LEFT JOIN notifier ON TRUE`,
      [accountId, eventType, JSON.stringify(payload), SYNC_EVENTS_NOTIFY_CHANNEL],
    );
    const id = Number(result.rows[0]?.id);
    return Number.isFinite(id) && id > 0 ? id : null;
  }

  async list(since: number, limit: number, accountId?: string) {
    const result = await query<SyncEventRow>(
      `SELECT id, account_id, event_type, payload, created_at
         FROM sync_events
        WHERE id > $1
          AND ($3::uuid IS NULL OR account_id = $3::uuid)
        ORDER BY id ASC
        LIMIT $2`,
      [since, limit, accountId ?? null],
    );
    return result.rows.map(mapSyncEvent);
  }

  async prune(retentionDays: number) {
    const result = await query(
      `DELETE FROM sync_events WHERE created_at < (NOW() - make_interval(days => $1::int))`,
      [retentionDays],
    );
    return result.rowCount;
  }
}

export class PgSyncStorage implements SyncStorage {
  readonly accounts = new PgAccountStore();
  readonly syncState = new PgSyncStateStore();
  readonly replica = new PgReplicaStore();
  readonly changeLog = new PgChangeLogStore();
  readonly events = new PgSyncEventStore();

  async commitSync(commit: SyncCommit) {
    await withTransaction(async (client) => {
      const overlaid = overlayLaterIntents(commit.upserts, await laterIntentsWith(client, commit));
      await writeReplicaWith(client, commit.accountId, overlaid.upserts, [...commit.deletes, ...overlaid.deletes]);
      for (const mark of commit.marks) {
        await applyMarkWith(client, mark);
      }
      await query(
        `UPDATE sync_states
            SET cursor = $2::jsonb,
                last_synced_at = $3,
                last_error_kind = NULL,
                last_error_message = NULL,
                status = 'idle',
                sync_started_at = NULL,
                full_resync_requested = CASE WHEN $4 THEN FALSE ELSE full_resync_requested END,
                updated_at = NOW()
          WHERE account_id = $1`,
        [commit.accountId, JSON.stringify(commit.cursor), commit.syncedAt, commit.clearFullResync],
        client,
      );
    });
  }

  async recordLocalMutation(mutation: LocalMutation) {
    return withTransaction(async (client) => {
      await writeReplicaWith(
        client,
        mutation.accountId,
        mutation.upsert ? [mutation.upsert] : [],
        mutation.deleteLocalId ? [mutation.deleteLocalId] : [],
      );
      return enqueueWith(client, mutation.change);
    });
  }
}
