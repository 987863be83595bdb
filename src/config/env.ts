import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

const cwdEnvPath = path.resolve(process.cwd(), '.env');
const repoEnvPath = path.resolve(process.cwd(), '..', '.env');

dotenv.config({ path: cwdEnvPath });
if (repoEnvPath !== cwdEnvPath && fs.existsSync(repoEnvPath)) {
  dotenv.config({ path: repoEnvPath, override: false });
}

const required = (value?: string, name = 'environment variable'): string => {
  if (!value) {
    throw new Error(`Missing required ${name}`);
  }
  return value;
};

const positiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

const ratio = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    return fallback;
  }
  return parsed;
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: Number(process.env.PORT ?? '3000'),
  apiAdminToken: process.env.API_ADMIN_TOKEN ?? '',
  databaseUrl: required(process.env.DATABASE_URL, 'DATABASE_URL'),
  googleClientId: process.env.GOOGLE_CLIENT_ID,
  googleClientSecret: process.env.GOOGLE_CLIENT_SECRET,
  sync: {
    intervalMs: positiveInt(process.env.SYNC_INTERVAL_MS, 300_000),
    syncOnStart: process.env.SYNC_ON_START !== 'false',
    adapterTimeoutMs: positiveInt(process.env.SYNC_ADAPTER_TIMEOUT_MS, 60_000),
    backoffBaseMs: positiveInt(process.env.SYNC_BACKOFF_BASE_MS, 30_000),
    backoffMaxMs: positiveInt(process.env.SYNC_BACKOFF_MAX_MS, 30 * 60_000),
    extendedBackoffMs: positiveInt(process.env.SYNC_EXTENDED_BACKOFF_MS, 60 * 60_000),
    jitterRatio: ratio(process.env.SYNC_JITTER_RATIO, 0.2),
    maxTransientFailures: positiveInt(process.env.SYNC_MAX_TRANSIENT_FAILURES, 5),
    maxPushAttempts: positiveInt(process.env.SYNC_MAX_PUSH_ATTEMPTS, 5),
    drainBatchSize: positiveInt(process.env.SYNC_DRAIN_BATCH_SIZE, 50),
    syncClaimStaleMs: positiveInt(process.env.SYNC_CLAIM_STALE_MS, 900_000),
    fullSyncLimit: positiveInt(process.env.SYNC_FULL_SYNC_LIMIT, 500),
    flagSyncWindow: positiveInt(process.env.SYNC_FLAG_SYNC_WINDOW, 256),
    metadataFetchConcurrency: positiveInt(process.env.SYNC_METADATA_FETCH_CONCURRENCY, 8),
    gmailFullSyncQuery: process.env.SYNC_GMAIL_FULL_SYNC_QUERY ?? '',
    defaultMailbox: process.env.DEFAULT_MAILBOX ?? 'INBOX',
    archiveMailbox: process.env.ARCHIVE_MAILBOX ?? 'Archive',
    trashMailbox: process.env.TRASH_MAILBOX ?? 'Trash',
    draftsMailbox: process.env.DRAFTS_MAILBOX ?? 'Drafts',
    sentMailbox: process.env.SENT_MAILBOX ?? 'Sent',
    messageIdDomain: process.env.SYNC_MESSAGE_ID_DOMAIN ?? 'mailsync.local',
    eventRetentionDays: positiveInt(process.env.SYNC_EVENT_RETENTION_DAYS, 14),
    accountRefreshIntervalMs: positiveInt(process.env.SYNC_ACCOUNT_REFRESH_INTERVAL_MS, 60_000),
  },
};

export type SyncConfig = typeof env.sync;
