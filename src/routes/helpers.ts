import type { AccountCredential, DraftContent, PendingChangeStatus } from '../shared/types.js';
import type { SyncStorage } from '../storage/syncStorage.js';
import { InvalidPendingChangeError } from '../services/changeLog.js';
import type { ChangeLog } from '../services/changeLog.js';
import type { LocalActions } from '../services/localActions.js';
import type { SyncControl } from '../services/syncControl.js';
import { SyncError, isSyncError } from '../services/syncErrors.js';

export interface SyncRouteDeps {
  storage: SyncStorage;
  changeLog: ChangeLog;
  actions: LocalActions;
  control: SyncControl;
}

export const MAX_EVENTS_LIMIT = 500;
export const MAX_SYNC_EVENT_ID = Number.MAX_SAFE_INTEGER;
export const MAX_LABEL_MUTATION_ITEMS = 100;
export const MAX_LABEL_CHARS = 256;
export const MAX_DRAFT_RECIPIENTS = 100;
export const MAX_DRAFT_SUBJECT_CHARS = 998;
export const MAX_DRAFT_BODY_CHARS = 200_000;
export const PENDING_CHANGE_STATUSES: PendingChangeStatus[] = ['queued', 'in_flight', 'synced', 'failed'];

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readBody = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

export const required = (value: unknown, key: string): string => {
  if (typeof value !== 'string' || !value.trim()) {
    throw new RequestValidationError(`${key} is required`);
  }
  return value.trim();
};

export const optionalString = (value: unknown, key: string, maxChars: number): string | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new RequestValidationError(`${key} must be a string`);
  }
  if (value.length > maxChars) {
    throw new RequestValidationError(`${key} exceeds ${maxChars} characters`);
  }
  return value;
};

export const parsePositiveIntWithCap = (value: unknown, fallback: number, max: number) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.min(Math.floor(parsed), max);
};

export const parseNonNegativeIntWithCap = (value: unknown, fallback: number, max: number) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.min(Math.floor(parsed), max);
};

export const parseBooleanParam = (value: unknown): boolean | null => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  return null;
};

export const parseTrimmedStringArrayWithCap = (value: unknown, key: string, maxItems: number, maxChars: number) => {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`${key} must be an array`);
  }
  if (value.length > maxItems) {
    throw new RequestValidationError(`${key} exceeds ${maxItems} items`);
  }
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new RequestValidationError(`${key} must contain strings`);
    }
    const trimmed = item.trim();
    if (!trimmed) {
      continue;
    }
    if (trimmed.length > maxChars) {
      throw new RequestValidationError(`${key} entries exceed ${maxChars} characters`);
    }
    result.push(trimmed);
  }
  return Array.from(new Set(result));
};

export const parseStatusFilter = (value: unknown): PendingChangeStatus[] | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const statuses: PendingChangeStatus[] = [];
  for (const raw of String(value).split(',')) {
    const candidate = raw.trim();
    const status = PENDING_CHANGE_STATUSES.find((entry) => entry === candidate);
    if (!status) {
      throw new RequestValidationError(`unknown status: ${candidate}`);
    }
    statuses.push(status);
  }
  return statuses;
};

export const parseDraftInput = (value: unknown): DraftContent => {
  if (!isRecord(value)) {
    throw new RequestValidationError('draft is required');
  }
  return {
    to: parseTrimmedStringArrayWithCap(value.to, 'draft.to', MAX_DRAFT_RECIPIENTS, 998),
    cc: parseTrimmedStringArrayWithCap(value.cc, 'draft.cc', MAX_DRAFT_RECIPIENTS, 998),
    subject: optionalString(value.subject, 'draft.subject', MAX_DRAFT_SUBJECT_CHARS) ?? '',
    bodyText: optionalString(value.bodyText, 'draft.bodyText', MAX_DRAFT_BODY_CHARS) ?? '',
    inReplyTo: optionalString(value.inReplyTo, 'draft.inReplyTo', 998) ?? null,
  };
};

export const parseCredentialInput = (value: unknown): AccountCredential => {
  if (!isRecord(value)) {
    throw new RequestValidationError('credential must be an object');
  }
  const authType = value.authType;
  if (authType !== 'oauth2' && authType !== 'password') {
    throw new RequestValidationError('credential.authType must be oauth2 or password');
  }
  const credential: AccountCredential = {
    authType,
    username: optionalString(value.username, 'credential.username', 512),
    password: optionalString(value.password, 'credential.password', 2_048),
    refreshToken: optionalString(value.refreshToken, 'credential.refreshToken', 4_096),
    accessToken: optionalString(value.accessToken, 'credential.accessToken', 8_192) ?? null,
    tokenExpiresAt: null,
    oauthClientId: optionalString(value.oauthClientId, 'credential.oauthClientId', 512),
    oauthClientSecret: optionalString(value.oauthClientSecret, 'credential.oauthClientSecret', 2_048),
  };
  if (authType === 'password' && !credential.password) {
    throw new RequestValidationError('credential.password is required for password accounts');
  }
  if (authType === 'oauth2' && !credential.refreshToken) {
    throw new RequestValidationError('credential.refreshToken is required for oauth2 accounts');
  }
  return credential;
};

export const statusForError = (error: unknown): number => {
  if (error instanceof RequestValidationError || error instanceof InvalidPendingChangeError) {
    return 400;
  }
  if (isSyncError(error, 'NotFound')) {
    return 404;
  }
  if (isSyncError(error, 'AlreadySyncing') || isSyncError(error, 'StorageCorruption') || isSyncError(error, 'AuthExpired')) {
    return 409;
  }
  return 500;
};

export const requireAccount = async (storage: SyncStorage, accountId: string) => {
  const account = await storage.accounts.get(accountId);
  if (!account) {
    throw new SyncError('NotFound', `account ${accountId} not found`);
  }
  return account;
};
