export type SyncErrorKind =
  | 'AuthExpired'
  | 'RateLimited'
  | 'NetworkError'
  | 'CursorInvalidated'
  | 'PushConflict'
  | 'PushRejected'
  | 'StorageCorruption'
  | 'AlreadySyncing'
  | 'NotFound'
  | 'Cancelled';

export const SYNC_TIMEOUT_SENTINEL = 'SYNC_OPERATION_TIMEOUT';

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly retryAfterMs: number | null;

  constructor(kind: SyncErrorKind, message: string, options: { cause?: unknown; retryAfterMs?: number | null } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SyncError';
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export const isSyncError = (error: unknown, kind?: SyncErrorKind): error is SyncError =>
  error instanceof SyncError && (kind === undefined || error.kind === kind);

// Transient kinds are retried by the scheduler; everything else needs outside action.
export const isTransientSyncError = (error: SyncError) =>
  error.kind === 'NetworkError' || error.kind === 'RateLimited';

const readStringProp = (value: unknown, key: string): string | undefined => {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : undefined;
};

export const isRecoverableNetworkError = (error: unknown) => {
  const code = readStringProp(error, 'code');
  const errno = readStringProp(error, 'errno');
  const message = String(error).toLowerCase();
  return (
    code === 'ECONNRESET'
    || code === 'ETIMEDOUT'
    || code === 'ECONNREFUSED'
    || code === 'ENOTFOUND'
    || code === 'EPIPE'
    || code === 'EAI_AGAIN'
    || errno === 'ECONNRESET'
    || errno === 'ETIMEDOUT'
    || message.includes(SYNC_TIMEOUT_SENTINEL.toLowerCase())
    || message.includes('timed out')
    || message.includes('timeout')
    || message.includes('connection')
    || message.includes('network')
    || message.includes('fetch failed')
  );
};

export const toSyncError = (error: unknown, fallback: SyncErrorKind = 'NetworkError'): SyncError => {
  if (error instanceof SyncError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (isRecoverableNetworkError(error)) {
    return new SyncError('NetworkError', message, { cause: error });
  }
  return new SyncError(fallback, message, { cause: error });
};

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
