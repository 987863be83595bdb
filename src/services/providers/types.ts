import type {
  AccountCredential,
  PendingChange,
  ProviderKind,
  PushOutcome,
  RemoteChange,
  RemoteItem,
  SyncCursor,
} from '../../shared/types.js';

export interface FetchResult {
  /** In server-side causal order. */
  changes: RemoteChange[];
  cursor: SyncCursor;
  /** Set on a full fetch that stopped at the configured window; older items were not listed. */
  truncated?: boolean;
}

/**
 * Capability interface every remote mailbox variant implements. Failures are thrown as
 * `SyncError`; `pushChange` reports per-change outcomes and throws only for `AuthExpired`.
 */
export interface ProviderAdapter {
  readonly kind: ProviderKind;
  authenticate(): Promise<void>;
  /** A `null` cursor requests a full fetch. Retrying with the same cursor never skips changes. */
  fetchChangesSince(cursor: SyncCursor | null): Promise<FetchResult>;
  /** `pending.target` is the resolved remote id, or null for a create. */
  pushChange(pending: PendingChange): Promise<PushOutcome>;
  /** Throws `SyncError('NotFound')` when the item no longer exists. */
  fetchFullItem(remoteId: string): Promise<RemoteItem>;
  /** Ordering of this variant's cursors; `null` when incomparable (different epochs). */
  compareCursors(left: SyncCursor, right: SyncCursor): number | null;
}

export type CredentialSaver = (credential: AccountCredential) => Promise<void>;
