export type SyncControlAction = 'sync' | 'resume' | 'fullResync';

export const SYNC_CONTROL_ACTIONS: SyncControlAction[] = ['sync', 'resume', 'fullResync'];

/** `queued`: handed to the worker; the other values come straight from the scheduler. */
export type SyncControlOutcome = 'started' | 'coalesced' | 'ignored' | 'queued';

/** Scheduler operations the HTTP surface can ask for, wherever the scheduler runs. */
export interface SyncControl {
  trigger(accountId: string): Promise<SyncControlOutcome>;
  resume(accountId: string): Promise<SyncControlOutcome>;
  requestFullResync(accountId: string): Promise<SyncControlOutcome>;
}

export const isSyncControlAction = (value: unknown): value is SyncControlAction =>
  typeof value === 'string' && SYNC_CONTROL_ACTIONS.some((action) => action === value);
