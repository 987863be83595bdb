import { makeWorkerUtils } from 'graphile-worker';
import type { WorkerUtils } from 'graphile-worker';
import { env } from '../config/env.js';
import type { SyncStateStore } from '../storage/syncStorage.js';
import type { SyncControl, SyncControlAction } from './syncControl.js';

export const SYNC_CONTROL_TASK = 'syncControl';

export interface SyncControlJobPayload {
  accountId: string;
  action: SyncControlAction;
}

let queue: WorkerUtils | null = null;

export const createQueue = async () => {
  if (queue) return queue;
  queue = await makeWorkerUtils({
    connectionString: env.databaseUrl,
  });
  return queue;
};

export const releaseQueue = async () => {
  if (!queue) return;
  const current = queue;
  queue = null;
  await current.release();
};

export type JobAdder = (
  payload: SyncControlJobPayload,
  spec: { jobKey: string; jobKeyMode: 'preserve_run_at'; maxAttempts: number; priority: number },
) => Promise<void>;

const addWithGraphile: JobAdder = async (payload, spec) => {
  const q = await createQueue();
  await q.addJob(SYNC_CONTROL_TASK, { ...payload }, spec);
};

export const enqueueSyncControl = async (payload: SyncControlJobPayload, addJob: JobAdder = addWithGraphile) => {
  await addJob(payload, {
    // One outstanding job per account and action; repeated requests while it waits collapse into it.
    jobKey: `sync-control:${payload.accountId}:${payload.action}`,
    jobKeyMode: 'preserve_run_at',
    maxAttempts: 3,
    priority: payload.action === 'sync' ? 0 : -50,
  });
};

/**
 * SyncControl for processes that do not own the scheduler: requests become worker jobs.
 * A full-resync request is also recorded on the sync state right away.
 */
export class QueueSyncControl implements SyncControl {
  constructor(
    private readonly syncState: Pick<SyncStateStore, 'requestFullResync'>,
    private readonly addJob: JobAdder = addWithGraphile,
  ) {}

  async trigger(accountId: string) {
    await enqueueSyncControl({ accountId, action: 'sync' }, this.addJob);
    return 'queued' as const;
  }

  async resume(accountId: string) {
    await enqueueSyncControl({ accountId, action: 'resume' }, this.addJob);
    return 'queued' as const;
  }

  async requestFullResync(accountId: string) {
    await this.syncState.requestFullResync(accountId);
    await enqueueSyncControl({ accountId, action: 'fullResync' }, this.addJob);
    return 'queued' as const;
  }
}
