import type { SyncStorage } from '../storage/syncStorage.js';
import type { SyncControl, SyncControlAction } from '../services/syncControl.js';
import { isSyncControlAction } from '../services/syncControl.js';

export interface TaskContext {
  storage: SyncStorage;
  control: SyncControl;
  eventRetentionDays: number;
}

const readField = (payload: unknown, key: string): unknown =>
  typeof payload === 'object' && payload !== null ? Reflect.get(payload, key) : undefined;

const runAction = (control: SyncControl, action: SyncControlAction, accountId: string) => {
  switch (action) {
    case 'sync':
      return control.trigger(accountId);
    case 'resume':
      return control.resume(accountId);
    case 'fullResync':
      return control.requestFullResync(accountId);
  }
};

export const syncControlTask = async (context: TaskContext, payload: unknown) => {
  const accountId = readField(payload, 'accountId');
  const action = readField(payload, 'action');
  if (typeof accountId !== 'string' || !accountId || !isSyncControlAction(action)) {
    // Malformed jobs would fail on every retry.
    console.warn('[worker] dropping malformed syncControl job', payload);
    return;
  }

  const outcome = await runAction(context.control, action, accountId);
  console.info(`[worker] ${action} for ${accountId}: ${outcome}`);
};

export const purgeSyncedChangesTask = async (context: TaskContext) => {
  const removed = await context.storage.changeLog.purgeSynced();
  if (removed > 0) {
    console.info(`[maintenance] purged synced changes: ${removed}`);
  }
};

export const pruneSyncEventsTask = async (context: TaskContext) => {
  const removed = await context.storage.events.prune(context.eventRetentionDays);
  if (removed > 0) {
    console.info(`[maintenance] pruned sync events: ${removed}`);
  }
};
