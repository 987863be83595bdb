import { EventEmitter } from 'node:events';
import type { SyncErrorKind } from './syncErrors.js';
import type { SyncEventStore } from '../storage/syncStorage.js';

export type SyncEvent =
  | { type: 'SyncStarted'; accountId: string; at: string }
  | {
    type: 'SyncCompleted';
    accountId: string;
    receivedCount: number;
    pushedCount: number;
    failedCount: number;
    fullResync: boolean;
    at: string;
  }
  | { type: 'SyncFailed'; accountId: string; errorKind: SyncErrorKind; message: string; at: string }
  | { type: 'AuthRequired'; accountId: string; at: string }
  | { type: 'SyncDegraded'; accountId: string; failures: number; nextRetryMs: number; at: string };

export type SyncEventType = SyncEvent['type'];
export type SyncEventListener = (event: SyncEvent) => void;

const SYNC_EVENT = 'sync-event';

export class SyncEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  emit(event: SyncEvent) {
    this.emitter.emit(SYNC_EVENT, event);
  }

  subscribe(listener: SyncEventListener): () => void {
    this.emitter.on(SYNC_EVENT, listener);
    return () => {
      this.emitter.off(SYNC_EVENT, listener);
    };
  }
}

const eventPayload = (event: SyncEvent): Record<string, unknown> => {
  const { type: _type, accountId: _accountId, ...rest } = event;
  return rest;
};

/**
 * Persists every bus event to the event store. Writes are serialized so stored ids follow
 * emission order; a failed write is logged and does not block later ones.
 */
export const persistSyncEvents = (bus: SyncEventBus, store: SyncEventStore) => {
  let tail: Promise<void> = Promise.resolve();
  const unsubscribe = bus.subscribe((event) => {
    tail = tail
      .then(async () => {
        await store.append(event.accountId, event.type, eventPayload(event));
      })
      .catch((error: unknown) => {
        console.warn(`[sync-events] failed to persist ${event.type} for ${event.accountId}`, error);
      });
  });
  return {
    unsubscribe,
    flush: () => tail,
  };
};
