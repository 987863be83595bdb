import type {
  NewPendingChange,
  PendingChange,
  PendingChangePayload,
  PendingChangeStatus,
} from '../shared/types.js';
import type { ChangeLogStore } from '../storage/syncStorage.js';

export class InvalidPendingChangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPendingChangeError';
  }
}

const kindMatchesPayload = (input: NewPendingChange) => {
  switch (input.kind) {
    case 'create':
      return input.payload.op === 'saveDraft' && input.target === null;
    case 'delete':
      return input.payload.op === 'delete' && input.target !== null;
    case 'update':
      return input.payload.op !== 'delete';
  }
};

const hasEffect = (payload: PendingChangePayload) => {
  switch (payload.op) {
    case 'setFlags':
      return payload.isRead !== undefined || payload.isStarred !== undefined;
    case 'modifyLabels':
      return payload.add.length > 0 || payload.remove.length > 0;
    case 'saveDraft':
    case 'send':
    case 'delete':
      return true;
  }
};

export const assertValidPendingChange = (input: NewPendingChange) => {
  if (!input.accountId || !input.localId) {
    throw new InvalidPendingChangeError('pending change needs an account and a local entry');
  }
  if (!kindMatchesPayload(input)) {
    throw new InvalidPendingChangeError(`${input.kind} cannot carry a ${input.payload.op} payload`);
  }
  if (!hasEffect(input.payload)) {
    throw new InvalidPendingChangeError(`${input.payload.op} change has no effect`);
  }
  if (input.payload.op === 'send' && input.payload.draft.to.length + input.payload.draft.cc.length === 0) {
    throw new InvalidPendingChangeError('send change has no recipients');
  }
};

/**
 * Durable FIFO of local mutations per account. Sequence numbers are assigned by the store;
 * the mark operations are no-ops on entries that are already terminal or purged.
 */
export class ChangeLog {
  constructor(private readonly store: ChangeLogStore) {}

  async enqueue(input: NewPendingChange): Promise<PendingChange> {
    assertValidPendingChange(input);
    return this.store.enqueue(input);
  }

  nextBatch(accountId: string, limit: number, afterSeq = 0) {
    return this.store.nextBatch(accountId, Math.max(1, Math.floor(limit)), afterSeq);
  }

  /** Queued and in-flight entries; in-flight ones are leftovers of an interrupted drain. */
  outstanding(accountId: string) {
    return this.store.list(accountId, ['queued', 'in_flight']);
  }

  list(accountId: string, statuses?: PendingChangeStatus[]) {
    return this.store.list(accountId, statuses);
  }

  get(id: string) {
    return this.store.get(id);
  }

  markInFlight(id: string) {
    return this.store.markInFlight(id);
  }

  markSynced(id: string) {
    return this.store.markSynced(id);
  }

  markFailed(id: string, reason: string) {
    return this.store.markFailed(id, reason);
  }

  async retry(id: string) {
    const change = await this.store.retry(id);
    if (change) {
      console.info(`[change-log] re-queued failed change ${id} for account ${change.accountId}`);
    }
    return change;
  }

  async discard(id: string) {
    const discarded = await this.store.discard(id);
    if (discarded) {
      console.info(`[change-log] discarded failed change ${id}`);
    }
    return discarded;
  }

  purgeSynced(accountId?: string) {
    return this.store.purgeSynced(accountId);
  }
}
