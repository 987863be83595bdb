import type { SyncConfig } from '../config/env.js';
import type { SyncRunResult } from '../shared/types.js';
import type { SyncStateStore } from '../storage/syncStorage.js';
import type { SyncRunOptions } from './reconciler.js';
import { computeBackoffDelay } from './retry.js';
import { toSyncError } from './syncErrors.js';
import type { SyncError, SyncErrorKind } from './syncErrors.js';
import type { SyncEventBus } from './syncEvents.js';

export type AccountSyncState = 'idle' | 'running' | 'backoff' | 'paused' | 'stopped';
export type PauseReason = 'auth' | 'corruption';
export type SyncRequestResult = 'started' | 'coalesced' | 'ignored';

export interface AccountSyncStatus {
  accountId: string;
  state: AccountSyncState;
  pausedReason: PauseReason | null;
  consecutiveFailures: number;
  lastError: { kind: SyncErrorKind; message: string } | null;
  lastResult: SyncRunResult | null;
  nextRunAt: string | null;
}

export interface SyncRunner {
  sync(accountId: string, options: SyncRunOptions): Promise<SyncRunResult>;
}

/** Returns a function that cancels the callback. */
export interface SchedulerTimers {
  schedule(callback: () => void, delayMs: number): () => void;
}

export type SchedulerConfig = Pick<
  SyncConfig,
  | 'intervalMs'
  | 'syncOnStart'
  | 'backoffBaseMs'
  | 'backoffMaxMs'
  | 'extendedBackoffMs'
  | 'jitterRatio'
  | 'maxTransientFailures'
>;

export interface SchedulerOptions {
  runner: SyncRunner;
  syncState: Pick<SyncStateStore, 'requestFullResync'>;
  events: SyncEventBus;
  config: SchedulerConfig;
  timers?: SchedulerTimers;
  random?: () => number;
  clock?: () => number;
}

interface AccountSlot {
  accountId: string;
  state: AccountSyncState;
  pausedReason: PauseReason | null;
  failures: number;
  lastError: { kind: SyncErrorKind; message: string } | null;
  lastResult: SyncRunResult | null;
  nextRunAtMs: number | null;
  cancelTimer: (() => void) | null;
  running: Promise<void> | null;
  rerun: boolean;
}

export const nodeTimers: SchedulerTimers = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    handle.unref();
    return () => clearTimeout(handle);
  },
};

export class Scheduler {
  private slots = new Map<string, AccountSlot>();
  private stopped = false;
  private readonly timers: SchedulerTimers;
  private readonly random: () => number;
  private readonly clock: () => number;

  constructor(private readonly options: SchedulerOptions) {
    this.timers = options.timers ?? nodeTimers;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? Date.now;
  }

  addAccount(accountId: string) {
    if (this.stopped || this.slots.has(accountId)) {
      return;
    }
    const slot: AccountSlot = {
      accountId,
      state: 'idle',
      pausedReason: null,
      failures: 0,
      lastError: null,
      lastResult: null,
      nextRunAtMs: null,
      cancelTimer: null,
      running: null,
      rerun: false,
    };
    this.slots.set(accountId, slot);
    if (this.options.config.syncOnStart) {
      this.startRun(slot);
    } else {
      this.scheduleNext(slot, this.options.config.intervalMs, 'idle');
    }
  }

  async removeAccount(accountId: string) {
    const slot = this.slots.get(accountId);
    if (!slot) {
      return;
    }
    this.slots.delete(accountId);
    this.clearTimer(slot);
    slot.state = 'stopped';
    await this.settle(slot);
  }

  hasAccount(accountId: string) {
    return this.slots.has(accountId);
  }

  accountIds() {
    return Array.from(this.slots.keys());
  }

  requestSync(accountId: string): SyncRequestResult {
    const slot = this.slots.get(accountId);
    if (this.stopped || !slot) {
      return 'ignored';
    }
    switch (slot.state) {
      case 'running':
        slot.rerun = true;
        return 'coalesced';
      case 'paused':
      case 'stopped':
        return 'ignored';
      case 'idle':
      case 'backoff':
        this.startRun(slot);
        return 'started';
    }
  }

  resumeAccount(accountId: string) {
    const slot = this.slots.get(accountId);
    if (this.stopped || !slot || slot.state !== 'paused') {
      return false;
    }
    console.info(`[scheduler] resuming ${accountId} (was paused: ${slot.pausedReason ?? 'unknown'})`);
    slot.pausedReason = null;
    slot.failures = 0;
    this.startRun(slot);
    return true;
  }

  async requestFullResync(accountId: string): Promise<SyncRequestResult> {
    await this.options.syncState.requestFullResync(accountId);
    if (this.resumeAccount(accountId)) {
      return 'started';
    }
    return this.requestSync(accountId);
  }

  getStatus(accountId: string): AccountSyncStatus | null {
    const slot = this.slots.get(accountId);
    return slot ? this.toStatus(slot) : null;
  }

  listStatuses() {
    return Array.from(this.slots.values(), (slot) => this.toStatus(slot));
  }

  /** Resolves once no run is in flight for the account, including coalesced reruns. */
  async whenSettled(accountId: string) {
    const slot = this.slots.get(accountId);
    if (slot) {
      await this.settle(slot);
    }
  }

  async stop() {
    this.stopped = true;
    const slots = Array.from(this.slots.values());
    for (const slot of slots) {
      this.clearTimer(slot);
      slot.rerun = false;
    }
    await Promise.all(slots.map((slot) => this.settle(slot)));
    for (const slot of slots) {
      slot.state = 'stopped';
    }
  }

  private async settle(slot: AccountSlot) {
    while (slot.running) {
      await slot.running;
    }
  }

  private toStatus(slot: AccountSlot): AccountSyncStatus {
    return {
      accountId: slot.accountId,
      state: slot.state,
      pausedReason: slot.pausedReason,
      consecutiveFailures: slot.failures,
      lastError: slot.lastError,
      lastResult: slot.lastResult,
      nextRunAt: slot.nextRunAtMs === null ? null : new Date(slot.nextRunAtMs).toISOString(),
    };
  }

  private isLive(slot: AccountSlot) {
    return !this.stopped && this.slots.get(slot.accountId) === slot;
  }

  private clearTimer(slot: AccountSlot) {
    slot.cancelTimer?.();
    slot.cancelTimer = null;
    slot.nextRunAtMs = null;
  }

  private scheduleNext(slot: AccountSlot, delayMs: number, state: 'idle' | 'backoff') {
    this.clearTimer(slot);
    slot.state = state;
    slot.nextRunAtMs = this.clock() + delayMs;
    slot.cancelTimer = this.timers.schedule(() => {
      slot.cancelTimer = null;
      if (this.isLive(slot) && (slot.state === 'idle' || slot.state === 'backoff')) {
        this.startRun(slot);
      }
    }, delayMs);
  }

  private startRun(slot: AccountSlot) {
    this.clearTimer(slot);
    slot.state = 'running';
    slot.rerun = false;
    const run: Promise<void> = this.runOnce(slot).finally(() => {
      if (slot.running === run) {
        slot.running = null;
      }
    });
    slot.running = run;
  }

  private async runOnce(slot: AccountSlot) {
    const shouldStop = () => !this.isLive(slot);
    try {
      const result = await this.options.runner.sync(slot.accountId, { shouldStop });
      if (!this.isLive(slot)) {
        return;
      }
      slot.lastResult = result;
      slot.failures = 0;
      slot.lastError = null;
      if (slot.rerun) {
        this.startRun(slot);
        return;
      }
      this.scheduleNext(slot, this.options.config.intervalMs, 'idle');
    } catch (error) {
      if (this.isLive(slot)) {
        this.onFailure(slot, toSyncError(error));
      }
    }
  }

  private onFailure(slot: AccountSlot, error: SyncError) {
    const { config } = this.options;
    slot.rerun = false;
    switch (error.kind) {
      case 'AlreadySyncing':
      case 'Cancelled':
        this.scheduleNext(slot, config.intervalMs, 'idle');
        return;
      case 'AuthExpired':
      case 'StorageCorruption':
        slot.lastError = { kind: error.kind, message: error.message };
        slot.state = 'paused';
        slot.pausedReason = error.kind === 'AuthExpired' ? 'auth' : 'corruption';
        console.warn(`[scheduler] pausing ${slot.accountId}: ${error.kind}: ${error.message}`);
        return;
      case 'NotFound':
        console.warn(`[scheduler] dropping ${slot.accountId}: ${error.message}`);
        this.slots.delete(slot.accountId);
        slot.state = 'stopped';
        return;
      default:
        break;
    }

    slot.failures += 1;
    slot.lastError = { kind: error.kind, message: error.message };
    let delay = computeBackoffDelay(
      slot.failures,
      { baseMs: config.backoffBaseMs, maxMs: config.backoffMaxMs, jitterRatio: config.jitterRatio },
      this.random,
    );
    if (error.kind === 'RateLimited' && error.retryAfterMs !== null) {
      delay = Math.max(delay, error.retryAfterMs);
    }
    if (slot.failures >= config.maxTransientFailures) {
      delay = Math.max(delay, config.extendedBackoffMs);
      this.options.events.emit({
        type: 'SyncDegraded',
        accountId: slot.accountId,
        failures: slot.failures,
        nextRetryMs: delay,
        at: new Date(this.clock()).toISOString(),
      });
    }
    console.warn(`[scheduler] ${slot.accountId} failed (${slot.failures}x, ${error.kind}); retrying in ${delay}ms`);
    this.scheduleNext(slot, delay, 'backoff');
  }
}
