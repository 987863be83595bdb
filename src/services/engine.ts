import type { SyncConfig } from '../config/env.js';
import type { SyncStorage } from '../storage/syncStorage.js';
import { ChangeLog } from './changeLog.js';
import type { ConflictPolicy } from './conflictResolver.js';
import { LocalActions } from './localActions.js';
import { ProviderRegistry, createProviderAdapter } from './providers/registry.js';
import type { ProviderDeps } from './providers/registry.js';
import { Reconciler } from './reconciler.js';
import { Scheduler } from './scheduler.js';
import type { SchedulerTimers } from './scheduler.js';
import type { SyncControl, SyncControlOutcome } from './syncControl.js';
import { SyncEventBus, persistSyncEvents } from './syncEvents.js';

export interface SyncEngineOptions {
  storage: SyncStorage;
  config: SyncConfig;
  policy?: ConflictPolicy;
  providers?: Partial<Pick<ProviderDeps, 'fetchImpl' | 'refreshToken' | 'connectImap' | 'sendSmtp'>>;
  registry?: ProviderRegistry;
  timers?: SchedulerTimers;
  random?: () => number;
  clock?: () => number;
}

/** Wires storage, providers, reconciler and scheduler for one process. */
export class SyncEngine {
  readonly events = new SyncEventBus();
  readonly registry: ProviderRegistry;
  readonly reconciler: Reconciler;
  readonly scheduler: Scheduler;
  readonly changeLog: ChangeLog;
  readonly actions: LocalActions;
  private persisted: ReturnType<typeof persistSyncEvents> | null = null;

  constructor(private readonly options: SyncEngineOptions) {
    const { storage, config } = options;
    this.registry = options.registry ?? new ProviderRegistry((account) => createProviderAdapter(account, {
      config,
      saveCredential: (accountId, credential) => storage.accounts.saveCredential(accountId, credential),
      ...options.providers,
    }));
    this.reconciler = new Reconciler({
      storage,
      adapters: this.registry,
      events: this.events,
      config,
      policy: options.policy,
      clock: options.clock,
    });
    this.scheduler = new Scheduler({
      runner: this.reconciler,
      syncState: storage.syncState,
      events: this.events,
      config,
      timers: options.timers,
      random: options.random,
      clock: options.clock,
    });
    this.changeLog = new ChangeLog(storage.changeLog);
    this.actions = new LocalActions(storage, options.clock);
  }

  async start() {
    if (!this.persisted) {
      this.persisted = persistSyncEvents(this.events, this.options.storage.events);
    }
    await this.refreshAccounts();
  }

  /** Brings the scheduled account set in line with the enabled accounts in storage. */
  async refreshAccounts() {
    const accounts = (await this.options.storage.accounts.list()).filter((account) => account.syncEnabled);
    const enabled = new Set(accounts.map((account) => account.id));

    for (const accountId of this.scheduler.accountIds()) {
      if (!enabled.has(accountId)) {
        console.info(`[engine] removing account ${accountId}`);
        await this.scheduler.removeAccount(accountId);
        this.registry.remove(accountId);
      }
    }
    for (const account of accounts) {
      if (!this.scheduler.hasAccount(account.id)) {
        console.info(`[engine] adding ${account.kind} account ${account.id}`);
        this.registry.register(account);
        this.scheduler.addAccount(account.id);
      }
    }
    return { active: enabled.size };
  }

  async stop() {
    await this.scheduler.stop();
    if (this.persisted) {
      this.persisted.unsubscribe();
      await this.persisted.flush();
      this.persisted = null;
    }
  }
}

export class SchedulerSyncControl implements SyncControl {
  constructor(private readonly engine: SyncEngine) {}

  private async ensureKnown(accountId: string) {
    if (!this.engine.scheduler.hasAccount(accountId)) {
      await this.engine.refreshAccounts();
    }
  }

  async trigger(accountId: string): Promise<SyncControlOutcome> {
    await this.ensureKnown(accountId);
    return this.engine.scheduler.requestSync(accountId);
  }

  async resume(accountId: string): Promise<SyncControlOutcome> {
    await this.ensureKnown(accountId);
    return this.engine.scheduler.resumeAccount(accountId) ? 'started' : 'ignored';
  }

  async requestFullResync(accountId: string): Promise<SyncControlOutcome> {
    await this.ensureKnown(accountId);
    return this.engine.scheduler.requestFullResync(accountId);
  }
}
