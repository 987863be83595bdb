import assert from 'node:assert/strict';
import type { SyncRunResult } from '../../shared/types.js';
import type { SyncRunOptions } from '../reconciler.js';
import { Scheduler } from '../scheduler.js';
import type { SchedulerConfig, SchedulerTimers, SyncRunner } from '../scheduler.js';
import { SyncError } from '../syncErrors.js';
import { SyncEventBus } from '../syncEvents.js';
import type { SyncEvent } from '../syncEvents.js';
import { FIXED_NOW } from './fixtures.js';

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

const ACCOUNT = 'acct-history';

const config: SchedulerConfig = {
  intervalMs: 60_000,
  syncOnStart: true,
  backoffBaseMs: 1_000,
  backoffMaxMs: 30_000,
  extendedBackoffMs: 600_000,
  jitterRatio: 0.2,
  maxTransientFailures: 3,
};

const okResult = (accountId: string): SyncRunResult => ({
  accountId,
  receivedCount: 0,
  pushedCount: 0,
  failedCount: 0,
  conflictCount: 0,
  fullResync: false,
  blocked: false,
  cancelled: false,
  cursor: null,
  durationMs: 5,
});

type RunStep = () => Promise<SyncRunResult>;

class ScriptedRunner implements SyncRunner {
  readonly calls: Array<{ accountId: string; options: SyncRunOptions }> = [];
  private readonly steps: RunStep[] = [];

  queue(step: RunStep) {
    this.steps.push(step);
  }

  queueFailure(error: SyncError) {
    this.steps.push(async () => {
      throw error;
    });
  }

  async sync(accountId: string, options: SyncRunOptions) {
    this.calls.push({ accountId, options });
    const step = this.steps.shift();
    return step ? step() : okResult(accountId);
  }
}

interface ManualTimer {
  callback: () => void;
  delayMs: number;
  cancelled: boolean;
}

class ManualTimers implements SchedulerTimers {
  readonly created: ManualTimer[] = [];

  schedule(callback: () => void, delayMs: number) {
    const timer: ManualTimer = { callback, delayMs, cancelled: false };
    this.created.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }

  active() {
    return this.created.filter((timer) => !timer.cancelled);
  }

  fireActive() {
    const [timer, ...rest] = this.active();
    if (!timer || rest.length > 0) {
      throw new Error(`expected exactly one active timer, found ${this.active().length}`);
    }
    timer.cancelled = true;
    timer.callback();
  }
}

const deferred = () => {
  let resolve = (_value: SyncRunResult) => {};
  const promise = new Promise<SyncRunResult>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

const setup = (overrides: Partial<SchedulerConfig> = {}) => {
  const runner = new ScriptedRunner();
  const timers = new ManualTimers();
  const events = new SyncEventBus();
  const seen: SyncEvent[] = [];
  events.subscribe((event) => seen.push(event));
  const fullResyncRequests: string[] = [];
  const scheduler = new Scheduler({
    runner,
    syncState: {
      requestFullResync: async (accountId: string) => {
        fullResyncRequests.push(accountId);
      },
    },
    events,
    config: { ...config, ...overrides },
    timers,
    random: () => 0,
    clock: () => FIXED_NOW,
  });
  return { runner, timers, seen, scheduler, fullResyncRequests };
};

const networkError = () => new SyncError('NetworkError', 'connection reset');

await test('a successful run schedules the next one a full interval later', async () => {
  const { runner, timers, scheduler } = setup();
  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);

  assert.equal(runner.calls.length, 1);
  const status = scheduler.getStatus(ACCOUNT);
  assert.equal(status?.state, 'idle');
  assert.equal(status?.nextRunAt, '2026-03-01T10:01:00.000Z');
  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [60_000]);
  assert.equal(status?.lastResult?.durationMs, 5);
});

await test('without syncOnStart the first run waits for the interval timer', async () => {
  const { runner, timers, scheduler } = setup({ syncOnStart: false });
  scheduler.addAccount(ACCOUNT);
  assert.equal(runner.calls.length, 0);
  assert.equal(scheduler.getStatus(ACCOUNT)?.state, 'idle');

  timers.fireActive();
  await scheduler.whenSettled(ACCOUNT);
  assert.equal(runner.calls.length, 1);
});

await test('network failures back off exponentially and a manual trigger resets the count', async () => {
  const { runner, timers, scheduler } = setup();
  runner.queueFailure(networkError());
  runner.queueFailure(networkError());

  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);
  let status = scheduler.getStatus(ACCOUNT);
  assert.equal(status?.state, 'backoff');
  assert.equal(status?.consecutiveFailures, 1);
  assert.deepEqual(status?.lastError, { kind: 'NetworkError', message: 'connection reset' });
  assert.equal(status?.nextRunAt, '2026-03-01T10:00:02.000Z');
  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [2_000]);

  timers.fireActive();
  await scheduler.whenSettled(ACCOUNT);
  assert.equal(scheduler.getStatus(ACCOUNT)?.consecutiveFailures, 2);
  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [4_000]);

  assert.equal(scheduler.requestSync(ACCOUNT), 'started');
  await scheduler.whenSettled(ACCOUNT);
  status = scheduler.getStatus(ACCOUNT);
  assert.equal(runner.calls.length, 3);
  assert.equal(status?.state, 'idle');
  assert.equal(status?.consecutiveFailures, 0);
  assert.equal(status?.lastError, null);
  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [60_000]);
});

await test('backoff is capped and jitter stays within the configured ratio', async () => {
  const runner = new ScriptedRunner();
  const timers = new ManualTimers();
  const scheduler = new Scheduler({
    runner,
    syncState: { requestFullResync: async () => undefined },
    events: new SyncEventBus(),
    config: { ...config, backoffMaxMs: 3_000, maxTransientFailures: 10 },
    timers,
    random: () => 0.5,
    clock: () => FIXED_NOW,
  });
  runner.queueFailure(networkError());
  runner.queueFailure(networkError());
  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);
  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [2_200]);

  timers.fireActive();
  await scheduler.whenSettled(ACCOUNT);
  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [3_300]);
});

await test('a rate limit waits at least as long as the provider asked', async () => {
  const { runner, timers, scheduler } = setup();
  runner.queueFailure(new SyncError('RateLimited', 'slow down', { retryAfterMs: 45_000 }));
  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);

  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [45_000]);
});

await test('triggers during a run coalesce into one follow-up run', async () => {
  const { runner, scheduler } = setup();
  const gate = deferred();
  runner.queue(() => gate.promise);

  scheduler.addAccount(ACCOUNT);
  assert.equal(scheduler.getStatus(ACCOUNT)?.state, 'running');
  assert.equal(scheduler.requestSync(ACCOUNT), 'coalesced');
  assert.equal(scheduler.requestSync(ACCOUNT), 'coalesced');

  gate.resolve(okResult(ACCOUNT));
  await scheduler.whenSettled(ACCOUNT);

  assert.equal(runner.calls.length, 2);
  assert.equal(scheduler.getStatus(ACCOUNT)?.state, 'idle');
});

await test('an expired credential pauses the account until it is resumed', async () => {
  const { runner, timers, scheduler } = setup();
  runner.queueFailure(new SyncError('AuthExpired', 'invalid_grant'));
  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);

  const status = scheduler.getStatus(ACCOUNT);
  assert.equal(status?.state, 'paused');
  assert.equal(status?.pausedReason, 'auth');
  assert.equal(status?.consecutiveFailures, 0);
  assert.deepEqual(timers.active(), []);
  assert.equal(scheduler.requestSync(ACCOUNT), 'ignored');
  assert.equal(runner.calls.length, 1);

  assert.equal(scheduler.resumeAccount(ACCOUNT), true);
  await scheduler.whenSettled(ACCOUNT);
  assert.equal(runner.calls.length, 2);
  assert.equal(scheduler.getStatus(ACCOUNT)?.state, 'idle');
  assert.equal(scheduler.getStatus(ACCOUNT)?.pausedReason, null);
  assert.equal(scheduler.resumeAccount(ACCOUNT), false);
});

await test('repeated transient failures switch to the extended backoff and report degradation', async () => {
  const { runner, timers, seen, scheduler } = setup();
  runner.queueFailure(networkError());
  runner.queueFailure(networkError());
  runner.queueFailure(networkError());

  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);
  timers.fireActive();
  await scheduler.whenSettled(ACCOUNT);
  assert.deepEqual(seen, []);
  timers.fireActive();
  await scheduler.whenSettled(ACCOUNT);

  assert.equal(scheduler.getStatus(ACCOUNT)?.consecutiveFailures, 3);
  assert.deepEqual(timers.active().map((timer) => timer.delayMs), [600_000]);
  assert.deepEqual(seen, [{
    type: 'SyncDegraded',
    accountId: ACCOUNT,
    failures: 3,
    nextRetryMs: 600_000,
    at: '2026-03-01T10:00:00.000Z',
  }]);
});

await test('an account that no longer exists is dropped from the schedule', async () => {
  const { runner, timers, scheduler } = setup();
  runner.queueFailure(new SyncError('NotFound', 'account acct-history not found'));
  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);

  assert.equal(scheduler.hasAccount(ACCOUNT), false);
  assert.deepEqual(timers.active(), []);
  assert.equal(scheduler.requestSync(ACCOUNT), 'ignored');
});

await test('a full resync request on a paused account resumes it', async () => {
  const { runner, scheduler, fullResyncRequests } = setup();
  runner.queueFailure(new SyncError('StorageCorruption', 'stored cursor for acct-history is unreadable'));
  scheduler.addAccount(ACCOUNT);
  await scheduler.whenSettled(ACCOUNT);
  assert.equal(scheduler.getStatus(ACCOUNT)?.pausedReason, 'corruption');

  assert.equal(await scheduler.requestFullResync(ACCOUNT), 'started');
  await scheduler.whenSettled(ACCOUNT);

  assert.deepEqual(fullResyncRequests, [ACCOUNT]);
  assert.equal(runner.calls.length, 2);
  assert.equal(scheduler.getStatus(ACCOUNT)?.state, 'idle');
});

await test('stop waits for the run in flight and asks it to stop', async () => {
  const { runner, timers, scheduler } = setup();
  const gate = deferred();
  runner.queue(() => gate.promise);
  scheduler.addAccount(ACCOUNT);

  let stopped = false;
  const stopping = scheduler.stop().then(() => {
    stopped = true;
  });
  await new Promise<void>((resolve) => setImmediate(resolve));
  assert.equal(stopped, false);
  assert.equal(runner.calls[0]?.options.shouldStop?.(), true);

  gate.resolve(okResult(ACCOUNT));
  await stopping;

  assert.equal(scheduler.getStatus(ACCOUNT)?.state, 'stopped');
  assert.deepEqual(timers.active(), []);
  assert.equal(scheduler.requestSync(ACCOUNT), 'ignored');
});

await test('removing an account stops its timer', async () => {
  const { timers, scheduler } = setup({ syncOnStart: false });
  scheduler.addAccount(ACCOUNT);
  scheduler.addAccount(ACCOUNT);
  assert.deepEqual(scheduler.accountIds(), [ACCOUNT]);

  await scheduler.removeAccount(ACCOUNT);
  assert.deepEqual(timers.active(), []);
  assert.equal(scheduler.getStatus(ACCOUNT), null);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
