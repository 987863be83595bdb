import { run } from 'graphile-worker';
import type { TaskList } from 'graphile-worker';
import { env } from '../config/env.js';
import { pool, query } from '../db/pool.js';
import { SchedulerSyncControl, SyncEngine } from '../services/engine.js';
import { SYNC_CONTROL_TASK } from '../services/queue.js';
import { PgSyncStorage } from '../storage/pgSyncStorage.js';
import { purgeSyncedChangesTask, pruneSyncEventsTask, syncControlTask } from './taskHandlers.js';
import type { TaskContext } from './taskHandlers.js';

const unlockStaleWorkerLocks = async () => {
  const relationCheck = await query<{ rel: string | null }>(
    "SELECT to_regclass('graphile_worker._private_jobs') AS rel",
  );
  if (!relationCheck.rows[0]?.rel) {
    return;
  }

  const staleWorkers = await query<{ locked_by: string }>(`
    SELECT DISTINCT locked_by
      FROM graphile_worker._private_jobs
     WHERE locked_by IS NOT NULL
       AND locked_at IS NOT NULL
       AND locked_at < NOW() - INTERVAL '5 minutes'
  `);

  const workerIds = staleWorkers.rows
    .map((row) => row.locked_by)
    .filter((value): value is string => Boolean(value));

  if (workerIds.length === 0) {
    return;
  }

  await query('SELECT graphile_worker.force_unlock_workers($1::text[])', [workerIds]);
  console.warn(`Unlocked ${workerIds.length} stale Graphile worker lock(s)`);
};

const startMaintenanceLoop = (engine: SyncEngine, storage: PgSyncStorage) => {
  let running = false;

  const runMaintenanceTick = async () => {
    if (running) {
      return;
    }
    running = true;
    try {
      const reaped = await storage.syncState.reapStaleClaims(env.sync.syncClaimStaleMs);
      if (reaped > 0) {
        console.info(`[maintenance] reaped stale sync claims: ${reaped}`);
      }
      await engine.refreshAccounts();
    } catch (error) {
      console.warn('[maintenance] tick failed', error);
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void runMaintenanceTick();
  }, env.sync.accountRefreshIntervalMs);
  timer.unref();

  return () => clearInterval(timer);
};

async function main() {
  const storage = new PgSyncStorage();
  const engine = new SyncEngine({ storage, config: env.sync });
  const context: TaskContext = {
    storage,
    control: new SchedulerSyncControl(engine),
    eventRetentionDays: env.sync.eventRetentionDays,
  };

  try {
    await unlockStaleWorkerLocks();
  } catch (error) {
    console.warn('Failed to unlock stale Graphile worker locks', error);
  }

  await storage.syncState.reapStaleClaims(env.sync.syncClaimStaleMs);
  await engine.start();
  const stopMaintenance = startMaintenanceLoop(engine, storage);

  const taskList: TaskList = {
    [SYNC_CONTROL_TASK]: (payload) => syncControlTask(context, payload),
    purgeSyncedChanges: () => purgeSyncedChangesTask(context),
    pruneSyncEvents: () => pruneSyncEventsTask(context),
  };

  const runner = await run({
    connectionString: env.databaseUrl,
    taskList,
    concurrency: 5,
    pollInterval: 1000,
    schema: 'graphile_worker',
    crontab: [
      '*/15 * * * * purgeSyncedChanges',
      '30 3 * * * pruneSyncEvents',
    ].join('\n'),
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.info(`[worker] ${signal} received; stopping`);
    stopMaintenance();
    await engine.stop();
    await runner.stop();
    await pool.end();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Worker shutdown failed', error);
          process.exit(1);
        });
    });
  }

  await runner.promise;
}

main().catch((err) => {
  console.error('Worker stopped with error', err);
  process.exit(1);
});
