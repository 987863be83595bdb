import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { runMigrations } from 'graphile-worker';
import { env } from '../config/env.js';
import { query, withTransaction } from './pool.js';

export interface SqlMigration {
  name: string;
  sql: string;
}

export const readSqlMigrations = (dir = path.resolve(process.cwd(), 'migrations')): SqlMigration[] =>
  readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, sql: readFileSync(path.join(dir, name), 'utf8') }));

/**
 * Applies the files not yet listed in `schema_migrations`, in name order. Each file and its
 * bookkeeping row commit together, so a failed file is retried on the next run.
 */
export const applySqlMigrations = async (migrations: SqlMigration[]): Promise<string[]> => {
  await query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`,
  );
  const { rows } = await query<{ name: string }>('SELECT name FROM schema_migrations');
  const done = new Set(rows.map((row) => row.name));

  const applied: string[] = [];
  for (const migration of migrations) {
    if (done.has(migration.name)) {
      continue;
    }
    await withTransaction(async (client) => {
      await client.query(migration.sql);
      await query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name], client);
    });
    console.info(`[migrate] applied ${migration.name}`);
    applied.push(migration.name);
  }
  return applied;
};

/** Project schema first, then the job queue's own schema. */
export const migrateAll = async (migrations = readSqlMigrations()) => {
  const applied = await applySqlMigrations(migrations);
  if (applied.length === 0) {
    console.info('[migrate] project schema is up to date');
  }
  await runMigrations({ connectionString: env.databaseUrl });
  console.info('[migrate] job queue schema is up to date');
  return applied;
};
