import { migrateAll } from '../src/db/migrations.js';
import { pool } from '../src/db/pool.js';

migrateAll()
  .then(async () => {
    await pool.end();
  })
  .catch((error: unknown) => {
    console.error('[migrate] failed', error);
    process.exit(1);
  });
