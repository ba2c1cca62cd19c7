import { Logger } from '@nestjs/common';
import { readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { Pool } from 'pg';

/**
 * Applies `api/db/migrations/*.sql` in file-name order, each in its own
 * transaction, and records applied names in `schema_migrations`.
 */
const MIGRATIONS_DIR = join(__dirname, '..', '..', 'db', 'migrations');
const logger = new Logger('Migrate');

async function run() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) throw new Error('[ENV] DATABASE_URL not configured');
  const pool = new Pool({ connectionString, max: 1 });
  try {
    await pool.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name varchar(200) PRIMARY KEY,
         applied_at timestamptz NOT NULL DEFAULT now()
       )`,
    );
    const applied = await pool.query<{ name: string }>(
      'SELECT name FROM schema_migrations',
    );
    const done = new Set(applied.rows.map((row) => row.name));
    const files = readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort();
    for (const file of files) {
      if (done.has(file)) continue;
      const sqlText = readFileSync(join(MIGRATIONS_DIR, file), 'utf8');
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(sqlText);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [
          file,
        ]);
        await client.query('COMMIT');
        logger.log(`applied ${file}`);
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      } finally {
        client.release();
      }
    }
    logger.log('Database migrations applied successfully.');
  } finally {
    await pool.end();
  }
}

run().catch((err: unknown) => {
  logger.error(
    `Migration failed: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`,
  );
  process.exit(1);
});
