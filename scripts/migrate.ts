import fs from 'fs';
import path from 'path';
import { getPool, closePool } from '../src/config/database';
import { logger } from '../src/config/logger';

/**
 * Apply every migrations/*.sql file not yet recorded in schema_migrations,
 * in file name order, each inside its own transaction.
 */
const migrationsDir = path.join(__dirname, '../migrations');

async function migrate(): Promise<void> {
  const pool = getPool();
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  const { rows } = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
  const applied = new Set(rows.map((row) => row.name));
  const pending = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  if (pending.length === 0) {
    console.log('✅ Database is up to date');
    return;
  }

  for (const file of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
      console.log(`✅ Applied ${file}`);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}

migrate()
  .then(() => closePool())
  .catch(async (error: unknown) => {
    logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
    await closePool();
    process.exitCode = 1;
  });
