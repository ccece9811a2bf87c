/**
 * Applies pending migrations to the MySQL key-value tables.
 *
 * Usage: npm run migrate -w @discharge/backend
 */
import { fileURLToPath } from 'node:url';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createDb } from './connection.js';

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel).child({ component: 'migrate' });
  const db = createDb(config.db);

  try {
    const [batch, applied]: [number, string[]] = await db.migrate.latest({
      directory: MIGRATIONS_DIR,
      loadExtensions: ['.ts'],
      tableName: 'knex_migrations',
    });
    logger.info({ batch, applied }, applied.length ? 'Migrations applied' : 'Schema already up to date');
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  console.error('Migration failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
