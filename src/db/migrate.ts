import { loadConfig } from '../config';
import { createPool, closePool } from './pool';

const MIGRATIONS = [
    {
        name: '001_create_geocode_cache',
        sql: `
      CREATE TABLE IF NOT EXISTS geocode_cache (
        address     TEXT PRIMARY KEY,
        latitude    DOUBLE PRECISION,
        longitude   DOUBLE PRECISION,
        found       BOOLEAN NOT NULL DEFAULT TRUE,
        updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `,
    },
];

async function runMigrations() {
    const config = loadConfig();
    if (!config.db) {
        console.error('[migrate] DATABASE_URL is not set; nothing to migrate.');
        process.exit(1);
    }
    const pool = createPool(config.db);

    console.log('[migrate] Running database migrations...');

    for (const migration of MIGRATIONS) {
        try {
            await pool.query(migration.sql);
            console.log(`[migrate] ✓ ${migration.name}`);
        } catch (err) {
            console.error(`[migrate] ✗ ${migration.name} failed:`, err);
            process.exit(1);
        }
    }

    console.log('[migrate] All migrations complete.');
    await closePool(pool);
}
runMigrations().catch((err) => {
    console.error('[migrate] Fatal error:', err);
    process.exit(1);
});
