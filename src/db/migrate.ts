import { Pool } from 'pg';
import { loadConfig } from '../config';
import { createPool, closePool } from './pool';

const MIGRATIONS = [
    {
        name: '001_create_calculation_history',
        sql: `
      CREATE TABLE IF NOT EXISTS calculation_history (
        id                  SERIAL PRIMARY KEY,
        link                TEXT NOT NULL,
        item_name           TEXT,
        shipping_method     VARCHAR(32) NOT NULL,
        destination_address TEXT NOT NULL,
        destination_zip     VARCHAR(20) NOT NULL,
        total_jpy           INTEGER NOT NULL,
        total_usd           DECIMAL(10, 2) NOT NULL,
        exchange_rate       DECIMAL(12, 8) NOT NULL,
        breakdown           JSONB NOT NULL,
        created_at          TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_calculation_history_created_at
        ON calculation_history(created_at DESC);
    `,
    },
    {
        name: '002_create_saved_addresses',
        sql: `
      CREATE TABLE IF NOT EXISTS saved_addresses (
        id         SERIAL PRIMARY KEY,
        name       VARCHAR(64),
        address    TEXT NOT NULL,
        zip_code   VARCHAR(20) NOT NULL,
        use_count  INTEGER NOT NULL DEFAULT 1,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        last_used  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE (address, zip_code)
      );
    `,
    },
];

// Applied migrations are recorded so each one runs once per database.
const LEDGER_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    name       VARCHAR(128) PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

export async function applyMigrations(pool: Pool): Promise<string[]> {
    await pool.query(LEDGER_SQL);
    const { rows } = await pool.query('SELECT name FROM schema_migrations');
    const done = new Set(rows.map(row => String(row.name)));

    const applied: string[] = [];
    for (const migration of MIGRATIONS) {
        if (done.has(migration.name)) continue;
        const client = await pool.connect();
        try {
            await client.query('BEGIN');
            await client.query(migration.sql);
            await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name]);
            await client.query('COMMIT');
            applied.push(migration.name);
            console.log(`[migrate] applied ${migration.name}`);
        } catch (err) {
            await client.query('ROLLBACK');
            throw err;
        } finally {
            client.release();
        }
    }
    return applied;
}

async function main(): Promise<void> {
    const pool = createPool(loadConfig().db);
    try {
        const applied = await applyMigrations(pool);
        console.log(applied.length > 0 ? `[migrate] ${applied.length} migration(s) applied` : '[migrate] Already up to date');
    } finally {
        await closePool(pool);
    }
}

if (require.main === module) {
    main().catch((err) => {
        console.error('[migrate] Failed:', err instanceof Error ? err.message : err);
        process.exit(1);
    });
}
