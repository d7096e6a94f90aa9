import { Pool } from 'pg';
import { DbConfig } from '../config';

// History is a side feature; a small pool that gives up quickly is plenty.
export function createPool(config: DbConfig): Pool {
    const pool = new Pool({
        connectionString: config.connectionString,
        application_name: 'proxy-landed-cost',
        max: 4,
        idleTimeoutMillis: 10000,
        connectionTimeoutMillis: 3000,
    });
    pool.on('error', (err) => {
        console.error('[db] Idle client error:', err.message);
    });
    return pool;
}

export async function closePool(pool: Pool): Promise<void> {
    await pool.end();
    console.log('[db] Pool closed');
}
