import { Pool, PoolConfig } from 'pg';
import { DbConfig } from '../config';

export function createPool(config: DbConfig): Pool {
    const poolConfig: PoolConfig = {
        connectionString: config.connectionString,
        max: 5,                    // cache writes are small and infrequent
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    };

    const pool = new Pool(poolConfig);
    pool.on('error', (err) => {
        console.error('[db] Unexpected pool error:', err.message);
    });

    return pool;
}
export async function closePool(pool: Pool): Promise<void> {
    await pool.end();
}
