// src/config/database.ts
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { env } from './environment';
import logger from '@/utils/logger';

/** Anything that can run a parameterised query: the pool itself or a checked-out client. */
export type Queryable = Pick<PoolClient, 'query'>;

let pool: Pool | null = null;

// The pool is created on first use so that importing the app never opens a socket.
const getPool = (): Pool => {
    if (!pool) {
        pool = new Pool({
            connectionString: env.DATABASE_URL,
            max: env.DB_POOL_MAX,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 2000,
        });
        pool.on('error', (err: Error) => {
            logger.error('Unexpected database pool error', { error: err.message });
        });
    }
    return pool;
};

// Trim long statements before they reach the logs
const sanitizeQuery = (text: string): string =>
    text.replace(/\s+/g, ' ').trim().substring(0, 200) + (text.length > 200 ? '...' : '');

const query = async <T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
    client?: Queryable
): Promise<QueryResult<T>> => {
    const start = Date.now();
    try {
        const result = client
            ? await client.query<T>(text, params)
            : await getPool().query<T>(text, params);
        logger.debug('Database query executed', {
            duration: Date.now() - start,
            rowCount: result.rowCount,
            query: sanitizeQuery(text),
        });
        return result;
    } catch (error) {
        logger.error('Database query failed', {
            duration: Date.now() - start,
            error: error instanceof Error ? error.message : String(error),
            query: sanitizeQuery(text),
        });
        throw error;
    }
};

/**
 * Runs `callback` inside BEGIN/COMMIT on a dedicated client, rolling back when it throws.
 */
const transaction = async <T>(callback: (client: Queryable) => Promise<T>): Promise<T> => {
    const client = await getPool().connect();
    try {
        await client.query('BEGIN');
        const result = await callback(client);
        await client.query('COMMIT');
        return result;
    } catch (error) {
        await client.query('ROLLBACK');
        logger.warn('Transaction rolled back', {
            error: error instanceof Error ? error.message : String(error),
        });
        throw error;
    } finally {
        client.release();
    }
};

async function verifyConnection(): Promise<void> {
    const result = await getPool().query<{ now: Date }>('SELECT NOW() AS now');
    logger.info('✅ Database connection successful.', { connectedAt: result.rows[0]?.now });
}

async function close(): Promise<void> {
    if (pool) {
        await pool.end();
        pool = null;
        logger.info('Database pool closed');
    }
}

export const db = {
    query,
    transaction,
    verifyConnection,
    close,
};
