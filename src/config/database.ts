import { Pool, PoolConfig } from 'pg';
import { config } from './index';
import { logger } from '../utils/logger';

/**
 * The slice of pg the store relies on. `Pool` and `PoolClient` satisfy it;
 * tests provide an in-process fake.
 */
export interface SqlResult {
    rows: unknown[];
    rowCount: number | null;
}

export interface SqlClient {
    query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
    release(): void;
}

export interface SqlPool extends SqlClient {
    connect(): Promise<SqlPoolClient>;
    end(): Promise<void>;
}

type EnsureConnectionOptions = {
    attempts?: number;
    baseDelayMs?: number;
};

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export const buildPoolConfig = (settings = config.database): PoolConfig => {
    const shared: PoolConfig = {
        ssl: settings.ssl ? { rejectUnauthorized: false } : false,
        connectionTimeoutMillis: settings.connectionTimeoutMs,
        max: 2
    };

    if (settings.url) {
        return { ...shared, connectionString: settings.url };
    }

    return {
        ...shared,
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database
    };
};

export const createPostgresPool = (poolConfig: PoolConfig = buildPoolConfig()): Pool => {
    const pool = new Pool(poolConfig);

    pool.on('error', (error: Error) => {
        logger.error('[Database] PostgreSQL pool reported an error', error);
    });

    return pool;
};

/**
 * Try a few times before giving up, so a database that is still starting
 * does not abort the session
 */
export const ensurePostgresConnection = async (pool: SqlClient, options: EnsureConnectionOptions = {}): Promise<void> => {
    const { attempts = 3, baseDelayMs = 300 } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
        try {
            await pool.query('SELECT 1;');
            if (attempt > 1) {
                logger.info(`[Database] Connected after ${attempt} attempts`);
            }
            return;
        } catch (error) {
            lastError = error;
            if (attempt < attempts) {
                const delay = baseDelayMs * 2 ** (attempt - 1);
                logger.warn(`[Database] Connection attempt ${attempt} failed, retrying in ${delay}ms`);
                await wait(delay);
            }
        }
    }

    throw lastError;
};
