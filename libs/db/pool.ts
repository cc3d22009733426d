import pg from 'pg';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import type { AccessConfig } from '../bootstrap/config.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

/**
 * PostgreSQL pool for the audit trail. The guard runs first, so a missing
 * connection parameter fails startup instead of the first write.
 */
export function createPool(config: AccessConfig, env: NodeJS.ProcessEnv = process.env): pg.Pool {
    ConfigGuard.enforce(DB_CONFIG_GUARDS, env);

    const isProtectedEnv = config.NODE_ENV === 'production' || config.NODE_ENV === 'staging';
    const useTls = isProtectedEnv || config.DB_SSL_QUERY;

    return new Pool({
        host: config.DB_HOST,
        port: config.DB_PORT,
        user: config.DB_USER,
        password: config.DB_PASSWORD,
        database: config.DB_NAME,
        max: config.DB_POOL_MAX,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: useTls
            ? {
                rejectUnauthorized: true,
                ca: config.DB_CA_CERT,
            }
            : false
    });
}
