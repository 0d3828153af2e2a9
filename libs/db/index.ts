import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { assertDbRole, DB_ROLES, type DbRole } from './roles.js';

const { Pool } = pg;

function requireEnv(name: string): string {
    const value = process.env[name];
    if (value === undefined || value.trim() === '') {
        throw new Error(`CRITICAL: ${name} is not configured`);
    }
    return value;
}

let pool: pg.Pool | null = null;

/**
 * The pool is built on first use so that importing the ledger (or its types) never
 * touches the environment. Configuration is enforced at that moment.
 */
function getPool(): pg.Pool {
    if (pool) return pool;

    ConfigGuard.enforce(DB_CONFIG_GUARDS);

    const isProtectedEnv = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'staging';
    if (isProtectedEnv && process.env.DB_SSL_QUERY === 'false') {
        throw new Error("CRITICAL: DB_SSL_QUERY=false is forbidden in production/staging.");
    }

    const poolMax = process.env.DB_POOL_MAX ? parseInt(process.env.DB_POOL_MAX, 10) : 10;
    const useTls = isProtectedEnv || process.env.DB_SSL_QUERY === 'true';

    pool = new Pool({
        host: requireEnv('DB_HOST'),
        port: parseInt(requireEnv('DB_PORT'), 10),
        user: requireEnv('DB_USER'),
        password: requireEnv('DB_PASSWORD'),
        database: requireEnv('DB_NAME'),
        max: Number.isFinite(poolMax) ? poolMax : 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: useTls ? { rejectUnauthorized: true, ca: process.env.DB_CA_CERT } : false
    });
    pool.on('error', error => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });
    return pool;
}

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function quoteIdentifier(identifier: string): string {
    const escaped = identifier.replace(/"/g, '""');
    return `"${escaped}"`;
}

async function verifyRole(client: pg.PoolClient, role: DbRole): Promise<void> {
    const roleCheck = await client.query<{ current_user: string }>('SELECT current_user');
    const currentUser = roleCheck.rows[0]?.current_user;
    if (currentUser !== role) {
        throw new Error(`CRITICAL: Role enforcement failure. Target: ${role}, Actual: ${currentUser}`);
    }
}

async function resetRole(client: pg.PoolClient, context: string): Promise<boolean> {
    try {
        await client.query('RESET ROLE');
        return true;
    } catch (error) {
        logger.warn({ error }, `[DB] Failed to reset role during ${context}`);
        return false;
    }
}

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

async function runTransaction<T>(
    client: pg.PoolClient,
    role: DbRole,
    callback: (tx: TxClient) => Promise<T>
): Promise<{ result: T } | { error: unknown; taint: boolean }> {
    if (transactionContext.getStore()?.inTx) {
        throw new Error('Nested transaction detected: transactionAsRole cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        let commitAttempted = false;
        try {
            await client.query('BEGIN');
            await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
            await verifyRole(client, role);

            const txClient: TxClient = {
                query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<R>(text, params)
            };

            const result = await callback(txClient);
            commitAttempted = true;
            await client.query('COMMIT');
            return { result };
        } catch (error) {
            let rollbackFailed = false;
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                rollbackFailed = true;
                logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            return { error, taint: commitAttempted || rollbackFailed };
        }
    });
}

export const db = {
    /**
     * Role is applied per call, never globally.
     */
    queryAsRole: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
        role: DbRole,
        text: string,
        params?: unknown[]
    ): Promise<pg.QueryResult<T>> => {
        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        try {
            await client.query(`SET ROLE ${quoteIdentifier(validatedRole)}`);
            await verifyRole(client, validatedRole);
            return await client.query<T>(text, params);
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryAsRoleFailure');
        } finally {
            const resetOk = await resetRole(client, 'queryAsRole');
            releaseClient(client, !resetOk, 'queryAsRole');
        }
    },

    /**
     * Executes a callback within a managed transaction; rolls back on any error.
     * Errors thrown by the callback itself are rethrown as-is so callers keep their type.
     */
    transactionAsRole: async <T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> => {
        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        let forceDestroy = false;
        try {
            const outcome = await runTransaction(client, validatedRole, callback);
            if ('error' in outcome) {
                forceDestroy = outcome.taint;
                throw outcome.error;
            }
            return outcome.result;
        } finally {
            const resetOk = await resetRole(client, 'transactionAsRole');
            releaseClient(client, forceDestroy || !resetOk, 'transactionAsRole');
        }
    },

    /**
     * Boot-time probe that DB_USER can SET ROLE into each required role.
     */
    probeRoles: async (): Promise<void> => {
        const client = await getPool().connect();
        try {
            for (const role of DB_ROLES) {
                await client.query('BEGIN');
                try {
                    await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
                    await verifyRole(client, role);
                    await client.query('ROLLBACK');
                } catch (error) {
                    try {
                        await client.query('ROLLBACK');
                    } catch (rollbackError) {
                        logger.error({ error: rollbackError }, '[DB] Failed to rollback role probe');
                    }
                    throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:ProbeRolesFailure');
                }
            }
        } finally {
            releaseClient(client, false, 'probeRoles');
        }
    },

    close: async (): Promise<void> => {
        if (pool) {
            const closing = pool;
            pool = null;
            await closing.end();
        }
    }
};

export type DbClient = Pick<typeof db, 'queryAsRole' | 'transactionAsRole'>;

export type { DbRole };
