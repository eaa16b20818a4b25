/**
 * pg-geopoint - Connection Pool
 *
 * Thin lifecycle wrapper around `pg.Pool`: connection probe on startup,
 * event logging, health checks, statistics, transactions and graceful
 * shutdown.
 */

import pg from 'pg';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { ConnectionUnavailableError } from '../types/index.js';
import type { ConnectionConfig, HealthStatus, PoolStats } from '../types/index.js';
import { mapPgError } from '../utils/pgErrors.js';
import { logger } from '../utils/logger.js';

export interface ConnectionPoolOptions {
    connectionTimeoutMillis?: number;
    idleTimeoutMillis?: number;
}

export class ConnectionPool {
    private pool: Pool | null = null;
    private shuttingDown = false;
    private totalQueries = 0;

    constructor(
        private readonly config: ConnectionConfig,
        private readonly options: ConnectionPoolOptions = {}
    ) {}

    /**
     * Create the pg pool and prove it can reach the database
     */
    async initialize(): Promise<void> {
        if (this.pool) {
            logger.warn('Connection pool already initialized');
            return;
        }

        this.shuttingDown = false;
        const pool = new pg.Pool({
            host: this.config.host,
            port: this.config.port,
            user: this.config.user,
            password: this.config.password,
            database: this.config.dbname,
            max: this.config.poolMax,
            connectionTimeoutMillis: this.options.connectionTimeoutMillis ?? 10000,
            idleTimeoutMillis: this.options.idleTimeoutMillis ?? 30000
        });
        this.registerEventHandlers(pool);

        let client: PoolClient | undefined;
        try {
            client = await pool.connect();
            const result = await client.query<{ version: string }>('SELECT version() AS version');
            logger.info('Connected to PostgreSQL', {
                host: this.config.host,
                port: this.config.port,
                database: this.config.dbname,
                version: result.rows[0]?.version
            });
            client.release();
        } catch (error) {
            client?.release();
            await pool.end().catch((endError: unknown) => {
                logger.debug('Error closing pool after failed connect', { error: endError });
            });
            const mapped = mapPgError(error);
            if (mapped instanceof ConnectionUnavailableError) {
                throw mapped;
            }
            throw new ConnectionUnavailableError(
                `Cannot connect to ${this.config.host}:${String(this.config.port)}/${this.config.dbname}`,
                { error: error instanceof Error ? error.message : String(error) },
                { cause: error }
            );
        }

        this.pool = pool;
    }

    private registerEventHandlers(pool: Pool): void {
        pool.on('connect', () => {
            logger.debug('Pool client connected');
        });
        pool.on('acquire', () => {
            logger.debug('Pool client acquired');
        });
        pool.on('release', () => {
            logger.debug('Pool client released');
        });
        pool.on('remove', () => {
            logger.debug('Pool client removed');
        });
        pool.on('error', (error: Error) => {
            logger.error('Idle pool client error', { error: error.message });
        });
    }

    isInitialized(): boolean {
        return this.pool !== null;
    }

    isClosing(): boolean {
        return this.shuttingDown;
    }

    private requirePool(): Pool {
        if (this.shuttingDown && this.pool) {
            throw new ConnectionUnavailableError('Connection pool is shutting down');
        }
        if (!this.pool) {
            throw new ConnectionUnavailableError('Connection pool not initialized');
        }
        return this.pool;
    }

    async query<R extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<QueryResult<R>> {
        const pool = this.requirePool();
        this.totalQueries++;
        return pool.query<R>(sql, params);
    }

    async getConnection(): Promise<PoolClient> {
        const pool = this.requirePool();
        return pool.connect();
    }

    releaseConnection(client: PoolClient): void {
        client.release();
    }

    /**
     * Run `work` between BEGIN and COMMIT on one client. Any failure rolls
     * back and is rethrown.
     */
    async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.getConnection();
        try {
            await client.query('BEGIN');
            this.totalQueries++;
            const result = await work(client);
            await client.query('COMMIT');
            this.totalQueries++;
            return result;
        } catch (error) {
            await client.query('ROLLBACK').catch((rollbackError: unknown) => {
                logger.error('Rollback failed', { error: rollbackError });
            });
            throw error;
        } finally {
            this.releaseConnection(client);
        }
    }

    async checkHealth(): Promise<HealthStatus> {
        if (this.shuttingDown) {
            return { connected: false, error: 'Pool is shutting down' };
        }
        if (!this.pool) {
            return { connected: false, error: 'Pool not initialized' };
        }

        const started = Date.now();
        try {
            const result = await this.pool.query<{ version: string }>('SELECT version() AS version');
            return {
                connected: true,
                latencyMs: Date.now() - started,
                version: result.rows[0]?.version,
                poolStats: this.getStats()
            };
        } catch (error) {
            return {
                connected: false,
                latencyMs: Date.now() - started,
                error: error instanceof Error ? error.message : String(error)
            };
        }
    }

    getStats(): PoolStats {
        const total = this.pool?.totalCount ?? 0;
        const idle = this.pool?.idleCount ?? 0;
        return {
            total,
            active: total - idle,
            idle,
            waiting: this.pool?.waitingCount ?? 0,
            totalQueries: this.totalQueries
        };
    }

    async shutdown(): Promise<void> {
        if (!this.pool) {
            return;
        }
        this.shuttingDown = true;
        logger.info('Shutting down connection pool', { ...this.getStats() });

        const pool = this.pool;
        this.pool = null;
        await pool.end();
        logger.info('Connection pool closed');
    }
}
