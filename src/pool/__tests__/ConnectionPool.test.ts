/**
 * Unit tests for Connection Pool
 *
 * Tests the connection probe, health monitoring, transactions and graceful
 * shutdown against a mocked pg module.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConnectionUnavailableError } from '../../types/index.js';

// Create mock functions that we can reference
const mockClientQuery = vi.fn();
const mockClientRelease = vi.fn();

const mockPoolConnect = vi.fn();
const mockPoolQuery = vi.fn();
const mockPoolEnd = vi.fn();
const mockPoolOn = vi.fn();
const mockPoolConstructor = vi.fn();

// Track pool counts
let mockTotalCount = 5;
let mockIdleCount = 3;
let mockWaitingCount = 0;

// Mock pg module before importing ConnectionPool
vi.mock('pg', () => {
    const MockPool = function (config: unknown) {
        mockPoolConstructor(config);
        return {
            connect: mockPoolConnect,
            query: mockPoolQuery,
            end: mockPoolEnd,
            on: mockPoolOn,
            get totalCount() { return mockTotalCount; },
            get idleCount() { return mockIdleCount; },
            get waitingCount() { return mockWaitingCount; }
        };
    };
    return {
        default: { Pool: MockPool }
    };
});

// Mock the logger to avoid console output
vi.mock('../../utils/logger.js', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

// Import after mocking
import { ConnectionPool } from '../ConnectionPool.js';

describe('ConnectionPool', () => {
    let pool: ConnectionPool;

    beforeEach(() => {
        // Reset mock state
        vi.clearAllMocks();

        mockTotalCount = 5;
        mockIdleCount = 3;
        mockWaitingCount = 0;

        // Setup default mock implementations
        mockClientQuery.mockResolvedValue({ rows: [{ version: 'PostgreSQL 16.0' }] });
        mockClientRelease.mockReturnValue(undefined);
        mockPoolConnect.mockResolvedValue({
            query: mockClientQuery,
            release: mockClientRelease
        });
        mockPoolQuery.mockResolvedValue({ rows: [], rowCount: 0 });
        mockPoolEnd.mockResolvedValue(undefined);

        pool = new ConnectionPool({
            host: 'localhost',
            port: 5432,
            user: 'tester',
            password: 'test-secret',
            dbname: 'pt_tut',
            poolMax: 4
        });
    });

    describe('Initialization', () => {
        it('should map dbname to the pg database option', async () => {
            await pool.initialize();

            expect(mockPoolConstructor).toHaveBeenCalledWith(expect.objectContaining({
                host: 'localhost',
                port: 5432,
                user: 'tester',
                password: 'test-secret',
                database: 'pt_tut',
                max: 4
            }));
        });

        it('should probe the connection and release the client', async () => {
            await pool.initialize();

            // Should have connected and run the version query
            expect(pool.isInitialized()).toBe(true);
            expect(mockClientQuery).toHaveBeenCalledWith('SELECT version() AS version');
            expect(mockClientRelease).toHaveBeenCalledTimes(1);
        });

        it('should not reinitialize if already initialized', async () => {
            await pool.initialize();
            await pool.initialize();

            // Connect should not be called again (only once per init)
            expect(mockPoolConnect).toHaveBeenCalledTimes(1);
        });

        it('should fail with ConnectionUnavailableError when the server refuses', async () => {
            mockPoolConnect.mockRejectedValueOnce(Object.assign(
                new Error('connect ECONNREFUSED 127.0.0.1:5432'),
                { code: 'ECONNREFUSED' }
            ));

            await expect(pool.initialize()).rejects.toThrow(ConnectionUnavailableError);
            expect(pool.isInitialized()).toBe(false);
            expect(mockPoolEnd).toHaveBeenCalled();
        });

        it('should fail with ConnectionUnavailableError for an unknown database', async () => {
            mockClientQuery.mockRejectedValueOnce(Object.assign(
                new Error('database "pt_tut" does not exist'),
                { code: '3D000' }
            ));

            await expect(pool.initialize()).rejects.toThrow('database "pt_tut" does not exist');
            expect(mockClientRelease).toHaveBeenCalledTimes(1);
        });

        it('should wrap unclassified connect errors', async () => {
            mockPoolConnect.mockRejectedValueOnce(new Error('boom'));

            await expect(pool.initialize()).rejects.toThrow('Cannot connect to localhost:5432/pt_tut');
        });
    });

    describe('Health Monitoring', () => {
        it('should report unhealthy when not initialized', async () => {
            const health = await pool.checkHealth();

            expect(health.connected).toBe(false);
            expect(health.error).toBe('Pool not initialized');
        });

        it('should report healthy with version and pool stats', async () => {
            await pool.initialize();
            // Mock successful health check query
            mockPoolQuery.mockResolvedValueOnce({ rows: [{ version: 'PostgreSQL 16.0' }] });

            const health = await pool.checkHealth();

            expect(health.connected).toBe(true);
            expect(health.version).toBe('PostgreSQL 16.0');
            expect(health.latencyMs).toBeGreaterThanOrEqual(0);
            expect(health.poolStats?.total).toBe(5);
        });

        it('should report unhealthy on query failure', async () => {
            await pool.initialize();
            mockPoolQuery.mockRejectedValueOnce(new Error('Connection refused'));

            const health = await pool.checkHealth();

            expect(health.connected).toBe(false);
            expect(health.error).toBe('Connection refused');
        });
    });

    describe('Statistics Tracking', () => {
        it('should count queries', async () => {
            await pool.initialize();

            await pool.query('SELECT 1');
            await pool.query('SELECT 2', [1]);

            expect(pool.getStats().totalQueries).toBe(2);
            expect(mockPoolQuery).toHaveBeenCalledWith('SELECT 2', [1]);
        });

        it('should sync stats from pg pool', async () => {
            await pool.initialize();

            // Set mock pg pool counters
            mockTotalCount = 10;
            mockIdleCount = 4;
            mockWaitingCount = 2;

            expect(pool.getStats()).toEqual({
                total: 10,
                active: 6,
                idle: 4,
                waiting: 2,
                totalQueries: 0
            });
        });
    });

    describe('Transactions', () => {
        it('should wrap work in BEGIN and COMMIT', async () => {
            await pool.initialize();
            mockClientQuery.mockClear();
            mockClientRelease.mockClear();

            const result = await pool.transaction(async client => {
                await client.query('SELECT 1');
                return 'done';
            });

            expect(result).toBe('done');
            expect(mockClientQuery.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
            expect(mockClientRelease).toHaveBeenCalledTimes(1);
        });

        it('should roll back and rethrow when work fails', async () => {
            await pool.initialize();
            mockClientQuery.mockClear();
            mockClientRelease.mockClear();

            await expect(pool.transaction(async () => {
                throw new Error('bad row');
            })).rejects.toThrow('bad row');

            expect(mockClientQuery.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
            expect(mockClientRelease).toHaveBeenCalledTimes(1);
        });
    });

    describe('Graceful Shutdown', () => {
        it('should set shutting down state and end the pool', async () => {
            await pool.initialize();
            expect(pool.isClosing()).toBe(false);

            await pool.shutdown();

            expect(pool.isClosing()).toBe(true);
            expect(mockPoolEnd).toHaveBeenCalled();
        });

        it('should reject queries after shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();

            await expect(pool.query('SELECT 1')).rejects.toThrow(ConnectionUnavailableError);
            await expect(pool.getConnection()).rejects.toThrow('not initialized');
        });

        it('should report unhealthy after shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();

            // The shutting-down flag wins over the nulled pool
            const health = await pool.checkHealth();
            expect(health.error).toBe('Pool is shutting down');
        });

        it('should handle shutdown when not initialized', async () => {
            // Should not throw
            await expect(pool.shutdown()).resolves.toBeUndefined();
        });
    });

    describe('Event Handlers', () => {
        it('should register pool event handlers', async () => {
            await pool.initialize();

            // Verify event handlers were registered
            const registeredEvents = mockPoolOn.mock.calls.map(call => call[0]);

            expect(registeredEvents).toEqual(['connect', 'acquire', 'release', 'remove', 'error']);
        });
    });
});
