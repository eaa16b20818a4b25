/**
 * Unit tests for schema bootstrap and inspection
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { PoolClient } from 'pg';
import {
    BOOTSTRAP_STATEMENTS,
    assertSchema,
    describeMissing,
    inspectSchema,
    installSchema
} from '../schema.js';
import type { ConnectionPool } from '../../pool/ConnectionPool.js';
import { SchemaMissingError } from '../../types/index.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

const mockQuery = vi.fn();
const mockClientQuery = vi.fn();
const fakePool = {
    query: mockQuery,
    transaction: vi.fn(async (work: (client: PoolClient) => Promise<unknown>) =>
        work({ query: mockClientQuery } as unknown as PoolClient)
    )
} as unknown as Pick<ConnectionPool, 'query' | 'transaction'>;

function rows(...values: Record<string, unknown>[]): { rows: Record<string, unknown>[]; rowCount: number } {
    return { rows: values, rowCount: values.length };
}

function columnRows(...names: string[]): { rows: Record<string, unknown>[]; rowCount: number } {
    return rows(...names.map(column_name => ({ column_name })));
}

describe('BOOTSTRAP_STATEMENTS', () => {
    it('should make every statement safe to rerun', () => {
        const sql = BOOTSTRAP_STATEMENTS.map(statement => statement.sql);

        expect(sql[0]).toBe('CREATE EXTENSION IF NOT EXISTS postgis');
        expect(sql[1]).toMatch(/^CREATE TABLE IF NOT EXISTS company \(/);
        expect(sql[2]).toMatch(/^CREATE OR REPLACE FUNCTION geom_from_lat_lon\(\)/);
        expect(sql[3]).toBe('DROP TRIGGER IF EXISTS add_company_geom ON company');
        expect(sql[4]).toMatch(/^CREATE TRIGGER add_company_geom\nBEFORE INSERT ON company/);
    });

    it('should declare the geometry column as SRID 4326 points', () => {
        expect(BOOTSTRAP_STATEMENTS[1]?.sql).toContain('geom geometry(Point, 4326)');
    });

    it('should build the point longitude first in the trigger function', () => {
        expect(BOOTSTRAP_STATEMENTS[2]?.sql)
            .toContain('ST_SetSRID(ST_MakePoint(NEW.longitude, NEW.latitude), 4326)');
    });
});

describe('installSchema', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        mockClientQuery.mockResolvedValue(rows());
    });

    it('should run every statement in order inside one transaction', async () => {
        await installSchema(fakePool);

        expect(fakePool.transaction).toHaveBeenCalledTimes(1);
        expect(mockClientQuery.mock.calls.map(call => call[0]))
            .toEqual(BOOTSTRAP_STATEMENTS.map(statement => statement.sql));
    });

    it('should issue the same statements when run again', async () => {
        await installSchema(fakePool);
        await installSchema(fakePool);

        expect(mockClientQuery).toHaveBeenCalledTimes(BOOTSTRAP_STATEMENTS.length * 2);
    });

    it('should surface a failed statement', async () => {
        mockClientQuery.mockRejectedValueOnce(Object.assign(
            new Error('could not open extension control file'),
            { code: '58P01' }
        ));

        await expect(installSchema(fakePool)).rejects.toThrow('could not open extension control file');
    });
});

describe('inspectSchema', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should report a complete installation', async () => {
        mockQuery
            .mockResolvedValueOnce(rows({ extversion: '3.4.2' }))
            .mockResolvedValueOnce(columnRows('id', 'name', 'latitude', 'longitude', 'geom'))
            .mockResolvedValueOnce(rows({ tgname: 'add_company_geom' }));

        const status = await inspectSchema(fakePool);

        expect(status).toEqual({
            postgisInstalled: true,
            postgisVersion: '3.4.2',
            tableExists: true,
            missingColumns: [],
            triggerInstalled: true
        });
        expect(describeMissing(status)).toEqual([]);
    });

    it('should list what an empty database is missing', async () => {
        mockQuery
            .mockResolvedValueOnce(rows())
            .mockResolvedValueOnce(columnRows())
            .mockResolvedValueOnce(rows());

        const status = await inspectSchema(fakePool);

        expect(status.postgisVersion).toBeNull();
        expect(describeMissing(status)).toEqual([
            'extension postgis',
            'table company',
            'trigger add_company_geom'
        ]);
    });

    it('should name missing columns of an existing table', async () => {
        mockQuery
            .mockResolvedValueOnce(rows({ extversion: '3.4.2' }))
            .mockResolvedValueOnce(columnRows('id', 'name', 'latitude', 'longitude'))
            .mockResolvedValueOnce(rows({ tgname: 'add_company_geom' }));

        const status = await inspectSchema(fakePool);

        expect(status.missingColumns).toEqual(['geom']);
        expect(describeMissing(status)).toEqual(['columns geom']);
    });
});

describe('assertSchema', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should fail with SchemaMissingError naming the missing pieces', async () => {
        mockQuery
            .mockResolvedValueOnce(rows({ extversion: '3.4.2' }))
            .mockResolvedValueOnce(columnRows('id', 'name', 'latitude', 'longitude', 'geom'))
            .mockResolvedValueOnce(rows());

        const attempt = assertSchema(fakePool);

        await expect(attempt).rejects.toThrow(SchemaMissingError);
        await expect(attempt).rejects.toThrow('Schema not installed: trigger add_company_geom');
    });
});
