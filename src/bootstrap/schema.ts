/**
 * pg-geopoint - Schema Bootstrap
 *
 * Installs PostGIS, the company table and the database-side derivation
 * trigger. Every statement is rerunnable, so bootstrapping an already
 * bootstrapped database is a no-op.
 */

import { SchemaMissingError } from '../types/index.js';
import type { ConnectionPool } from '../pool/ConnectionPool.js';
import { COMPANY_COLUMNS, COMPANY_TABLE } from '../store/CompanyStore.js';
import { withPgErrors } from '../utils/pgErrors.js';
import { logger } from '../utils/logger.js';

export const TRIGGER_FUNCTION = 'geom_from_lat_lon';
export const TRIGGER_NAME = 'add_company_geom';

export interface BootstrapStatement {
    description: string;
    sql: string;
}

/**
 * The trigger mirrors `deriveGeometry` for writers that go around the
 * service: point from (longitude, latitude) when both are set, else null.
 */
export const BOOTSTRAP_STATEMENTS: readonly BootstrapStatement[] = [
    {
        description: 'Enable PostGIS',
        sql: 'CREATE EXTENSION IF NOT EXISTS postgis'
    },
    {
        description: `Create ${COMPANY_TABLE} table`,
        sql: `CREATE TABLE IF NOT EXISTS ${COMPANY_TABLE} (
    id serial PRIMARY KEY,
    name varchar,
    latitude double precision,
    longitude double precision,
    geom geometry(Point, 4326)
)`
    },
    {
        description: 'Create derivation function',
        sql: `CREATE OR REPLACE FUNCTION ${TRIGGER_FUNCTION}()
RETURNS TRIGGER AS
$$
BEGIN
    IF NEW.latitude IS NOT NULL AND NEW.longitude IS NOT NULL THEN
        NEW.geom = ST_SetSRID(ST_MakePoint(NEW.longitude, NEW.latitude), 4326);
    ELSE
        NEW.geom = NULL;
    END IF;
    RETURN NEW;
END;
$$
LANGUAGE plpgsql`
    },
    {
        description: 'Drop previous derivation trigger',
        sql: `DROP TRIGGER IF EXISTS ${TRIGGER_NAME} ON ${COMPANY_TABLE}`
    },
    {
        description: 'Register derivation trigger',
        sql: `CREATE TRIGGER ${TRIGGER_NAME}
BEFORE INSERT ON ${COMPANY_TABLE}
FOR EACH ROW EXECUTE FUNCTION ${TRIGGER_FUNCTION}()`
    }
];

/**
 * Run the bootstrap in one transaction: either everything is installed
 * or nothing changes.
 */
export async function installSchema(pool: Pick<ConnectionPool, 'transaction'>): Promise<void> {
    await withPgErrors(() => pool.transaction(async client => {
        for (const statement of BOOTSTRAP_STATEMENTS) {
            logger.debug('Bootstrap step', { step: statement.description });
            await client.query(statement.sql);
        }
    }));
    logger.info('Schema installed', { table: COMPANY_TABLE, trigger: TRIGGER_NAME });
}

export interface SchemaStatus {
    postgisInstalled: boolean;
    postgisVersion: string | null;
    tableExists: boolean;
    missingColumns: string[];
    triggerInstalled: boolean;
}

function toStr(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

export async function inspectSchema(pool: Pick<ConnectionPool, 'query'>): Promise<SchemaStatus> {
    return withPgErrors(async () => {
        const ext = await pool.query(
            `SELECT extversion FROM pg_extension WHERE extname = 'postgis'`
        );
        const columns = await pool.query(
            `SELECT column_name FROM information_schema.columns WHERE table_name = $1`,
            [COMPANY_TABLE]
        );
        const trigger = await pool.query(
            `SELECT tgname FROM pg_trigger t
             JOIN pg_class c ON c.oid = t.tgrelid
             WHERE c.relname = $1 AND t.tgname = $2 AND NOT t.tgisinternal`,
            [COMPANY_TABLE, TRIGGER_NAME]
        );

        const present = new Set(columns.rows.map(row => toStr(row['column_name'])));
        const extRow = ext.rows[0];

        return {
            postgisInstalled: extRow !== undefined,
            postgisVersion: extRow ? toStr(extRow['extversion']) : null,
            tableExists: columns.rows.length > 0,
            missingColumns: COMPANY_COLUMNS.filter(column => !present.has(column)),
            triggerInstalled: trigger.rows.length > 0
        };
    });
}

/**
 * Human-readable list of what the bootstrap still has to install
 */
export function describeMissing(status: SchemaStatus): string[] {
    const missing: string[] = [];
    if (!status.postgisInstalled) {
        missing.push('extension postgis');
    }
    if (!status.tableExists) {
        missing.push(`table ${COMPANY_TABLE}`);
    } else if (status.missingColumns.length > 0) {
        missing.push(`columns ${status.missingColumns.join(', ')}`);
    }
    if (!status.triggerInstalled) {
        missing.push(`trigger ${TRIGGER_NAME}`);
    }
    return missing;
}

export async function assertSchema(pool: Pick<ConnectionPool, 'query'>): Promise<SchemaStatus> {
    const status = await inspectSchema(pool);
    const missing = describeMissing(status);
    if (missing.length > 0) {
        throw new SchemaMissingError(`Schema not installed: ${missing.join('; ')}`, { missing });
    }
    return status;
}
