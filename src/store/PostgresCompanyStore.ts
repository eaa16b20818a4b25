/**
 * pg-geopoint - PostgreSQL/PostGIS Entity Store
 *
 * Hands geometry to PostGIS in both directions: the derived point is written
 * with `ST_SetSRID(ST_MakePoint(x, y), 4326)` and read back through `ST_X`,
 * `ST_Y` and `ST_SRID`.
 */

import { z } from 'zod';
import type { PoolClient, QueryResultRow } from 'pg';
import type { ConnectionPool } from '../pool/ConnectionPool.js';
import { SchemaMissingError, WGS84_SRID } from '../types/index.js';
import type { Company, CompanyDraft, PointGeometry } from '../types/index.js';
import { withPgErrors } from '../utils/pgErrors.js';
import { logger } from '../utils/logger.js';
import { COMPANY_TABLE } from './CompanyStore.js';
import type { CompanyMutation, CompanyStore } from './CompanyStore.js';

const SELECT_LIST = [
    'id',
    'name',
    'latitude',
    'longitude',
    'GeometryType(geom) AS geom_type',
    'ST_SRID(geom) AS geom_srid',
    `CASE WHEN GeometryType(geom) = 'POINT' THEN ST_X(geom) END AS geom_x`,
    `CASE WHEN GeometryType(geom) = 'POINT' THEN ST_Y(geom) END AS geom_y`
].join(', ');

const CompanyRowSchema = z.object({
    id: z.coerce.number().int(),
    name: z.string().nullable(),
    latitude: z.coerce.number().nullable(),
    longitude: z.coerce.number().nullable(),
    geom_type: z.string().nullable(),
    geom_srid: z.coerce.number().int().nullable(),
    geom_x: z.coerce.number().nullable(),
    geom_y: z.coerce.number().nullable()
});

type CompanyRow = z.infer<typeof CompanyRowSchema>;

function rowToPoint(row: CompanyRow): PointGeometry | null {
    if (row.geom_type === null) {
        return null;
    }
    if (row.geom_type !== 'POINT' || row.geom_srid !== WGS84_SRID || row.geom_x === null || row.geom_y === null) {
        throw new SchemaMissingError(
            `Company ${String(row.id)} holds a ${row.geom_type} with SRID ${String(row.geom_srid)}; geom must be an SRID ${String(WGS84_SRID)} point`,
            { id: row.id, geomType: row.geom_type, srid: row.geom_srid }
        );
    }
    return { type: 'Point', srid: WGS84_SRID, coordinates: [row.geom_x, row.geom_y] };
}

export function rowToCompany(row: QueryResultRow): Company {
    const parsed = CompanyRowSchema.parse(row);
    return {
        id: parsed.id,
        name: parsed.name,
        latitude: parsed.latitude,
        longitude: parsed.longitude,
        geom: rowToPoint(parsed)
    };
}

/** `[x, y]` parameters for `ST_MakePoint`; both null when there is no point */
function pointParams(record: CompanyDraft): [number | null, number | null] {
    return record.geom ? [record.geom.coordinates[0], record.geom.coordinates[1]] : [null, null];
}

export class PostgresCompanyStore implements CompanyStore {
    constructor(private readonly pool: Pick<ConnectionPool, 'query' | 'transaction'>) {}

    async insert(record: CompanyDraft): Promise<Company> {
        const { sql, params } = record.id === undefined
            ? {
                sql: `INSERT INTO ${COMPANY_TABLE} (name, latitude, longitude, geom)
                      VALUES ($1, $2, $3, ST_SetSRID(ST_MakePoint($4::float8, $5::float8), ${String(WGS84_SRID)}))
                      RETURNING ${SELECT_LIST}`,
                params: [record.name, record.latitude, record.longitude, ...pointParams(record)]
            }
            : {
                sql: `INSERT INTO ${COMPANY_TABLE} (id, name, latitude, longitude, geom)
                      VALUES ($1, $2, $3, $4, ST_SetSRID(ST_MakePoint($5::float8, $6::float8), ${String(WGS84_SRID)}))
                      RETURNING ${SELECT_LIST}`,
                params: [record.id, record.name, record.latitude, record.longitude, ...pointParams(record)]
            };

        const result = await withPgErrors(() => this.pool.query(sql, params));
        const row = result.rows[0];
        if (!row) {
            throw new Error('INSERT returned no row');
        }

        const company = rowToCompany(row);
        logger.debug('Company inserted', { id: company.id, hasGeom: company.geom !== null });
        return company;
    }

    async findById(id: number): Promise<Company | null> {
        const result = await withPgErrors(() =>
            this.pool.query(`SELECT ${SELECT_LIST} FROM ${COMPANY_TABLE} WHERE id = $1`, [id])
        );
        const row = result.rows[0];
        return row ? rowToCompany(row) : null;
    }

    async update(id: number, mutate: CompanyMutation): Promise<Company | null> {
        return withPgErrors(() => this.pool.transaction(async (client: PoolClient) => {
            const current = await client.query(
                `SELECT ${SELECT_LIST} FROM ${COMPANY_TABLE} WHERE id = $1 FOR UPDATE`,
                [id]
            );
            const currentRow = current.rows[0];
            if (!currentRow) {
                return null;
            }

            const next = mutate(rowToCompany(currentRow));
            const updated = await client.query(
                `UPDATE ${COMPANY_TABLE}
                 SET name = $2, latitude = $3, longitude = $4,
                     geom = ST_SetSRID(ST_MakePoint($5::float8, $6::float8), ${String(WGS84_SRID)})
                 WHERE id = $1
                 RETURNING ${SELECT_LIST}`,
                [id, next.name, next.latitude, next.longitude, ...pointParams(next)]
            );
            const updatedRow = updated.rows[0];
            if (!updatedRow) {
                throw new Error('UPDATE returned no row');
            }
            return rowToCompany(updatedRow);
        }));
    }

    async deleteById(id: number): Promise<boolean> {
        const result = await withPgErrors(() =>
            this.pool.query(`DELETE FROM ${COMPANY_TABLE} WHERE id = $1`, [id])
        );
        return (result.rowCount ?? 0) > 0;
    }
}
