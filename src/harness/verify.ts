/**
 * pg-geopoint - Verification Harness
 *
 * Checks a live installation end to end: PostGIS present, company table
 * shaped correctly, derivation trigger registered, and a plain SQL insert
 * without geometry coming back with the point the trigger derived. The
 * probe record is always cleaned up.
 */

import { ConnectionUnavailableError, NotFoundError, WGS84_SRID } from '../types/index.js';
import type { Company } from '../types/index.js';
import type { ConnectionPool } from '../pool/ConnectionPool.js';
import type { CompanyService } from '../store/CompanyService.js';
import { COMPANY_COLUMNS, COMPANY_TABLE } from '../store/CompanyStore.js';
import { TRIGGER_NAME, inspectSchema } from '../bootstrap/schema.js';
import { DEFAULT_ENV_PREFIX, findMissingConnectionEnv } from '../config/connection.js';
import { logger } from '../utils/logger.js';
import { withPgErrors } from '../utils/pgErrors.js';

export const PROBE_RECORD = {
    id: 10001,
    name: 'geosimple',
    latitude: 45.543,
    longitude: -74.456
} as const;

export interface CheckResult {
    name: string;
    passed: boolean;
    detail?: string | undefined;
}

export interface VerificationReport {
    passed: boolean;
    checks: CheckResult[];
}

export interface VerificationDeps {
    pool: Pick<ConnectionPool, 'query'>;
    service: CompanyService;
}

/**
 * Fails before anything touches the database when any of the connection
 * variables is absent.
 */
export function assertConnectionEnv(
    env: Record<string, string | undefined> = process.env,
    prefix = DEFAULT_ENV_PREFIX
): void {
    const missing = findMissingConnectionEnv(env, prefix);
    if (missing.length > 0) {
        throw new ConnectionUnavailableError(
            `Missing connection environment variables: ${missing.join(', ')}`,
            { missing }
        );
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function checkRoundTrip(company: Company): string | undefined {
    const fields: (keyof Company)[] = [...COMPANY_COLUMNS];
    if (Object.keys(company).length !== fields.length) {
        return `expected ${String(fields.length)} fields, got ${String(Object.keys(company).length)}`;
    }
    if (company.id !== PROBE_RECORD.id || company.name !== PROBE_RECORD.name) {
        return `unexpected identity ${String(company.id)}/${String(company.name)}`;
    }
    if (company.latitude !== PROBE_RECORD.latitude || company.longitude !== PROBE_RECORD.longitude) {
        return `unexpected coordinates ${String(company.latitude)}, ${String(company.longitude)}`;
    }
    if (!company.geom) {
        return 'geom was not derived';
    }
    const [x, y] = company.geom.coordinates;
    if (company.geom.srid !== WGS84_SRID || x !== PROBE_RECORD.longitude || y !== PROBE_RECORD.latitude) {
        return `geom is POINT(${String(x)} ${String(y)}) SRID ${String(company.geom.srid)}`;
    }
    return undefined;
}

export async function runVerification(deps: VerificationDeps): Promise<VerificationReport> {
    const checks: CheckResult[] = [];
    const record = (name: string, failure: string | undefined): void => {
        checks.push({ name, passed: failure === undefined, detail: failure });
        logger.info(`Check ${failure === undefined ? 'passed' : 'failed'}: ${name}`, failure ? { detail: failure } : undefined);
    };

    const status = await inspectSchema(deps.pool);
    record('postgis extension installed', status.postgisInstalled ? undefined : 'postgis not in pg_extension');
    record(
        'company table has id, name, latitude, longitude, geom',
        !status.tableExists
            ? 'table company does not exist'
            : status.missingColumns.length > 0 ? `missing ${status.missingColumns.join(', ')}` : undefined
    );
    record(
        'derivation trigger installed',
        status.triggerInstalled ? undefined : `trigger ${TRIGGER_NAME} not in pg_trigger`
    );

    if (!status.postgisInstalled || !status.tableExists || status.missingColumns.length > 0 || !status.triggerInstalled) {
        return { passed: false, checks };
    }

    let inserted = false;
    try {
        // Plain SQL so the database trigger, not the service, fills in geom
        await withPgErrors(() => deps.pool.query(
            `INSERT INTO ${COMPANY_TABLE} (id, name, latitude, longitude) VALUES ($1, $2, $3, $4)`,
            [PROBE_RECORD.id, PROBE_RECORD.name, PROBE_RECORD.latitude, PROBE_RECORD.longitude]
        ));
        inserted = true;

        const fetched = await deps.service.select(PROBE_RECORD.id);
        record('insert without geom derives geom', fetched.geom ? undefined : 'geom was not derived');
        record('select returns the stored record', checkRoundTrip(fetched));

        await deps.service.delete(PROBE_RECORD.id);
        inserted = false;

        try {
            await deps.service.select(PROBE_RECORD.id);
            record('select after delete reports not found', 'record still present');
        } catch (error) {
            record(
                'select after delete reports not found',
                error instanceof NotFoundError ? undefined : describeError(error)
            );
        }
    } catch (error) {
        record('round trip completed', describeError(error));
    } finally {
        if (inserted) {
            await deps.service.delete(PROBE_RECORD.id).catch((cleanupError: unknown) => {
                logger.warn('Could not remove probe record', { id: PROBE_RECORD.id, error: cleanupError });
            });
        }
    }

    return { passed: checks.every(check => check.passed), checks };
}
