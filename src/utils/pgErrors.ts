/**
 * pg-geopoint - PostgreSQL Error Mapping
 *
 * Translates driver errors into the pg-geopoint taxonomy using SQLSTATE
 * codes and Node socket error codes. Errors that match nothing are
 * returned unchanged.
 */

import {
    GeoPointError,
    ConnectionUnavailableError,
    SchemaMissingError,
    ConstraintViolationError,
    InvalidCoordinateError
} from '../types/index.js';

const CONSTRAINT_CODES = new Set([
    '23502', // not_null_violation
    '23503', // foreign_key_violation
    '23505', // unique_violation
    '23514', // check_violation
    '22003' // numeric_value_out_of_range (id beyond serial)
]);

const SCHEMA_CODES = new Set([
    '42P01', // undefined_table
    '42703', // undefined_column
    '42883', // undefined_function (PostGIS not installed)
    '42704' // undefined_object (geometry type unknown)
]);

const CONNECTION_STATE_CODES = new Set([
    '3D000', // invalid_catalog_name
    '57P01', // admin_shutdown
    '57P02', // crash_shutdown
    '57P03' // cannot_connect_now
]);

const GEOMETRY_CODES = new Set([
    '22P02', // invalid_text_representation
    '22023', // invalid_parameter_value
    'XX000' // internal_error, raised by liblwgeom parse failures
]);

const SOCKET_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET', 'EHOSTUNREACH']);

function readString(value: object, key: string): string | undefined {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
}

export function mapPgError(error: unknown): unknown {
    if (error instanceof GeoPointError || typeof error !== 'object' || error === null) {
        return error;
    }

    const code = readString(error, 'code');
    const message = readString(error, 'message') ?? 'Unknown database error';
    if (code === undefined) {
        return error;
    }

    const details: Record<string, unknown> = { sqlState: code };
    const constraint = readString(error, 'constraint');
    const column = readString(error, 'column');
    if (constraint !== undefined) details['constraint'] = constraint;
    if (column !== undefined) details['column'] = column;

    if (CONSTRAINT_CODES.has(code)) {
        return new ConstraintViolationError(message, details, { cause: error });
    }
    if (SCHEMA_CODES.has(code)) {
        return new SchemaMissingError(message, details, { cause: error });
    }
    if (SOCKET_CODES.has(code) || CONNECTION_STATE_CODES.has(code) || code.startsWith('08') || code.startsWith('28')) {
        return new ConnectionUnavailableError(message, details, { cause: error });
    }
    if (GEOMETRY_CODES.has(code) && /geometry|point|coordinate|lwgeom/i.test(message)) {
        return new InvalidCoordinateError(message, details, { cause: error });
    }

    return error;
}

/**
 * Run a database call, rethrowing its failure in mapped form
 */
export async function withPgErrors<T>(operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        throw mapPgError(error);
    }
}
