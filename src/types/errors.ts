/**
 * pg-geopoint - Error Taxonomy
 *
 * Every failure on the write/read path surfaces as one of these classes.
 * The core never retries and never substitutes a default value.
 */

export type ErrorCode =
    | 'CONNECTION_UNAVAILABLE'
    | 'SCHEMA_MISSING'
    | 'CONSTRAINT_VIOLATION'
    | 'INVALID_COORDINATE'
    | 'NOT_FOUND';

/**
 * Base class for all pg-geopoint errors
 */
export class GeoPointError extends Error {
    readonly code: ErrorCode;
    readonly details: Record<string, unknown> | undefined;

    constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super(message, options);
        this.name = 'GeoPointError';
        this.code = code;
        this.details = details;
    }

    toJSON(): Record<string, unknown> {
        return {
            error: this.name,
            code: this.code,
            message: this.message,
            ...(this.details ? { details: this.details } : {})
        };
    }
}

/**
 * The store cannot be reached: missing configuration, refused connection,
 * bad credentials or a database that does not exist.
 */
export class ConnectionUnavailableError extends GeoPointError {
    constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super('CONNECTION_UNAVAILABLE', message, details, options);
        this.name = 'ConnectionUnavailableError';
    }
}

/**
 * PostGIS, the company table or the derivation trigger is not installed
 */
export class SchemaMissingError extends GeoPointError {
    constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super('SCHEMA_MISSING', message, details, options);
        this.name = 'SchemaMissingError';
    }
}

export class ConstraintViolationError extends GeoPointError {
    constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super('CONSTRAINT_VIOLATION', message, details, options);
        this.name = 'ConstraintViolationError';
    }
}

export class InvalidCoordinateError extends GeoPointError {
    constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super('INVALID_COORDINATE', message, details, options);
        this.name = 'InvalidCoordinateError';
    }
}

export class NotFoundError extends GeoPointError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('NOT_FOUND', message, details);
        this.name = 'NotFoundError';
    }
}

export function isGeoPointError(error: unknown): error is GeoPointError {
    return error instanceof GeoPointError;
}
