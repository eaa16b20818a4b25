/**
 * pg-geopoint - Library Entry Point
 */

export * from './types/index.js';
export { makePoint, LATITUDE_RANGE, LONGITUDE_RANGE } from './geometry/point.js';
export { deriveGeometry, defaultWriteHooks } from './store/derive.js';
export type { WriteHook, WriteHooks } from './store/derive.js';
export { CompanyService } from './store/CompanyService.js';
export type { CompanyServiceOptions } from './store/CompanyService.js';
export { COMPANY_TABLE, COMPANY_COLUMNS, COMPANY_ID_RANGE, isCompanyId } from './store/CompanyStore.js';
export type { CompanyStore, CompanyMutation } from './store/CompanyStore.js';
export { PostgresCompanyStore, rowToCompany } from './store/PostgresCompanyStore.js';
export { MemoryCompanyStore } from './store/MemoryCompanyStore.js';
export { CompanyInsertSchema, CompanyUpdateSchema } from './store/schemas.js';
export type { CompanyInsertInput, CompanyUpdateInput } from './store/schemas.js';
export { ConnectionPool } from './pool/ConnectionPool.js';
export type { ConnectionPoolOptions } from './pool/ConnectionPool.js';
export {
    DEFAULT_ENV_PREFIX,
    REQUIRED_CONNECTION_PARAMS,
    ConnectionConfigSchema,
    loadConnectionConfig,
    parseConnectionConfig,
    findMissingConnectionEnv
} from './config/connection.js';
export type { ConnectionConfigInput } from './config/connection.js';
export {
    BOOTSTRAP_STATEMENTS,
    TRIGGER_FUNCTION,
    TRIGGER_NAME,
    installSchema,
    inspectSchema,
    assertSchema,
    describeMissing
} from './bootstrap/schema.js';
export type { SchemaStatus } from './bootstrap/schema.js';
export { runVerification, assertConnectionEnv, PROBE_RECORD } from './harness/verify.js';
export type { VerificationReport, CheckResult } from './harness/verify.js';
export { mapPgError } from './utils/pgErrors.js';
export { logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
