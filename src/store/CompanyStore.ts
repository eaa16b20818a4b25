/**
 * pg-geopoint - Entity Store Contract
 *
 * Persistence only. Stores receive records whose `geom` has already been
 * derived and never compute it themselves.
 */

import type { Company, CompanyDraft } from '../types/index.js';

export const COMPANY_TABLE = 'company';

export const COMPANY_COLUMNS = ['id', 'name', 'latitude', 'longitude', 'geom'] as const;

/** `serial` is a 4-byte integer */
export const COMPANY_ID_RANGE = { min: -2147483648, max: 2147483647 } as const;

/**
 * Whether `id` can name a row at all. Anything else can never be found.
 */
export function isCompanyId(id: number): boolean {
    return Number.isInteger(id) && id >= COMPANY_ID_RANGE.min && id <= COMPANY_ID_RANGE.max;
}

/**
 * Receives the current record and returns the replacement. Runs inside
 * the store's atomic section, so throwing aborts the update.
 */
export type CompanyMutation = (current: Company) => CompanyDraft;

export interface CompanyStore {
    /**
     * Persist a new record. Assigns `id` when absent. Fails with
     * ConstraintViolationError when `id` is taken.
     */
    insert(record: CompanyDraft): Promise<Company>;

    findById(id: number): Promise<Company | null>;

    /**
     * Atomically read, mutate and write one record. Resolves null when
     * `id` does not exist.
     */
    update(id: number, mutate: CompanyMutation): Promise<Company | null>;

    /** Resolves false when nothing was deleted */
    deleteById(id: number): Promise<boolean>;
}
