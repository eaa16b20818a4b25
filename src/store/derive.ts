/**
 * pg-geopoint - Geometry Derivation
 *
 * The before-write hook: `geom` is computed from `latitude`/`longitude`
 * and nothing else. A caller-supplied `geom` never survives.
 */

import { makePoint } from '../geometry/point.js';
import type { CompanyDraft } from '../types/index.js';

/**
 * A write hook receives the in-flight record and returns the record to
 * persist. It must be synchronous and free of side effects. Whatever it
 * does to `geom` is replaced: derivation always runs after it.
 */
export type WriteHook = (record: CompanyDraft) => CompanyDraft;

export interface WriteHooks {
    beforeInsert: WriteHook;
    beforeUpdate: WriteHook;
}

/**
 * `geom := ST_SetSRID(ST_MakePoint(longitude, latitude), 4326)` when both
 * coordinates are present, otherwise null. Throws InvalidCoordinateError
 * for coordinates that cannot form a point.
 */
export function deriveGeometry(record: CompanyDraft): CompanyDraft {
    const { latitude, longitude } = record;
    const geom = latitude !== null && longitude !== null
        ? makePoint(longitude, latitude)
        : null;

    return { ...record, geom };
}

function passThrough(record: CompanyDraft): CompanyDraft {
    return record;
}

export const defaultWriteHooks: WriteHooks = {
    beforeInsert: passThrough,
    beforeUpdate: passThrough
};
