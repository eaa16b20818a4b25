/**
 * pg-geopoint - Point Construction
 *
 * Builds SRID 4326 points from a longitude/latitude pair.
 */

import { InvalidCoordinateError, WGS84_SRID } from '../types/index.js';
import type { PointGeometry } from '../types/index.js';

export const LATITUDE_RANGE = { min: -90, max: 90 } as const;
export const LONGITUDE_RANGE = { min: -180, max: 180 } as const;

function assertInRange(
    axis: 'latitude' | 'longitude',
    value: number,
    range: { min: number; max: number }
): void {
    if (!Number.isFinite(value)) {
        throw new InvalidCoordinateError(`${axis} must be a finite number`, { [axis]: value });
    }
    if (value < range.min || value > range.max) {
        throw new InvalidCoordinateError(
            `${axis} ${String(value)} is outside [${String(range.min)}, ${String(range.max)}]`,
            { [axis]: value }
        );
    }
}

/**
 * Equivalent of `ST_SetSRID(ST_MakePoint(longitude, latitude), 4326)`.
 * Argument order is longitude first, as in PostGIS.
 */
export function makePoint(longitude: number, latitude: number): PointGeometry {
    assertInRange('longitude', longitude, LONGITUDE_RANGE);
    assertInRange('latitude', latitude, LATITUDE_RANGE);

    return {
        type: 'Point',
        srid: WGS84_SRID,
        coordinates: [longitude, latitude]
    };
}
