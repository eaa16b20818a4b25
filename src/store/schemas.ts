/**
 * pg-geopoint - Write Input Schemas
 *
 * Input validation for the company write path and the tool surface.
 */

import { z } from 'zod';
import { COMPANY_ID_RANGE } from './CompanyStore.js';

/**
 * NaN and infinities pass here on purpose: they are coordinate errors,
 * not shape errors, and the derivation step reports them as such.
 */
const CoordinateSchema = z.union([z.number(), z.nan()]).nullable().optional();

export const CompanyIdSchema = z.number()
    .int()
    .min(COMPANY_ID_RANGE.min)
    .max(COMPANY_ID_RANGE.max)
    .describe('Company id');

export const CompanyInsertSchema = z.object({
    id: CompanyIdSchema.optional().describe('Explicit id (default: next serial value)'),
    name: z.string().describe('Company name'),
    latitude: CoordinateSchema.describe('Latitude in degrees, WGS84'),
    longitude: CoordinateSchema.describe('Longitude in degrees, WGS84'),
    geom: z.unknown().optional().describe('Ignored: geometry is always derived from latitude/longitude')
});

export const CompanyUpdateSchema = z.object({
    name: z.string().nullable().optional().describe('New name'),
    latitude: CoordinateSchema.describe('New latitude; null clears it'),
    longitude: CoordinateSchema.describe('New longitude; null clears it'),
    geom: z.unknown().optional().describe('Ignored: geometry is always derived from latitude/longitude')
});

export type CompanyInsertInput = z.input<typeof CompanyInsertSchema>;
export type CompanyUpdateInput = z.input<typeof CompanyUpdateSchema>;
