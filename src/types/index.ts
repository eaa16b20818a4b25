/**
 * pg-geopoint - Shared Types
 */

import type { z } from 'zod';

export * from './errors.js';

// =============================================================================
// Geometry
// =============================================================================

/** WGS84 geographic longitude/latitude */
export const WGS84_SRID = 4326;

export interface PointGeometry {
    type: 'Point';
    srid: typeof WGS84_SRID;
    /** Longitude first, latitude second */
    coordinates: [number, number];
}

// =============================================================================
// Company entity
// =============================================================================

export interface Company {
    id: number;
    name: string | null;
    latitude: number | null;
    longitude: number | null;
    geom: PointGeometry | null;
}

/**
 * A record on its way into the store. `id` is assigned by the store when
 * absent; `geom` is whatever the derivation hook produced.
 */
export interface CompanyDraft {
    id?: number | undefined;
    name: string | null;
    latitude: number | null;
    longitude: number | null;
    geom: PointGeometry | null;
}

// =============================================================================
// Connection
// =============================================================================

export interface ConnectionConfig {
    user: string;
    password: string;
    port: number;
    dbname: string;
    host: string;
    /** Maximum pool connections */
    poolMax: number;
}

export interface PoolStats {
    total: number;
    active: number;
    idle: number;
    waiting: number;
    totalQueries: number;
}

export interface HealthStatus {
    connected: boolean;
    latencyMs?: number | undefined;
    version?: string | undefined;
    poolStats?: PoolStats | undefined;
    error?: string | undefined;
}

// =============================================================================
// Tools
// =============================================================================

export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: z.AnyZodObject;
    handler: (params: unknown) => Promise<unknown>;
}
