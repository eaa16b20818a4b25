/**
 * Schema Tools
 *
 * Bootstrap and inspect the PostGIS installation.
 */

import { z } from 'zod';
import type { ConnectionPool } from '../pool/ConnectionPool.js';
import type { ToolDefinition } from '../types/index.js';
import { describeMissing, inspectSchema, installSchema } from '../bootstrap/schema.js';

export function getSchemaTools(pool: Pick<ConnectionPool, 'query' | 'transaction'>): ToolDefinition[] {
    return [
        {
            name: 'geo_schema_bootstrap',
            description: 'Install PostGIS, the company table and the geometry derivation trigger. Safe to rerun.',
            inputSchema: z.object({}),
            handler: async () => {
                await installSchema(pool);
                const status = await inspectSchema(pool);
                return { success: describeMissing(status).length === 0, status };
            }
        },
        {
            name: 'geo_schema_status',
            description: 'Report whether PostGIS, the company table and the derivation trigger are installed.',
            inputSchema: z.object({}),
            handler: async () => {
                const status = await inspectSchema(pool);
                return { status, missing: describeMissing(status) };
            }
        }
    ];
}
