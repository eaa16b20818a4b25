/**
 * Company Tools
 *
 * Insert, read, update and delete company records through the write path.
 */

import { z } from 'zod';
import type { CompanyService } from '../store/CompanyService.js';
import type { ToolDefinition } from '../types/index.js';
import { CompanyIdSchema, CompanyInsertSchema, CompanyUpdateSchema } from '../store/schemas.js';

const CompanyIdInputSchema = z.object({
    id: CompanyIdSchema
});

const CompanyUpdateInputSchema = CompanyUpdateSchema.extend({
    id: CompanyIdSchema
});

export function getCompanyTools(service: CompanyService): ToolDefinition[] {
    return [
        createInsertTool(service),
        createGetTool(service),
        createUpdateTool(service),
        createDeleteTool(service)
    ];
}

function createInsertTool(service: CompanyService): ToolDefinition {
    return {
        name: 'geo_company_insert',
        description: 'Insert a company. geom is derived from latitude/longitude (SRID 4326) and never taken from input.',
        inputSchema: CompanyInsertSchema,
        handler: async (params: unknown) => {
            const company = await service.insert(params);
            return { company };
        }
    };
}

function createGetTool(service: CompanyService): ToolDefinition {
    return {
        name: 'geo_company_get',
        description: 'Fetch a company by id.',
        inputSchema: CompanyIdInputSchema,
        handler: async (params: unknown) => {
            const { id } = CompanyIdInputSchema.parse(params);
            return { company: await service.select(id) };
        }
    };
}

function createUpdateTool(service: CompanyService): ToolDefinition {
    return {
        name: 'geo_company_update',
        description: 'Update a company. Changing latitude or longitude re-derives geom.',
        inputSchema: CompanyUpdateInputSchema,
        handler: async (params: unknown) => {
            const { id, ...patch } = CompanyUpdateInputSchema.parse(params);
            return { company: await service.update(id, patch) };
        }
    };
}

function createDeleteTool(service: CompanyService): ToolDefinition {
    return {
        name: 'geo_company_delete',
        description: 'Delete a company by id.',
        inputSchema: CompanyIdInputSchema,
        handler: async (params: unknown) => {
            const { id } = CompanyIdInputSchema.parse(params);
            await service.delete(id);
            return { success: true, id };
        }
    };
}
