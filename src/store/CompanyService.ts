/**
 * pg-geopoint - Company Write Path
 *
 * The single dispatch point between callers and the store: validates the
 * input, runs the caller's before-write hook, derives `geom`, then persists. A hook failure aborts
 * the write before the store is touched.
 */

import type { z } from 'zod';
import { ConstraintViolationError, NotFoundError } from '../types/index.js';
import type { Company, CompanyDraft } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { isCompanyId } from './CompanyStore.js';
import type { CompanyStore } from './CompanyStore.js';
import { defaultWriteHooks, deriveGeometry } from './derive.js';
import type { WriteHooks } from './derive.js';
import { CompanyInsertSchema, CompanyUpdateSchema } from './schemas.js';

export interface CompanyServiceOptions {
    hooks?: Partial<WriteHooks>;
}

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new ConstraintViolationError('Invalid company record', {
            issues: result.error.issues.map(issue => ({
                field: issue.path.join('.'),
                message: issue.message
            }))
        });
    }
    return result.data;
}

export class CompanyService {
    private readonly hooks: WriteHooks;

    constructor(
        private readonly store: CompanyStore,
        options: CompanyServiceOptions = {}
    ) {
        this.hooks = { ...defaultWriteHooks, ...options.hooks };
    }

    async insert(input: unknown): Promise<Company> {
        const parsed = parseInput(CompanyInsertSchema, input);
        if (parsed.geom !== undefined) {
            logger.debug('Discarding caller-supplied geom', { id: parsed.id });
        }

        const record = deriveGeometry(this.hooks.beforeInsert({
            id: parsed.id,
            name: parsed.name,
            latitude: parsed.latitude ?? null,
            longitude: parsed.longitude ?? null,
            geom: null
        }));

        return this.store.insert(record);
    }

    async select(id: number): Promise<Company> {
        const company = isCompanyId(id) ? await this.store.findById(id) : null;
        if (!company) {
            throw new NotFoundError(`Company ${String(id)} not found`, { id });
        }
        return company;
    }

    /**
     * Apply a partial change and re-derive `geom` from the resulting
     * coordinates.
     */
    async update(id: number, patch: unknown): Promise<Company> {
        const parsed = parseInput(CompanyUpdateSchema, patch);
        if (parsed.geom !== undefined) {
            logger.debug('Discarding caller-supplied geom', { id });
        }

        const updated = isCompanyId(id)
            ? await this.store.update(id, (current): CompanyDraft => deriveGeometry(this.hooks.beforeUpdate({
                id: current.id,
                name: parsed.name !== undefined ? parsed.name : current.name,
                latitude: parsed.latitude !== undefined ? parsed.latitude : current.latitude,
                longitude: parsed.longitude !== undefined ? parsed.longitude : current.longitude,
                geom: current.geom
            })))
            : null;

        if (!updated) {
            throw new NotFoundError(`Company ${String(id)} not found`, { id });
        }
        return updated;
    }

    async delete(id: number): Promise<void> {
        const deleted = isCompanyId(id) ? await this.store.deleteById(id) : false;
        if (!deleted) {
            throw new NotFoundError(`Company ${String(id)} not found`, { id });
        }
        logger.debug('Company deleted', { id });
    }
}
