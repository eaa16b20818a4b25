/**
 * pg-geopoint - In-Process Entity Store
 *
 * Same contract as the PostgreSQL store, held in a Map. Ids follow
 * `serial` semantics: the sequence only advances when it is used and
 * ignores explicitly supplied ids.
 */

import { ConstraintViolationError } from '../types/index.js';
import type { Company, CompanyDraft, PointGeometry } from '../types/index.js';
import { isCompanyId } from './CompanyStore.js';
import type { CompanyMutation, CompanyStore } from './CompanyStore.js';

function clonePoint(point: PointGeometry | null): PointGeometry | null {
    return point ? { ...point, coordinates: [point.coordinates[0], point.coordinates[1]] } : null;
}

function cloneCompany(company: Company): Company {
    return { ...company, geom: clonePoint(company.geom) };
}

export class MemoryCompanyStore implements CompanyStore {
    private readonly rows = new Map<number, Company>();
    private sequence = 0;

    // eslint-disable-next-line @typescript-eslint/require-await
    async insert(record: CompanyDraft): Promise<Company> {
        const id = record.id ?? ++this.sequence;
        if (!isCompanyId(id)) {
            throw new ConstraintViolationError(`value "${String(id)}" is out of range for type integer`, { id });
        }
        if (this.rows.has(id)) {
            throw new ConstraintViolationError(`duplicate key value violates unique constraint "company_pkey"`, {
                constraint: 'company_pkey',
                id
            });
        }

        const stored: Company = {
            id,
            name: record.name,
            latitude: record.latitude,
            longitude: record.longitude,
            geom: clonePoint(record.geom)
        };
        this.rows.set(id, stored);
        return cloneCompany(stored);
    }

    // eslint-disable-next-line @typescript-eslint/require-await
    async findById(id: number): Promise<Company | null> {
        const row = this.rows.get(id);
        return row ? cloneCompany(row) : null;
    }

    // eslint-disable-next-line @typescript-eslint/require-await
    async update(id: number, mutate: CompanyMutation): Promise<Company | null> {
        const current = this.rows.get(id);
        if (!current) {
            return null;
        }

        const next = mutate(cloneCompany(current));
        const stored: Company = {
            id,
            name: next.name,
            latitude: next.latitude,
            longitude: next.longitude,
            geom: clonePoint(next.geom)
        };
        this.rows.set(id, stored);
        return cloneCompany(stored);
    }

    // eslint-disable-next-line @typescript-eslint/require-await
    async deleteById(id: number): Promise<boolean> {
        return this.rows.delete(id);
    }

    get size(): number {
        return this.rows.size;
    }
}
