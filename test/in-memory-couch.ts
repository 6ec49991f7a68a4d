import type { MangoQuery, MangoSelector } from 'nano';
import type { StoreDocument } from '../src/database/couch';

export class CouchError extends Error {
    constructor(
        readonly statusCode: number,
        readonly error: string,
    ) {
        super(`${statusCode} ${error}`);
    }
}

type StoredDocument = StoreDocument & { _rev: string };

const OPERATORS = new Set(['$eq', '$gt', '$gte', '$lt', '$lte', '$in']);

function fieldsOf(doc: StoreDocument): Map<string, unknown> {
    return new Map<string, unknown>(Object.entries(doc));
}

// CouchDB collation puts null below every other value; a missing field never matches
function compare(a: unknown, b: unknown): number | null {
    if (a === undefined || b === undefined) return null;
    if (a === null || b === null) return a === b ? 0 : a === null ? -1 : 1;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
    return null;
}

function matchesCondition(value: unknown, condition: unknown): boolean {
    if (condition === null || typeof condition !== 'object' || Array.isArray(condition)) {
        return value === condition || (condition === null && value === undefined);
    }
    const ops = Object.entries(condition);
    if (!ops.every(([op]) => OPERATORS.has(op))) {
        throw new Error(`Unsupported selector ${JSON.stringify(condition)}`);
    }
    return ops.every(([op, operand]) => {
        if (op === '$eq') return value === operand;
        if (op === '$in') return Array.isArray(operand) && operand.includes(value);
        const order = compare(value, operand);
        if (order === null) return false;
        if (op === '$gt') return order > 0;
        if (op === '$gte') return order >= 0;
        if (op === '$lt') return order < 0;
        return order <= 0;
    });
}

function isSelector(value: unknown): value is MangoSelector {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sortKeys(sort: MangoQuery['sort']): Array<[string, number]> {
    const keys: Array<[string, number]> = [];
    for (const entry of sort ?? []) {
        if (typeof entry === 'string') {
            keys.push([entry, 1]);
        } else if (isSelector(entry)) {
            for (const [field, direction] of Object.entries(entry)) {
                keys.push([field, direction === 'desc' ? -1 : 1]);
            }
        }
    }
    return keys;
}

function matches(doc: StoreDocument, selector: MangoSelector): boolean {
    const fields = fieldsOf(doc);
    return Object.entries(selector).every(([key, condition]) => {
        if (key === '$or') {
            return Array.isArray(condition) && condition.some((sub: unknown) => isSelector(sub) && matches(doc, sub));
        }
        return matchesCondition(fields.get(key), condition);
    });
}

/**
 * Just enough of a partitioned CouchDB database for the services: revisioned
 * writes with 409 on stale revisions, Mango selectors with the operators the
 * code uses, `sort`, and bookmark paging.
 */
export class InMemoryCouch {
    private readonly docs = new Map<string, StoredDocument>();
    private revisions = 0;

    /** Runs before every insert; throw from it to simulate a failed write. */
    beforeInsert: ((doc: StoreDocument) => void) | null = null;

    readonly calls = { insert: 0, destroy: 0 };

    seed(...docs: StoreDocument[]): this {
        for (const doc of docs) {
            this.docs.set(doc._id, { ...doc, _rev: this.nextRev() });
        }
        return this;
    }

    doc(id: string): StoredDocument | undefined {
        const found = this.docs.get(id);
        return found ? { ...found } : undefined;
    }

    all(): StoreDocument[] {
        return [...this.docs.values()].map((d) => ({ ...d }));
    }

    async get(id: string): Promise<StoredDocument> {
        await Promise.resolve();
        const found = this.docs.get(id);
        if (!found) throw new CouchError(404, 'not_found');
        return { ...found };
    }

    async insert(doc: StoreDocument): Promise<{ ok: boolean; id: string; rev: string }> {
        await Promise.resolve();
        this.calls.insert++;
        this.beforeInsert?.(doc);

        const existing = this.docs.get(doc._id);
        if (existing ? existing._rev !== doc._rev : doc._rev !== undefined) {
            throw new CouchError(409, 'conflict');
        }

        const rev = this.nextRev();
        this.docs.set(doc._id, { ...doc, _rev: rev });
        return { ok: true, id: doc._id, rev };
    }

    async destroy(id: string, rev: string): Promise<{ ok: boolean; id: string; rev: string }> {
        await Promise.resolve();
        this.calls.destroy++;
        const existing = this.docs.get(id);
        if (!existing) throw new CouchError(404, 'not_found');
        if (existing._rev !== rev) throw new CouchError(409, 'conflict');
        this.docs.delete(id);
        return { ok: true, id, rev: this.nextRev() };
    }

    async partitionedFind(partition: string, query: MangoQuery): Promise<{ docs: StoredDocument[]; bookmark: string }> {
        await Promise.resolve();
        const start = query.bookmark ? Number(query.bookmark) : query.skip ?? 0;
        const limit = query.limit ?? 25;

        const hits = [...this.docs.values()].filter(
            (doc) => doc._id.startsWith(`${partition}:`) && matches(doc, query.selector),
        );
        const keys = sortKeys(query.sort);
        if (keys.length > 0) {
            hits.sort((a, b) => {
                const left = fieldsOf(a);
                const right = fieldsOf(b);
                for (const [field, direction] of keys) {
                    const order = compare(left.get(field), right.get(field)) ?? 0;
                    if (order !== 0) return order * direction;
                }
                return 0;
            });
        }
        const page = hits.slice(start, start + limit).map((d) => ({ ...d }));
        return { docs: page, bookmark: String(start + page.length) };
    }

    private nextRev(): string {
        this.revisions++;
        return `${this.revisions}-${this.revisions.toString(16).padStart(8, '0')}`;
    }
}
