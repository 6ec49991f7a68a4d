import type { DocumentScope, MangoQuery, MangoSelector } from 'nano';
import type { ProductDoc } from '../products/products.types';
import type { BatchDoc } from '../batches/batches.types';
import type { MovementDoc } from '../movements/movements.types';

export type StoreDocument = ProductDoc | BatchDoc | MovementDoc;

export type CouchDatabase = DocumentScope<StoreDocument>;

// Mango answers 25 rows unless told otherwise
export const PAGE_SIZE = 200;

export function hasStatusCode(error: unknown, statusCode: number): boolean {
    return (
        typeof error === 'object' &&
        error !== null &&
        'statusCode' in error &&
        error.statusCode === statusCode
    );
}

export const isNotFound = (error: unknown) => hasStatusCode(error, 404);

export const isConflict = (error: unknown) => hasStatusCode(error, 409);

export function docId(tenantId: string, kind: StoreDocument['type'], id: string): string {
    return id.includes(':') ? id : `${tenantId}:${kind}:${id}`;
}

/**
 * Runs a partitioned Mango query and follows bookmarks until every match is read.
 * A `sort` needs an index covering its fields.
 */
export async function findAllDocs(
    db: CouchDatabase,
    partition: string,
    selector: MangoSelector,
    sort?: MangoQuery['sort'],
): Promise<StoreDocument[]> {
    const docs: StoreDocument[] = [];
    let bookmark: string | undefined;

    for (;;) {
        const page = await db.partitionedFind(partition, {
            selector,
            limit: PAGE_SIZE,
            ...(sort ? { sort } : {}),
            ...(bookmark ? { bookmark } : {}),
        });
        docs.push(...page.docs);

        if (page.docs.length < PAGE_SIZE || !page.bookmark) {
            return docs;
        }
        bookmark = page.bookmark;
    }
}

export const isProductDoc = (doc: StoreDocument): doc is ProductDoc => doc.type === 'product';

export const isBatchDoc = (doc: StoreDocument): doc is BatchDoc => doc.type === 'batch';

export const isMovementDoc = (doc: StoreDocument): doc is MovementDoc => doc.type === 'movement';
