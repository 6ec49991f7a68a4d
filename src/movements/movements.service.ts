import { Injectable, Inject, Logger, InternalServerErrorException } from '@nestjs/common';
import type { MangoQuery, MangoSelector } from 'nano';
import { v4 as uuidv4 } from 'uuid';
import { DATABASE_CONNECTION } from '../database/database.constants';
import { type CouchDatabase, type StoreDocument, docId, findAllDocs, isMovementDoc } from '../database/couch';
import { MovementDoc, MovementQuery, MovementReason } from './movements.types';

export interface NewMovement {
    productId: string;
    batchId: string | null;
    reason: MovementReason;
    quantity: number;
    note?: string | null;
    occurredAt?: string;
}

const NEWEST_FIRST: MangoQuery['sort'] = [{ type: 'desc' }, { occurredAt: 'desc' }];

@Injectable()
export class MovementsService {
    private readonly logger = new Logger(MovementsService.name);

    constructor(@Inject(DATABASE_CONNECTION) private readonly db: CouchDatabase) { }

    async append(tenantId: string, entry: NewMovement): Promise<MovementDoc> {
        const movementId = uuidv4();
        const doc: MovementDoc = {
            _id: `${tenantId}:movement:${movementId}`,
            type: 'movement',
            tenantId,
            movementId,
            productId: entry.productId,
            batchId: entry.batchId,
            reason: entry.reason,
            quantity: entry.quantity,
            note: entry.note ?? null,
            occurredAt: entry.occurredAt ?? new Date().toISOString(),
        };

        try {
            const res = await this.db.insert(doc);
            return { ...doc, _rev: res.rev };
        } catch (error) {
            this.logger.error('Failed to record movement', error);
            throw new InternalServerErrorException({ key: 'movement.create_failed' });
        }
    }

    /**
     * Removes an entry written by a unit of work that did not complete.
     * Committed movements are never revoked.
     */
    async revoke(entry: MovementDoc): Promise<void> {
        if (!entry._rev) return;
        await this.db.destroy(entry._id, entry._rev);
    }

    /** Newest first, through the `type, occurredAt` index. */
    async findAll(tenantId: string, opts: MovementQuery = {}): Promise<MovementDoc[]> {
        // occurredAt has to appear in the selector for the sort index to be picked
        const selector: MangoSelector = { type: 'movement', occurredAt: { $gt: null } };
        if (opts.productId) selector.productId = docId(tenantId, 'product', opts.productId);
        if (opts.batchId) selector.batchId = docId(tenantId, 'batch', opts.batchId);
        if (opts.reason) selector.reason = opts.reason;

        try {
            let docs: StoreDocument[];
            if (typeof opts.limit === 'number') {
                const result = await this.db.partitionedFind(tenantId, {
                    selector,
                    sort: NEWEST_FIRST,
                    limit: opts.limit,
                    skip: opts.skip ?? 0,
                });
                docs = result.docs;
            } else {
                const all = await findAllDocs(this.db, tenantId, selector, NEWEST_FIRST);
                docs = all.slice(opts.skip ?? 0);
            }
            return docs.filter(isMovementDoc);
        } catch (error) {
            this.logger.error('Failed to query movements', error);
            throw new InternalServerErrorException({ key: 'movement.list_failed' });
        }
    }
}
