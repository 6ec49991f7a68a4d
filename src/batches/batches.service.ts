import { Injectable, Inject, NotFoundException, BadRequestException, InternalServerErrorException, Logger } from '@nestjs/common';
import type { MangoSelector } from 'nano';
import { v4 as uuidv4 } from 'uuid';
import { DATABASE_CONNECTION } from '../database/database.constants';
import { type CouchDatabase, type StoreDocument, docId, findAllDocs, isBatchDoc, isNotFound } from '../database/couch';
import { assertIsoDate, daysBetween, today } from '../common/dates';
import { ProductsService } from '../products/products.service';
import { ProductStatus } from '../products/products.types';
import { compareFefo } from './batch.model';
import { BatchDoc, ExpiringBatch, ReceiveBatchInput } from './batches.types';

/**
 * Batch store. Reads come back in FEFO order unless stated otherwise; quantity
 * writes go through {@link save} with the revision the caller read.
 */
@Injectable()
export class BatchesService {
    private readonly logger = new Logger(BatchesService.name);
    private lastSequenceMs = 0;

    constructor(
        @Inject(DATABASE_CONNECTION) private readonly db: CouchDatabase,
        private readonly productsService: ProductsService,
    ) { }

    async receive(tenantId: string, input: ReceiveBatchInput): Promise<BatchDoc> {
        const product = await this.productsService.findOne(tenantId, input.productId);

        if (product.status === ProductStatus.DISCONTINUED) {
            throw new BadRequestException({ key: 'product.discontinued', vars: { productId: product.productId } });
        }
        if (!Number.isSafeInteger(input.quantity) || input.quantity < 1) {
            throw new BadRequestException({ key: 'batch.invalid_amount', vars: { amount: input.quantity } });
        }

        const expiryDate = assertIsoDate(input.expiryDate, 'expiryDate');
        const receivedDate = input.receivedDate ? assertIsoDate(input.receivedDate, 'receivedDate') : today();
        if (expiryDate < receivedDate) {
            throw new BadRequestException({ key: 'batch.expiry_before_received', vars: { expiryDate, receivedDate } });
        }

        const now = new Date().toISOString();
        const batchId = uuidv4();
        const newBatch: BatchDoc = {
            _id: `${tenantId}:batch:${batchId}`,
            type: 'batch',
            tenantId,
            batchId,
            productId: product._id,
            quantityReceived: input.quantity,
            quantity: input.quantity,
            expiryDate,
            receivedDate,
            lastCheckedAt: null,
            sequence: this.nextSequence(batchId),
            createdAt: now,
            updatedAt: now,
        };

        try {
            const response = await this.db.insert(newBatch);
            this.logger.log(`Received batch ${batchId}: ${input.quantity} x ${product.productId}, expires ${expiryDate}`);
            return { ...newBatch, _rev: response.rev };
        } catch (error) {
            this.logger.error('Failed to create batch', error);
            throw new InternalServerErrorException({ key: 'batch.create_failed' });
        }
    }

    async findOne(tenantId: string, id: string): Promise<BatchDoc> {
        let doc: StoreDocument;
        try {
            doc = await this.db.get(docId(tenantId, 'batch', id));
        } catch (error) {
            if (isNotFound(error)) {
                throw new NotFoundException({ key: 'batch.not_found', vars: { id } });
            }
            this.logger.error('Failed to load batch', error);
            throw new InternalServerErrorException({ key: 'batch.query_failed' });
        }
        if (!isBatchDoc(doc)) {
            throw new NotFoundException({ key: 'batch.not_found', vars: { id } });
        }
        return doc;
    }

    /** All batches of a known product, dormant ones included. */
    async findByProduct(tenantId: string, productId: string): Promise<BatchDoc[]> {
        const product = await this.productsService.findOne(tenantId, productId);
        return this.findOrderedByProduct(tenantId, product._id);
    }

    findOrderedByProduct(tenantId: string, productDocId: string): Promise<BatchDoc[]> {
        return this.query(tenantId, { type: 'batch', productId: productDocId });
    }

    /** Batches with expiry on or before `date`, soonest first. */
    async findExpiring(tenantId: string, date: string = today()): Promise<ExpiringBatch[]> {
        const baseDate = assertIsoDate(date, 'date');
        const batches = await this.query(tenantId, {
            type: 'batch',
            expiryDate: { $lte: baseDate },
        });
        const products = await this.productsService.findMany(tenantId, batches.map((b) => b.productId));

        return batches
            .map((b) => ({
                batchId: b.batchId,
                productId: products.get(b.productId)?.productId ?? b.productId,
                productName: products.get(b.productId)?.name ?? null,
                quantity: b.quantity,
                expiryDate: b.expiryDate,
                daysToExpiry: daysBetween(baseDate, b.expiryDate),
            }))
            .sort((a, b) => a.daysToExpiry - b.daysToExpiry);
    }

    /** Stocked batches whose expiry is strictly before `date`. */
    findExpiredWithStock(tenantId: string, date: string): Promise<BatchDoc[]> {
        return this.query(tenantId, {
            type: 'batch',
            quantity: { $gt: 0 },
            expiryDate: { $lt: date },
        });
    }

    /** Stocked batches still sellable on `date` (expiring that day included). */
    findSellable(tenantId: string, date: string): Promise<BatchDoc[]> {
        return this.query(tenantId, {
            type: 'batch',
            quantity: { $gt: 0 },
            expiryDate: { $gte: date },
        });
    }

    findAuditCandidatesByExpiry(tenantId: string, cutoff: string): Promise<BatchDoc[]> {
        return this.query(tenantId, {
            type: 'batch',
            quantity: { $gt: 0 },
            expiryDate: { $lte: cutoff },
        });
    }

    /** Stocked batches never inspected, or last inspected at or before `cutoff`. */
    findAuditCandidatesByStaleCheck(tenantId: string, cutoff: string): Promise<BatchDoc[]> {
        return this.query(tenantId, {
            type: 'batch',
            quantity: { $gt: 0 },
            $or: [{ lastCheckedAt: null }, { lastCheckedAt: { $lte: cutoff } }],
        });
    }

    /**
     * Writes a batch under the revision it carries. A stale revision rejects
     * with CouchDB's 409, which is left for the caller to handle.
     */
    async save(batch: BatchDoc): Promise<BatchDoc> {
        const updated = { ...batch, updatedAt: new Date().toISOString() };
        const res = await this.db.insert(updated);
        return { ...updated, _rev: res.rev };
    }

    // Strictly increasing within this process, so two batches received in the
    // same millisecond still keep their arrival order
    private nextSequence(batchId: string): string {
        this.lastSequenceMs = Math.max(Date.now(), this.lastSequenceMs + 1);
        return `${new Date(this.lastSequenceMs).toISOString()}:${batchId}`;
    }

    private async query(tenantId: string, selector: MangoSelector): Promise<BatchDoc[]> {
        try {
            const docs = await findAllDocs(this.db, tenantId, selector);
            return docs.filter(isBatchDoc).sort(compareFefo);
        } catch (error) {
            this.logger.error('Failed to query batches', error);
            throw new InternalServerErrorException({ key: 'batch.query_failed' });
        }
    }
}
