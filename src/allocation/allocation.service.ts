import { Injectable, BadRequestException, ConflictException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isConflict } from '../database/couch';
import { KeyedLock } from '../common/keyed-lock';
import { assertIsoDate, today } from '../common/dates';
import { ProductsService } from '../products/products.service';
import type { ProductDoc } from '../products/products.types';
import { BatchesService } from '../batches/batches.service';
import { MovementsService } from '../movements/movements.service';
import { MovementReason } from '../movements/movements.types';
import { decreaseBatch } from '../batches/batch.model';
import { type EligibilityRule, planAllocation } from './fefo';
import { UnitOfWork } from './unit-of-work';
import { InsufficientStockException } from './insufficient-stock.exception';
import { AllocationRequest, AllocationResult, DisposalResult } from './allocation.types';

const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_DISPOSAL_NOTE = 'Expired stock disposal';

interface LoggedMovement {
    reason: MovementReason;
    note: string | null;
}

/**
 * FEFO allocation engine. Every call plans in memory, then commits through a
 * {@link UnitOfWork}, so callers see either the whole request drawn down or
 * no change at all.
 *
 * Same-product calls are serialised in-process; across processes a stale
 * batch revision surfaces as a conflict and the call is planned again from a
 * fresh read.
 */
@Injectable()
export class AllocationService {
    private readonly logger = new Logger(AllocationService.name);
    private readonly productLocks = new KeyedLock();
    private readonly maxAttempts: number;

    constructor(
        private readonly productsService: ProductsService,
        private readonly batchesService: BatchesService,
        private readonly movementsService: MovementsService,
        configService: ConfigService,
    ) {
        const configured = Number(configService.get<string>('ALLOCATION_MAX_ATTEMPTS'));
        this.maxAttempts = Number.isSafeInteger(configured) && configured > 0 ? configured : DEFAULT_MAX_ATTEMPTS;
    }

    async allocate(tenantId: string, request: AllocationRequest): Promise<AllocationResult> {
        const { quantity } = request;
        if (!Number.isSafeInteger(quantity) || quantity <= 0) {
            throw new BadRequestException({ key: 'allocation.invalid_quantity', vars: { quantity } });
        }
        if (request.reason !== undefined && !Object.values(MovementReason).includes(request.reason)) {
            throw new BadRequestException({ key: 'allocation.invalid_reason', vars: { reason: String(request.reason) } });
        }

        const rule: EligibilityRule = request.excludeExpired
            ? { excludeExpired: true, asOfDate: assertIsoDate(request.asOfDate ?? today(), 'asOfDate') }
            : { excludeExpired: false };
        const movement: LoggedMovement | null = request.reason
            ? { reason: request.reason, note: request.note ?? null }
            : null;

        const product = await this.productsService.findOne(tenantId, request.productId);

        return this.productLocks.run(product._id, () =>
            this.withConflictRetry(product._id, () => this.allocateOnce(tenantId, product, quantity, rule, movement)),
        );
    }

    /** Administrative withdrawal: expired stock is eligible and every take is logged. */
    withdraw(tenantId: string, productId: string, quantity: number, reason: MovementReason, note?: string | null) {
        return this.allocate(tenantId, { productId, quantity, excludeExpired: false, reason, note });
    }

    /**
     * Point-of-sale consumption: expired batches are skipped and nothing is
     * logged here, sales keep their own records.
     */
    consumeForSale(tenantId: string, productId: string, quantity: number, saleDate: string = today()) {
        return this.allocate(tenantId, { productId, quantity, excludeExpired: true, asOfDate: saleDate });
    }

    /**
     * Writes off every stocked batch that expired before `baseDate` as one unit
     * of work: either every batch is zeroed with its WASTE entry or nothing is.
     * All products involved are locked, in id order, for the whole write.
     */
    async disposeExpired(tenantId: string, baseDate: string = today(), note?: string | null): Promise<DisposalResult> {
        const date = assertIsoDate(baseDate, 'date');
        const memo = note && note.trim() ? note : DEFAULT_DISPOSAL_NOTE;

        const expired = await this.batchesService.findExpiredWithStock(tenantId, date);
        const productIds = [...new Set(expired.map((b) => b.productId))].sort();
        if (productIds.length === 0) {
            return { baseDate: date, batchCount: 0, totalDisposed: 0 };
        }

        const { batchCount, totalDisposed } = await this.withProductLocks(productIds, () =>
            this.withConflictRetry(`expired stock before ${date}`, () =>
                this.disposeOnce(tenantId, new Set(productIds), date, memo),
            ),
        );

        if (totalDisposed > 0) {
            this.logger.log(`Disposed ${totalDisposed} expired unit(s) from ${batchCount} batch(es) before ${date}`);
        }
        return { baseDate: date, batchCount, totalDisposed };
    }

    private async allocateOnce(
        tenantId: string,
        product: ProductDoc,
        quantity: number,
        rule: EligibilityRule,
        movement: LoggedMovement | null,
    ): Promise<AllocationResult> {
        const batches = await this.batchesService.findOrderedByProduct(tenantId, product._id);
        const plan = planAllocation(batches, quantity, rule);

        if (plan.shortfall > 0) {
            throw new InsufficientStockException(quantity, plan.shortfall);
        }

        const uow = this.unitOfWork(tenantId);
        for (const take of plan.takes) {
            uow.updateBatch(take.before, take.after);
            if (movement) {
                uow.appendMovement({
                    productId: product._id,
                    batchId: take.before._id,
                    reason: movement.reason,
                    quantity: take.taken,
                    note: movement.note,
                });
            }
        }
        const committed = await uow.commit();

        this.logger.log(
            `Allocated ${quantity} of product ${product.productId} from ${plan.takes.length} batch(es)` +
            (movement ? ` [${movement.reason}]` : ''),
        );

        return {
            productId: product.productId,
            requested: quantity,
            allocations: plan.takes.map((take, i) => ({
                batchId: take.before.batchId,
                expiryDate: take.before.expiryDate,
                taken: take.taken,
                remaining: committed.batches[i].quantity,
            })),
        };
    }

    private async disposeOnce(
        tenantId: string,
        lockedProducts: ReadonlySet<string>,
        date: string,
        note: string,
    ): Promise<Omit<DisposalResult, 'baseDate'>> {
        // Re-read under the locks; a product that turned up since is left for the next run
        const expired = (await this.batchesService.findExpiredWithStock(tenantId, date)).filter((b) =>
            lockedProducts.has(b.productId),
        );
        if (expired.length === 0) return { batchCount: 0, totalDisposed: 0 };

        const uow = this.unitOfWork(tenantId);
        let totalDisposed = 0;
        for (const batch of expired) {
            uow.updateBatch(batch, decreaseBatch(batch, batch.quantity)).appendMovement({
                productId: batch.productId,
                batchId: batch._id,
                reason: MovementReason.WASTE,
                quantity: batch.quantity,
                note,
            });
            totalDisposed += batch.quantity;
        }
        await uow.commit();

        return { batchCount: expired.length, totalDisposed };
    }

    private withProductLocks<T>(productIds: readonly string[], task: () => Promise<T>): Promise<T> {
        const [first, ...rest] = productIds;
        if (first === undefined) return task();
        return this.productLocks.run(first, () => this.withProductLocks(rest, task));
    }

    private unitOfWork(tenantId: string) {
        return new UnitOfWork(tenantId, this.batchesService, this.movementsService, this.logger);
    }

    private async withConflictRetry<T>(key: string, task: () => Promise<T>): Promise<T> {
        for (let attempt = 1; ; attempt++) {
            try {
                return await task();
            } catch (error) {
                if (!isConflict(error)) throw error;
                if (attempt >= this.maxAttempts) {
                    throw new ConflictException({ key: 'allocation.conflict', vars: { attempts: attempt } });
                }
                this.logger.warn(`Revision conflict on ${key}, retrying (${attempt}/${this.maxAttempts})`);
            }
        }
    }
}
