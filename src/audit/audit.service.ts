import { Injectable, BadRequestException, ConflictException, InternalServerErrorException, HttpException, Logger } from '@nestjs/common';
import { isConflict } from '../database/couch';
import { addDays, assertIsoDate } from '../common/dates';
import { ProductsService } from '../products/products.service';
import { BatchesService } from '../batches/batches.service';
import type { BatchDoc } from '../batches/batches.types';
import { rankCandidates } from './audit-scoring';
import { AuditRecommendation, RecommendationRequest } from './audit.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const CHECK_ATTEMPTS = 3;

function assertWindowDays(value: number, field: string) {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new BadRequestException({ key: 'audit.invalid_window', vars: { field, value } });
    }
}

@Injectable()
export class AuditService {
    private readonly logger = new Logger(AuditService.name);

    constructor(
        private readonly batchesService: BatchesService,
        private readonly productsService: ProductsService,
    ) { }

    /**
     * Batches worth a physical inspection, most urgent first.
     *
     * Candidates come from two reads (expiry window and inspection staleness)
     * merged by batch id. Scoring measures expiry and staleness from
     * `baseDate`; the staleness read itself is cut at `now`.
     */
    async recommend(
        tenantId: string,
        request: RecommendationRequest,
        now: Date = new Date(),
    ): Promise<AuditRecommendation[]> {
        const { limit, expiringWithinDays, staleAfterDays } = request;
        const baseDate = assertIsoDate(request.baseDate, 'date');
        assertWindowDays(expiringWithinDays, 'expiringDays');
        assertWindowDays(staleAfterDays, 'staleDays');
        if (limit <= 0) return [];

        const expiryCutoff = addDays(baseDate, expiringWithinDays);
        const staleCutoff = new Date(now.getTime() - staleAfterDays * DAY_MS).toISOString();

        const [byExpiry, byStaleCheck] = await Promise.all([
            this.batchesService.findAuditCandidatesByExpiry(tenantId, expiryCutoff),
            this.batchesService.findAuditCandidatesByStaleCheck(tenantId, staleCutoff),
        ]);

        const merged = new Map<string, BatchDoc>();
        for (const batch of [...byExpiry, ...byStaleCheck]) {
            merged.set(batch._id, batch);
        }

        const ranked = rankCandidates(merged.values(), { baseDate, expiringWithinDays, staleAfterDays }, limit);
        const products = await this.productsService.findMany(tenantId, ranked.map((r) => r.batch.productId));

        return ranked.map(({ batch, score, reasons, daysUntilExpiry }) => {
            const product = products.get(batch.productId);
            return {
                batchId: batch.batchId,
                productId: product?.productId ?? batch.productId,
                productName: product?.name ?? null,
                expiryDate: batch.expiryDate,
                quantity: batch.quantity,
                lastCheckedAt: batch.lastCheckedAt,
                daysUntilExpiry,
                score,
                reasons,
            };
        });
    }

    /** Records a physical inspection of the batch. The only writer of `lastCheckedAt`. */
    async markChecked(tenantId: string, batchId: string, checkedAt: Date = new Date()): Promise<BatchDoc> {
        if (Number.isNaN(checkedAt.getTime())) {
            throw new BadRequestException({ key: 'date.invalid_timestamp', vars: { field: 'checkedAt' } });
        }
        const timestamp = checkedAt.toISOString();

        for (let attempt = 1; ; attempt++) {
            const batch = await this.batchesService.findOne(tenantId, batchId);
            try {
                return await this.batchesService.save({ ...batch, lastCheckedAt: timestamp });
            } catch (error) {
                if (error instanceof HttpException) throw error;
                if (isConflict(error)) {
                    if (attempt < CHECK_ATTEMPTS) continue;
                    throw new ConflictException({ key: 'batch.check_conflict', vars: { id: batchId } });
                }
                this.logger.error('Failed to record batch check', error);
                throw new InternalServerErrorException({ key: 'batch.update_failed' });
            }
        }
    }
}
