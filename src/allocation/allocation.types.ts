import type { BatchDoc } from '../batches/batches.types';
import type { MovementDoc, MovementReason } from '../movements/movements.types';
import type { NewMovement } from '../movements/movements.service';

export interface AllocationRequest {
    productId: string;
    quantity: number;
    // When set, batches expiring before `asOfDate` (default today) are not drawn from
    excludeExpired: boolean;
    asOfDate?: string;
    // When set, one movement is logged per batch touched
    reason?: MovementReason;
    note?: string | null;
}

export interface BatchAllocation {
    batchId: string;
    expiryDate: string;
    taken: number;
    remaining: number;
}

export interface AllocationResult {
    productId: string;
    requested: number;
    allocations: BatchAllocation[];
}

export interface DisposalResult {
    baseDate: string;
    batchCount: number;
    totalDisposed: number;
}

/** What a unit of work needs from the batch store. */
export interface BatchWriter {
    findOne(tenantId: string, id: string): Promise<BatchDoc>;
    save(batch: BatchDoc): Promise<BatchDoc>;
}

/** What a unit of work needs from the movement log. */
export interface MovementWriter {
    append(tenantId: string, entry: NewMovement): Promise<MovementDoc>;
    revoke(entry: MovementDoc): Promise<void>;
}
