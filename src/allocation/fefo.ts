import { compareFefo, decreaseBatch } from '../batches/batch.model';
import type { BatchDoc } from '../batches/batches.types';

export type EligibilityRule =
    | { excludeExpired: false }
    | { excludeExpired: true; asOfDate: string };

export interface PlannedTake {
    before: BatchDoc;
    after: BatchDoc;
    taken: number;
}

export interface AllocationPlan {
    takes: PlannedTake[];
    shortfall: number;
}

/**
 * Walks batches soonest-expiry first and takes what each can give until the
 * request is covered. Nothing is written; a positive `shortfall` means the
 * eligible stock could not cover the request.
 *
 * A batch expiring on `asOfDate` is still eligible.
 */
export function planAllocation(batches: readonly BatchDoc[], requested: number, rule: EligibilityRule): AllocationPlan {
    const takes: PlannedTake[] = [];
    let stillNeeded = requested;

    for (const batch of [...batches].sort(compareFefo)) {
        if (stillNeeded === 0) break;
        if (batch.quantity <= 0) continue;
        if (rule.excludeExpired && batch.expiryDate < rule.asOfDate) continue;

        const taken = Math.min(batch.quantity, stillNeeded);
        takes.push({ before: batch, after: decreaseBatch(batch, taken), taken });
        stillNeeded -= taken;
    }

    return { takes, shortfall: stillNeeded };
}
