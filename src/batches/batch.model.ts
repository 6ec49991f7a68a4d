import { BadRequestException } from '@nestjs/common';
import type { BatchDoc } from './batches.types';

function assertPositiveAmount(amount: number) {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
        throw new BadRequestException({ key: 'batch.invalid_amount', vars: { amount } });
    }
}

/*
 * The only two ways a batch quantity may change. Both return a new document
 * and leave the input untouched.
 */

export function decreaseBatch(batch: BatchDoc, amount: number): BatchDoc {
    assertPositiveAmount(amount);
    if (amount > batch.quantity) {
        throw new BadRequestException({
            key: 'batch.quantity_underflow',
            vars: { batchId: batch.batchId, quantity: batch.quantity, amount },
        });
    }
    return { ...batch, quantity: batch.quantity - amount };
}

export function increaseBatch(batch: BatchDoc, amount: number): BatchDoc {
    assertPositiveAmount(amount);
    if (batch.quantity + amount > batch.quantityReceived) {
        throw new BadRequestException({
            key: 'batch.quantity_overflow',
            vars: { batchId: batch.batchId, quantityReceived: batch.quantityReceived, amount },
        });
    }
    return { ...batch, quantity: batch.quantity + amount };
}

/** FEFO order: soonest expiry first, then the batch created first. */
export function compareFefo(a: BatchDoc, b: BatchDoc): number {
    if (a.expiryDate !== b.expiryDate) return a.expiryDate < b.expiryDate ? -1 : 1;
    if (a.sequence !== b.sequence) return a.sequence < b.sequence ? -1 : 1;
    return 0;
}
