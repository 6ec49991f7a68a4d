export enum MovementReason {
    ADJUSTMENT = 'ADJUSTMENT', // manual count correction
    WASTE = 'WASTE', // expired or spoiled
    DAMAGE = 'DAMAGE',
    LOSS = 'LOSS', // theft, missing
}

/**
 * Append-only record of stock removed outside of a sale.
 * Sales are recorded by the sales side and never produce movements.
 */
export interface MovementDoc {
    _id: string; // tenant:movement:uuid
    _rev?: string;
    type: 'movement';
    tenantId: string;
    movementId: string;

    productId: string;
    batchId: string | null; // null when the batch cannot be attributed
    reason: MovementReason;
    quantity: number; // always positive
    note: string | null;

    occurredAt: string;
}

export interface MovementQuery {
    productId?: string;
    batchId?: string;
    reason?: MovementReason;
    limit?: number;
    skip?: number;
}
