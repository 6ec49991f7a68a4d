export interface BatchDoc {
    _id: string; // tenant:batch:uuid
    _rev?: string;
    type: 'batch';
    tenantId: string;
    batchId: string;
    productId: string; // tenant:product:uuid

    quantityReceived: number;
    quantity: number; // remaining

    expiryDate: string; // YYYY-MM-DD
    receivedDate: string; // YYYY-MM-DD
    lastCheckedAt: string | null; // ISO timestamp, null = never inspected

    // Creation order, used to break FEFO ties between batches expiring the same day
    sequence: string;

    createdAt: string;
    updatedAt: string;
}

export interface ReceiveBatchInput {
    productId: string;
    quantity: number;
    expiryDate: string;
    receivedDate?: string;
}

export interface ExpiringBatch {
    batchId: string;
    productId: string;
    productName: string | null;
    quantity: number;
    expiryDate: string;
    daysToExpiry: number; // relative to the requested date; negative once expired
}
