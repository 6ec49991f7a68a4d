import type { BatchDoc } from '../src/batches/batches.types';
import type { ProductDoc } from '../src/products/products.types';
import { ProductStatus } from '../src/products/products.types';

export const TENANT = 'tenant1';

export function product(id: string, overrides: Partial<ProductDoc> = {}): ProductDoc {
    return {
        _id: `${TENANT}:product:${id}`,
        type: 'product',
        tenantId: TENANT,
        productId: id,
        name: `Product ${id}`,
        price: 1500,
        barcode: `880000${id}`,
        unitsPerPackage: 1,
        status: ProductStatus.ACTIVE,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
        ...overrides,
    };
}

let sequence = 0;

export function batch(id: string, productId: string, quantity: number, expiryDate: string, overrides: Partial<BatchDoc> = {}): BatchDoc {
    sequence++;
    return {
        _id: `${TENANT}:batch:${id}`,
        type: 'batch',
        tenantId: TENANT,
        batchId: id,
        productId: `${TENANT}:product:${productId}`,
        quantityReceived: quantity,
        quantity,
        expiryDate,
        receivedDate: '2024-01-01',
        lastCheckedAt: null,
        sequence: `2024-01-01T00:00:00.000Z:${String(sequence).padStart(6, '0')}`,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
        ...overrides,
    };
}
