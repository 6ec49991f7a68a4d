export enum ProductStatus {
    ACTIVE = 'ACTIVE',
    DISCONTINUED = 'DISCONTINUED',
    PAUSED = 'PAUSED',
}

export interface ProductDoc {
    _id: string; // tenant:product:uuid
    _rev?: string;
    type: 'product';
    tenantId: string;
    productId: string;

    name: string;
    price: number; // minor currency units
    barcode: string;
    unitsPerPackage: number;
    status: ProductStatus;

    createdAt: string;
    updatedAt: string;
}
