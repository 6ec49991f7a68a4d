import { ConflictException } from '@nestjs/common';

export class InsufficientStockException extends ConflictException {
    constructor(
        readonly requested: number,
        readonly shortfall: number,
    ) {
        super({ key: 'allocation.insufficient_stock', vars: { requested, shortfall } });
    }
}
