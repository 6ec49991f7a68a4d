import { Injectable } from '@nestjs/common';
import { assertIsoDate, today } from '../common/dates';
import { ProductsService } from '../products/products.service';
import { ProductStatus } from '../products/products.types';
import { BatchesService } from '../batches/batches.service';
import { StockLevel, StockSummary } from './stock.types';

/**
 * Stock figures are always summed from batch quantities at read time; no
 * running total is kept anywhere.
 */
@Injectable()
export class StockService {
  constructor(
    private readonly productsService: ProductsService,
    private readonly batchesService: BatchesService,
  ) {}

  async getCurrentLevel(tenantId: string, productId: string, date: string = today()): Promise<StockLevel> {
    const asOf = assertIsoDate(date, 'date');
    const product = await this.productsService.findOne(tenantId, productId);
    const batches = await this.batchesService.findOrderedByProduct(tenantId, product._id);

    let onHandQuantity = 0;
    let sellableQuantity = 0;
    for (const batch of batches) {
      if (batch.quantity <= 0) continue;
      onHandQuantity += batch.quantity;
      // A batch expiring today can still be sold today
      if (batch.expiryDate >= asOf) sellableQuantity += batch.quantity;
    }

    return {
      productId: product.productId,
      productName: product.name,
      sellableQuantity,
      onHandQuantity,
      asOf,
    };
  }

  /** One row per product in `status`, including products with nothing to sell. */
  async getAllStock(
    tenantId: string,
    status: ProductStatus = ProductStatus.ACTIVE,
    date: string = today(),
  ): Promise<StockSummary[]> {
    const asOf = assertIsoDate(date, 'date');
    const [products, sellable] = await Promise.all([
      this.productsService.findAll(tenantId, status),
      this.batchesService.findSellable(tenantId, asOf),
    ]);

    const totals = new Map<string, number>();
    for (const batch of sellable) {
      totals.set(batch.productId, (totals.get(batch.productId) ?? 0) + batch.quantity);
    }

    return products.map((product) => ({
      productId: product.productId,
      productName: product.name,
      sellableQuantity: totals.get(product._id) ?? 0,
    }));
  }
}
