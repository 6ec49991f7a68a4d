import {
  Controller,
  Get,
  Param,
  Query,
} from '@nestjs/common';
import { StockService } from './stock.service';
import { StockLevelQuery, StockListQuery } from './dto/stock-query.dto';

@Controller('api/v1/:tenantId/stock')
export class StockController {
  constructor(private readonly stockService: StockService) {}

  @Get(':productId')
  getCurrentLevel(
    @Param('tenantId') tenantId: string,
    @Param('productId') productId: string,
    @Query() query: StockLevelQuery,
  ) {
    return this.stockService.getCurrentLevel(tenantId, productId, query.date);
  }

  @Get()
  getAllStock(@Param('tenantId') tenantId: string, @Query() query: StockListQuery) {
    return this.stockService.getAllStock(tenantId, query.status, query.date);
  }
}
