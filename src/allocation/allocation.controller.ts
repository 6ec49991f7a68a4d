import { Controller, Post, Param, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { AllocationService } from './allocation.service';
import { ConsumeForSaleDto, DisposeExpiredDto, WithdrawStockDto } from './dto/allocation.dto';

@Controller('api/v1/:tenantId/allocations')
export class AllocationController {
  constructor(private readonly allocationService: AllocationService) {}

  @Post('withdraw')
  @HttpCode(HttpStatus.OK)
  withdraw(@Param('tenantId') tenantId: string, @Body() dto: WithdrawStockDto) {
    return this.allocationService.withdraw(tenantId, dto.productId, dto.quantity, dto.reason, dto.note);
  }

  @Post('sale')
  @HttpCode(HttpStatus.OK)
  consumeForSale(@Param('tenantId') tenantId: string, @Body() dto: ConsumeForSaleDto) {
    return this.allocationService.consumeForSale(tenantId, dto.productId, dto.quantity, dto.saleDate);
  }

  @Post('dispose-expired')
  @HttpCode(HttpStatus.OK)
  disposeExpired(@Param('tenantId') tenantId: string, @Body() dto: DisposeExpiredDto) {
    return this.allocationService.disposeExpired(tenantId, dto.date, dto.note);
  }
}
