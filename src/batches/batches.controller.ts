import {
  Controller,
  Post,
  Get,
  Param,
  Query,
  Body,
} from '@nestjs/common';
import { BatchesService } from './batches.service';
import { ReceiveBatchDto } from './dto/receive-batch.dto';
import { ExpiringBatchesQuery, ListBatchesQuery } from './dto/batch-query.dto';

@Controller('api/v1/:tenantId/batches')
export class BatchesController {
  constructor(private readonly batchesService: BatchesService) {}

  @Post('receive')
  receive(@Param('tenantId') tenantId: string, @Body() receiveBatchDto: ReceiveBatchDto) {
    return this.batchesService.receive(tenantId, receiveBatchDto);
  }

  @Get()
  findByProduct(@Param('tenantId') tenantId: string, @Query() query: ListBatchesQuery) {
    return this.batchesService.findByProduct(tenantId, query.productId);
  }

  @Get('expiring')
  findExpiring(@Param('tenantId') tenantId: string, @Query() query: ExpiringBatchesQuery) {
    return this.batchesService.findExpiring(tenantId, query.date);
  }

  @Get(':id')
  findOne(@Param('tenantId') tenantId: string, @Param('id') id: string) {
    return this.batchesService.findOne(tenantId, id);
  }
}
