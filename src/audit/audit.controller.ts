import { Controller, Get, Patch, Param, Query, Body } from '@nestjs/common';
import { AuditService } from './audit.service';
import { CheckBatchDto, RecommendationsQuery } from './dto/audit.dto';
import { today } from '../common/dates';

@Controller('api/v1/:tenantId/audit')
export class AuditController {
  constructor(private readonly auditService: AuditService) {}

  @Get('recommendations')
  getRecommendations(@Param('tenantId') tenantId: string, @Query() query: RecommendationsQuery) {
    return this.auditService.recommend(tenantId, {
      baseDate: query.date ?? today(),
      expiringWithinDays: query.expiringDays,
      staleAfterDays: query.staleDays,
      limit: query.limit,
    });
  }

  @Patch('batches/:id/check')
  markChecked(
    @Param('tenantId') tenantId: string,
    @Param('id') id: string,
    @Body() dto: CheckBatchDto,
  ) {
    return this.auditService.markChecked(tenantId, id, dto.checkedAt ? new Date(dto.checkedAt) : undefined);
  }
}
