import { Controller, Get, Param, Query } from '@nestjs/common';
import { MovementsService } from './movements.service';
import { ListMovementsQuery } from './dto/list-movements.query';

@Controller('api/v1/:tenantId/movements')
export class MovementsController {
  constructor(private readonly movementsService: MovementsService) {}

  @Get()
  list(@Param('tenantId') tenantId: string, @Query() query: ListMovementsQuery) {
    return this.movementsService.findAll(tenantId, query);
  }
}
