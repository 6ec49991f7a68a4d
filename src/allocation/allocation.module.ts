import { Module } from '@nestjs/common';
import { AllocationService } from './allocation.service';
import { AllocationController } from './allocation.controller';
import { ProductsModule } from '../products/products.module';
import { BatchesModule } from '../batches/batches.module';
import { MovementsModule } from '../movements/movements.module';

@Module({
  imports: [ProductsModule, BatchesModule, MovementsModule],
  providers: [AllocationService],
  controllers: [AllocationController],
  exports: [AllocationService],
})
export class AllocationModule {}
