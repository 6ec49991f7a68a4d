import { Module } from '@nestjs/common';
import { AuditService } from './audit.service';
import { AuditController } from './audit.controller';
import { ProductsModule } from '../products/products.module';
import { BatchesModule } from '../batches/batches.module';

@Module({
  imports: [ProductsModule, BatchesModule],
  providers: [AuditService],
  controllers: [AuditController],
})
export class AuditModule {}
