import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module';
import { I18nModule } from './i18n/i18n.module';
import { ProductsModule } from './products/products.module';
import { BatchesModule } from './batches/batches.module';
import { MovementsModule } from './movements/movements.module';
import { AllocationModule } from './allocation/allocation.module';
import { AuditModule } from './audit/audit.module';
import { StockModule } from './stock/stock.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    I18nModule,
    DatabaseModule,
    ProductsModule,
    BatchesModule,
    MovementsModule,
    AllocationModule,
    AuditModule,
    StockModule,
  ],
})
export class AppModule { }
