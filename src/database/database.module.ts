import { Module } from '@nestjs/common';
import { databaseProvider } from './database.provider';

// ConfigModule is registered globally in AppModule
@Module({
  providers: [databaseProvider],
  exports: [databaseProvider],
})
export class DatabaseModule {}
