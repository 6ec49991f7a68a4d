import { IsEnum, IsOptional, Matches } from 'class-validator';
import { ProductStatus } from '../../products/products.types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class StockLevelQuery {
  // Defaults to today
  @IsOptional()
  @Matches(ISO_DATE, { message: 'date must be YYYY-MM-DD' })
  date?: string;
}

export class StockListQuery extends StockLevelQuery {
  @IsOptional()
  @IsEnum(ProductStatus)
  status?: ProductStatus;
}
