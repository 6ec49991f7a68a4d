import { IsEnum, IsOptional } from 'class-validator';
import { ProductStatus } from '../products.types';

export class ListProductsQuery {
  @IsOptional()
  @IsEnum(ProductStatus)
  status?: ProductStatus;
}
