import {
    IsString,
    IsNotEmpty,
    IsInt,
    IsEnum,
    IsOptional,
    Min,
    Matches,
    MaxLength,
} from 'class-validator';
import { MovementReason } from '../../movements/movements.types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class WithdrawStockDto {
    @IsString()
    @IsNotEmpty()
    productId!: string;

    @IsInt()
    @Min(1)
    quantity!: number;

    @IsEnum(MovementReason)
    reason!: MovementReason;

    @IsOptional()
    @IsString()
    @MaxLength(500)
    note?: string;
}

export class ConsumeForSaleDto {
    @IsString()
    @IsNotEmpty()
    productId!: string;

    @IsInt()
    @Min(1)
    quantity!: number;

    // Batches expiring before this date are not sold; defaults to today
    @IsOptional()
    @Matches(ISO_DATE, { message: 'saleDate must be YYYY-MM-DD' })
    saleDate?: string;
}

export class DisposeExpiredDto {
    @IsOptional()
    @Matches(ISO_DATE, { message: 'date must be YYYY-MM-DD' })
    date?: string;

    @IsOptional()
    @IsString()
    @MaxLength(500)
    note?: string;
}
