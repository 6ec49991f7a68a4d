import { IsOptional, IsString, IsNotEmpty, Matches } from 'class-validator';

export class ListBatchesQuery {
    @IsString()
    @IsNotEmpty()
    productId!: string;
}

export class ExpiringBatchesQuery {
    // Defaults to today
    @IsOptional()
    @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be YYYY-MM-DD' })
    date?: string;
}
