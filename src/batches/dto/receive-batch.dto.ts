import {
    IsString,
    IsNotEmpty,
    IsInt,
    IsOptional,
    Min,
    Matches,
} from 'class-validator';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class ReceiveBatchDto {
    @IsString()
    @IsNotEmpty()
    productId!: string;

    @IsInt()
    @Min(1)
    quantity!: number;

    @Matches(ISO_DATE, { message: 'expiryDate must be YYYY-MM-DD' })
    expiryDate!: string;

    // Defaults to today
    @IsOptional()
    @Matches(ISO_DATE, { message: 'receivedDate must be YYYY-MM-DD' })
    receivedDate?: string;
}
