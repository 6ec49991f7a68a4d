import {
    IsString,
    IsNotEmpty,
    IsInt,
    Min,
} from 'class-validator';

export class CreateProductDto {
    @IsString()
    @IsNotEmpty()
    name!: string;

    // Unit price in the store's currency minor unit
    @IsInt()
    @Min(0)
    price!: number;

    @IsString()
    @IsNotEmpty()
    barcode!: string;

    @IsInt()
    @Min(1)
    unitsPerPackage!: number;
}
