import {
  Controller,
  Post,
  Get,
  Patch,
  Param,
  Body,
  Query,
} from '@nestjs/common';
import { ProductsService } from './products.service';
import { CreateProductDto } from './dto/create-product.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import { ListProductsQuery } from './dto/list-products.query';

@Controller('api/v1/:tenantId/products')
export class ProductsController {
  constructor(private readonly productsService: ProductsService) {}

  @Post()
  create(
    @Param('tenantId') tenantId: string,
    @Body() createProductDto: CreateProductDto,
  ) {
    return this.productsService.create(tenantId, createProductDto);
  }

  @Get()
  findAll(@Param('tenantId') tenantId: string, @Query() query: ListProductsQuery) {
    return this.productsService.findAll(tenantId, query.status);
  }

  @Get('barcode/:barcode')
  findByBarcode(
    @Param('tenantId') tenantId: string,
    @Param('barcode') barcode: string,
  ) {
    return this.productsService.findByBarcode(tenantId, barcode);
  }

  @Get(':id')
  findOne(@Param('tenantId') tenantId: string, @Param('id') id: string) {
    return this.productsService.findOne(tenantId, id);
  }

  @Patch(':id')
  update(
    @Param('tenantId') tenantId: string,
    @Param('id') id: string,
    @Body() updateProductDto: UpdateProductDto,
  ) {
    return this.productsService.update(tenantId, id, updateProductDto);
  }

  @Patch(':id/discontinue')
  discontinue(@Param('tenantId') tenantId: string, @Param('id') id: string) {
    return this.productsService.discontinue(tenantId, id);
  }

  @Patch(':id/activate')
  activate(@Param('tenantId') tenantId: string, @Param('id') id: string) {
    return this.productsService.activate(tenantId, id);
  }

  @Patch(':id/pause')
  pause(@Param('tenantId') tenantId: string, @Param('id') id: string) {
    return this.productsService.pause(tenantId, id);
  }
}
