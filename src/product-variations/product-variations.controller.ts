import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import {
  CreateProductOptionDto,
  CreateProductOptionValueDto,
  CreateProductVariantDto,
  CreateProductVariationDto,
  UpdateProductOptionDto,
  UpdateProductOptionValueDto,
  UpdateProductVariantDto,
} from './dto/product-variations.dto';
import {
  ReadableProductOption,
  ReadableProductOptionValue,
  ReadableProductVariant,
  ReadableProductVariation,
} from './entities/product-variations.entity';
import { ProductOptionsService } from './product-options.service';
import { ProductVariantsService } from './product-variants.service';

@Controller('stores/:store')
export class ProductVariationsController {
  constructor(
    private readonly productOptionsService: ProductOptionsService,
    private readonly productVariantsService: ProductVariantsService,
  ) {}

  @Get('product-options')
  async listOptions(@Param('store') store: string): Promise<ReadableProductOption[]> {
    return this.productOptionsService.listOptions(store);
  }

  @Post('product-options')
  @UseGuards(SupabaseAuthGuard)
  async createOption(@Param('store') store: string, @Body() dto: CreateProductOptionDto): Promise<ReadableProductOption> {
    return this.productOptionsService.createOption(store, dto);
  }

  @Put('product-options/:id')
  @UseGuards(SupabaseAuthGuard)
  async updateOption(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateProductOptionDto,
  ): Promise<ReadableProductOption> {
    return this.productOptionsService.updateOption(store, id, dto);
  }

  @Delete('product-options/:id')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteOption(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.productOptionsService.deleteOption(store, id);
  }

  @Get('product-option-values')
  async listOptionValues(@Param('store') store: string): Promise<ReadableProductOptionValue[]> {
    return this.productOptionsService.listOptionValues(store);
  }

  @Post('product-option-values')
  @UseGuards(SupabaseAuthGuard)
  async createOptionValue(
    @Param('store') store: string,
    @Body() dto: CreateProductOptionValueDto,
  ): Promise<ReadableProductOptionValue> {
    return this.productOptionsService.createOptionValue(store, dto);
  }

  @Put('product-option-values/:id')
  @UseGuards(SupabaseAuthGuard)
  async updateOptionValue(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateProductOptionValueDto,
  ): Promise<ReadableProductOptionValue> {
    return this.productOptionsService.updateOptionValue(store, id, dto.name);
  }

  @Delete('product-option-values/:id')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteOptionValue(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.productOptionsService.deleteOptionValue(store, id);
  }

  @Get('product-variations')
  async listVariations(@Param('store') store: string): Promise<ReadableProductVariation[]> {
    return this.productOptionsService.listVariations(store);
  }

  @Get('product-variations/:id')
  async getVariation(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ReadableProductVariation> {
    return this.productOptionsService.getVariation(store, id);
  }

  @Post('product-variations')
  @UseGuards(SupabaseAuthGuard)
  async createVariation(
    @Param('store') store: string,
    @Body() dto: CreateProductVariationDto,
  ): Promise<ReadableProductVariation> {
    return this.productOptionsService.createVariation(store, dto);
  }

  @Delete('product-variations/:id')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteVariation(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.productOptionsService.deleteVariation(store, id);
  }

  @Get('products/:productId/variants')
  async listVariants(
    @Param('store') store: string,
    @Param('productId', ParseUUIDPipe) productId: string,
  ): Promise<ReadableProductVariant[]> {
    return this.productVariantsService.list(store, productId);
  }

  @Get('products/:productId/variants/:id')
  async getVariant(
    @Param('store') store: string,
    @Param('productId', ParseUUIDPipe) productId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ReadableProductVariant> {
    return this.productVariantsService.get(store, productId, id);
  }

  @Post('products/:productId/variants')
  @UseGuards(SupabaseAuthGuard)
  async createVariant(
    @Param('store') store: string,
    @Param('productId', ParseUUIDPipe) productId: string,
    @Body() dto: CreateProductVariantDto,
  ): Promise<ReadableProductVariant> {
    return this.productVariantsService.create(store, productId, dto);
  }

  @Put('products/:productId/variants/:id')
  @UseGuards(SupabaseAuthGuard)
  async updateVariant(
    @Param('store') store: string,
    @Param('productId', ParseUUIDPipe) productId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateProductVariantDto,
  ): Promise<ReadableProductVariant> {
    return this.productVariantsService.update(store, productId, id, dto);
  }

  @Delete('products/:productId/variants/:id')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteVariant(
    @Param('store') store: string,
    @Param('productId', ParseUUIDPipe) productId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    await this.productVariantsService.delete(store, productId, id);
  }
}
