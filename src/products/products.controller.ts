import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
  Res,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { Page } from '../common/types/pagination';
import { CreateProductDto, ListProductsDto, ProductImageQueryDto, UpdateProductDto } from './dto/product.dto';
import { ReadableProduct, ReadableProductImage } from './entities/product.entity';
import { ProductsService } from './products.service';

@Controller('stores/:store/products')
export class ProductsController {
  private readonly logger = new Logger(ProductsController.name);

  constructor(private readonly productsService: ProductsService) {}

  @Get()
  async list(@Param('store') store: string, @Query() query: ListProductsDto): Promise<Page<ReadableProduct>> {
    return this.productsService.list(store, query);
  }

  @Get('sku/:sku')
  async getBySku(@Param('store') store: string, @Param('sku') sku: string): Promise<ReadableProduct> {
    return this.productsService.getBySku(store, sku);
  }

  @Get(':id')
  async get(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<ReadableProduct> {
    return this.productsService.getById(store, id);
  }

  @Post()
  @UseGuards(SupabaseAuthGuard)
  async create(@Param('store') store: string, @Body() dto: CreateProductDto): Promise<ReadableProduct> {
    this.logger.log(`Creating product ${dto.sku} in ${store}`);
    return this.productsService.create(store, dto);
  }

  @Put(':id')
  @UseGuards(SupabaseAuthGuard)
  async update(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateProductDto,
  ): Promise<ReadableProduct> {
    return this.productsService.update(store, id, dto);
  }

  @Delete(':id')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.productsService.delete(store, id);
  }

  @Post(':id/categories/:categoryId')
  @UseGuards(SupabaseAuthGuard)
  async addToCategory(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Param('categoryId', ParseUUIDPipe) categoryId: string,
  ): Promise<ReadableProduct> {
    return this.productsService.addToCategory(store, id, categoryId);
  }

  @Delete(':id/categories/:categoryId')
  @UseGuards(SupabaseAuthGuard)
  async removeFromCategory(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Param('categoryId', ParseUUIDPipe) categoryId: string,
  ): Promise<ReadableProduct> {
    return this.productsService.removeFromCategory(store, id, categoryId);
  }

  @Get(':id/images')
  async listImages(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ReadableProductImage[]> {
    return this.productsService.listImages(store, id);
  }

  @Post(':id/images')
  @UseGuards(SupabaseAuthGuard)
  @UseInterceptors(FileInterceptor('file'))
  async addImage(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<ReadableProductImage> {
    if (!file) {
      throw new BadRequestException('An image file is required');
    }
    return this.productsService.addImage(store, id, {
      fileName: file.originalname,
      mimeType: file.mimetype,
      content: file.buffer,
    });
  }

  @Get(':id/images/:imageId')
  async getImage(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Param('imageId', ParseUUIDPipe) imageId: string,
    @Query() query: ProductImageQueryDto,
    @Res() res: Response,
  ): Promise<void> {
    const image = await this.productsService.getImageContent(store, id, imageId, query.size ?? 'LARGE');
    res.setHeader('Content-Type', image.mimeType);
    res.setHeader('Content-Length', image.size);
    res.send(image.content);
  }

  @Delete(':id/images/:imageId')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeImage(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Param('imageId', ParseUUIDPipe) imageId: string,
  ): Promise<void> {
    await this.productsService.removeImage(store, id, imageId);
  }
}
