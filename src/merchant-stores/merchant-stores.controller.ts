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
  Post,
  Put,
  Query,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { Page } from '../common/types/pagination';
import { CreateMerchantStoreDto } from './dto/create-merchant-store.dto';
import { ListMerchantStoresDto } from './dto/list-merchant-stores.dto';
import { UpdateMerchantStoreDto } from './dto/update-merchant-store.dto';
import { ReadableMerchantStore } from './entities/merchant-store.entity';
import { MerchantStoresService } from './merchant-stores.service';

@Controller('stores')
export class MerchantStoresController {
  private readonly logger = new Logger(MerchantStoresController.name);

  constructor(private readonly merchantStoresService: MerchantStoresService) {}

  @Post()
  @UseGuards(SupabaseAuthGuard)
  async create(@Body() dto: CreateMerchantStoreDto): Promise<ReadableMerchantStore> {
    this.logger.log(`Creating store ${dto.code}`);
    return this.merchantStoresService.create(dto);
  }

  @Get()
  @UseGuards(SupabaseAuthGuard)
  async list(@Query() query: ListMerchantStoresDto): Promise<Page<ReadableMerchantStore>> {
    return this.merchantStoresService.list(query);
  }

  @Get(':code')
  async get(@Param('code') code: string): Promise<ReadableMerchantStore> {
    return this.merchantStoresService.getByCode(code);
  }

  @Get(':code/exists')
  async exists(@Param('code') code: string): Promise<{ exists: boolean }> {
    return { exists: await this.merchantStoresService.exists(code) };
  }

  @Put(':code')
  @UseGuards(SupabaseAuthGuard)
  async update(@Param('code') code: string, @Body() dto: UpdateMerchantStoreDto): Promise<ReadableMerchantStore> {
    return this.merchantStoresService.update(code, dto);
  }

  @Delete(':code')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Param('code') code: string): Promise<void> {
    this.logger.log(`Deleting store ${code}`);
    await this.merchantStoresService.delete(code);
  }

  @Post(':code/logo')
  @UseGuards(SupabaseAuthGuard)
  @UseInterceptors(FileInterceptor('file'))
  async addLogo(
    @Param('code') code: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<ReadableMerchantStore> {
    if (!file) {
      throw new BadRequestException('A logo file is required');
    }
    return this.merchantStoresService.addLogo(code, {
      fileName: file.originalname,
      mimeType: file.mimetype,
      content: file.buffer,
    });
  }

  @Delete(':code/logo')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeLogo(@Param('code') code: string): Promise<void> {
    await this.merchantStoresService.removeLogo(code);
  }
}
