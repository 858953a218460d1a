import {
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
  UseGuards,
} from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { ContentService } from './content.service';
import { CreateContentDto, ListContentDto, UpdateContentDto } from './dto/content.dto';
import { ReadableContent } from './entities/content.entity';

@Controller('stores/:store/content')
export class ContentController {
  private readonly logger = new Logger(ContentController.name);

  constructor(private readonly contentService: ContentService) {}

  /** Visible content for the shop. */
  @Get()
  async listVisible(@Param('store') store: string, @Query() query: ListContentDto): Promise<ReadableContent[]> {
    return this.contentService.list(store, { type: query.type, visibleOnly: true });
  }

  @Get('pages/:slug')
  async getPage(@Param('store') store: string, @Param('slug') slug: string): Promise<ReadableContent> {
    return this.contentService.getPage(store, slug);
  }

  @Get('all')
  @UseGuards(SupabaseAuthGuard)
  async list(@Param('store') store: string, @Query() query: ListContentDto): Promise<ReadableContent[]> {
    return this.contentService.list(store, query);
  }

  @Get(':code')
  @UseGuards(SupabaseAuthGuard)
  async get(@Param('store') store: string, @Param('code') code: string): Promise<ReadableContent> {
    return this.contentService.get(store, code);
  }

  @Post()
  @UseGuards(SupabaseAuthGuard)
  async create(@Param('store') store: string, @Body() dto: CreateContentDto): Promise<ReadableContent> {
    this.logger.log(`Creating ${dto.contentType} ${dto.code} in ${store}`);
    return this.contentService.create(store, dto);
  }

  @Put(':code')
  @UseGuards(SupabaseAuthGuard)
  async update(
    @Param('store') store: string,
    @Param('code') code: string,
    @Body() dto: UpdateContentDto,
  ): Promise<ReadableContent> {
    return this.contentService.update(store, code, dto);
  }

  @Delete(':code')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Param('store') store: string, @Param('code') code: string): Promise<void> {
    await this.contentService.delete(store, code);
  }
}
