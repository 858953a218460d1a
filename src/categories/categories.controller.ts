import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { CategoriesService } from './categories.service';
import { CategoryTreeQueryDto, CreateCategoryDto, MoveCategoryDto, UpdateCategoryDto } from './dto/category.dto';
import { CategoryNode, ReadableCategory } from './entities/category.entity';

@Controller('stores/:store/categories')
export class CategoriesController {
  constructor(private readonly categoriesService: CategoriesService) {}

  @Get()
  async tree(@Param('store') store: string, @Query() query: CategoryTreeQueryDto): Promise<CategoryNode[]> {
    return this.categoriesService.tree(store, { visibleOnly: query.visibleOnly });
  }

  @Get('code/:code')
  async getByCode(@Param('store') store: string, @Param('code') code: string): Promise<ReadableCategory> {
    return this.categoriesService.getByCode(store, code);
  }

  @Get(':id')
  async get(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<ReadableCategory> {
    return this.categoriesService.get(store, id);
  }

  @Post()
  @UseGuards(SupabaseAuthGuard)
  async create(@Param('store') store: string, @Body() dto: CreateCategoryDto): Promise<ReadableCategory> {
    return this.categoriesService.create(store, dto);
  }

  @Put(':id')
  @UseGuards(SupabaseAuthGuard)
  async update(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateCategoryDto,
  ): Promise<ReadableCategory> {
    return this.categoriesService.update(store, id, dto);
  }

  @Patch(':id/move')
  @UseGuards(SupabaseAuthGuard)
  async move(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: MoveCategoryDto,
  ): Promise<ReadableCategory> {
    return this.categoriesService.move(store, id, dto.parentId);
  }

  @Delete(':id')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.categoriesService.delete(store, id);
  }
}
