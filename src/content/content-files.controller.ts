import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { ContentFilesService, parseFileContentType } from './content-files.service';
import { ContentFolderDto } from './dto/content.dto';
import { ReadableContentFile } from './entities/content.entity';

@Controller('stores/:store/files/:type')
export class ContentFilesController {
  constructor(private readonly contentFilesService: ContentFilesService) {}

  @Get('folders')
  @UseGuards(SupabaseAuthGuard)
  async listFolders(
    @Param('store') store: string,
    @Param('type') type: string,
    @Query('parent') parent?: string,
  ): Promise<string[]> {
    return this.contentFilesService.listFolders(store, parseFileContentType(type), parent);
  }

  @Post('folders')
  @UseGuards(SupabaseAuthGuard)
  async addFolder(
    @Param('store') store: string,
    @Param('type') type: string,
    @Body() dto: ContentFolderDto,
  ): Promise<string[]> {
    return this.contentFilesService.addFolder(store, parseFileContentType(type), dto.folder);
  }

  @Delete('folders')
  @UseGuards(SupabaseAuthGuard)
  async removeFolder(
    @Param('store') store: string,
    @Param('type') type: string,
    @Query('folder') folder: string,
  ): Promise<{ removed: number }> {
    if (!folder) {
      throw new BadRequestException('folder is required');
    }
    return { removed: await this.contentFilesService.removeFolder(store, parseFileContentType(type), folder) };
  }

  @Get()
  @UseGuards(SupabaseAuthGuard)
  async list(
    @Param('store') store: string,
    @Param('type') type: string,
    @Query('folder') folder?: string,
  ): Promise<ReadableContentFile[]> {
    return this.contentFilesService.list(store, parseFileContentType(type), folder);
  }

  @Post()
  @UseGuards(SupabaseAuthGuard)
  @UseInterceptors(FileInterceptor('file'))
  async upload(
    @Param('store') store: string,
    @Param('type') type: string,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query('folder') folder?: string,
  ): Promise<ReadableContentFile> {
    if (!file) {
      throw new BadRequestException('A file is required');
    }
    return this.contentFilesService.upload(
      store,
      parseFileContentType(type),
      { fileName: file.originalname, mimeType: file.mimetype, content: file.buffer },
      folder,
    );
  }

  @Get(':fileName')
  async download(
    @Param('store') store: string,
    @Param('type') type: string,
    @Param('fileName') fileName: string,
    @Res() res: Response,
    @Query('folder') folder?: string,
  ): Promise<void> {
    const file = await this.contentFilesService.download(store, parseFileContentType(type), fileName, folder);
    res.setHeader('Content-Type', file.mimeType);
    res.setHeader('Content-Length', file.size);
    res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(file.fileName)}"`);
    res.send(file.content);
  }

  @Delete(':fileName')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @Param('store') store: string,
    @Param('type') type: string,
    @Param('fileName') fileName: string,
    @Query('folder') folder?: string,
  ): Promise<void> {
    await this.contentFilesService.remove(store, parseFileContentType(type), fileName, folder);
  }
}
