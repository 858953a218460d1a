import { Controller, Get, Header, Param, UseGuards } from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { ExportService } from './export.service';

@Controller('stores/:store/export')
@UseGuards(SupabaseAuthGuard)
export class ExportController {
  constructor(private readonly exportService: ExportService) {}

  @Get('catalog.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="catalog.csv"')
  async exportCatalog(@Param('store') store: string): Promise<string> {
    return this.exportService.exportCatalogCsv(store);
  }
}
