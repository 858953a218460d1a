import { Module } from '@nestjs/common';
import { CategoriesModule } from '../categories/categories.module';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { ProductVariationsModule } from '../product-variations/product-variations.module';
import { ProductsModule } from '../products/products.module';
import { ExportController } from './export.controller';
import { ExportService } from './export.service';
import { CsvExportFormatter } from './formatters/csv-export.formatter';

@Module({
  imports: [
    PersistenceModule.forFeature([Tables.Products, Tables.ProductVariants]),
    MerchantStoresModule,
    CategoriesModule,
    ProductsModule,
    ProductVariationsModule,
  ],
  controllers: [ExportController],
  providers: [ExportService, CsvExportFormatter],
})
export class ExportModule {}
