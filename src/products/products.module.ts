import { Module } from '@nestjs/common';
import { CategoriesModule } from '../categories/categories.module';
import { CmsModule } from '../cms/cms.module';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { ProductsController } from './products.controller';
import { ProductsService } from './products.service';

@Module({
  imports: [
    PersistenceModule.forFeature([
      Tables.Products,
      Tables.ProductCategories,
      Tables.ProductImages,
      Tables.ProductVariants,
    ]),
    MerchantStoresModule,
    CategoriesModule,
    CmsModule,
  ],
  controllers: [ProductsController],
  providers: [ProductsService],
  exports: [ProductsService],
})
export class ProductsModule {}
