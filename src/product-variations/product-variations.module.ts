import { Module } from '@nestjs/common';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { ProductsModule } from '../products/products.module';
import { ProductOptionsService } from './product-options.service';
import { ProductVariantsService } from './product-variants.service';
import { ProductVariationsController } from './product-variations.controller';

@Module({
  imports: [
    PersistenceModule.forFeature([
      Tables.ProductOptions,
      Tables.ProductOptionValues,
      Tables.ProductVariations,
      Tables.ProductVariants,
      Tables.Products,
    ]),
    MerchantStoresModule,
    ProductsModule,
  ],
  controllers: [ProductVariationsController],
  providers: [ProductOptionsService, ProductVariantsService],
  exports: [ProductOptionsService, ProductVariantsService],
})
export class ProductVariationsModule {}
