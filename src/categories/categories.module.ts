import { Module } from '@nestjs/common';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { CategoriesController } from './categories.controller';
import { CategoriesService } from './categories.service';

@Module({
  imports: [PersistenceModule.forFeature([Tables.Categories, Tables.ProductCategories]), MerchantStoresModule],
  controllers: [CategoriesController],
  providers: [CategoriesService],
  exports: [CategoriesService],
})
export class CategoriesModule {}
