import { Module } from '@nestjs/common';
import { CmsModule } from '../cms/cms.module';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresController } from './merchant-stores.controller';
import { MerchantStoresService } from './merchant-stores.service';

@Module({
  imports: [PersistenceModule.forFeature([Tables.MerchantStores]), CmsModule],
  controllers: [MerchantStoresController],
  providers: [MerchantStoresService],
  exports: [MerchantStoresService],
})
export class MerchantStoresModule {}
