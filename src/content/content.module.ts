import { Module } from '@nestjs/common';
import { CmsModule } from '../cms/cms.module';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { ContentFilesController } from './content-files.controller';
import { ContentFilesService } from './content-files.service';
import { ContentController } from './content.controller';
import { ContentService } from './content.service';

@Module({
  imports: [PersistenceModule.forFeature([Tables.Contents]), MerchantStoresModule, CmsModule],
  controllers: [ContentController, ContentFilesController],
  providers: [ContentService, ContentFilesService],
})
export class ContentModule {}
