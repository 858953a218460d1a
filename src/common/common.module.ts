import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseService } from './supabase.service';
import { EncryptionService } from './encryption.service';
import { ActivityLogService } from './activity-log.service';
import { RepositoryRegistry } from './persistence/repository.registry';
import { repositoryToken } from './persistence/entity-repository';
import { Tables } from './persistence/tables';

@Global()
@Module({
  providers: [
    EncryptionService,
    ActivityLogService,
    RepositoryRegistry,
    {
      provide: repositoryToken(Tables.ActivityLogs),
      useFactory: (registry: RepositoryRegistry) => registry.get(Tables.ActivityLogs),
      inject: [RepositoryRegistry],
    },
    {
      provide: SupabaseService,
      useFactory: async (configService: ConfigService) => {
        const service = new SupabaseService(configService);
        if (configService.get<string>('PERSISTENCE') !== 'memory') {
          await service.initialize();
        }
        return service;
      },
      inject: [ConfigService],
    },
  ],
  exports: [SupabaseService, EncryptionService, ActivityLogService, RepositoryRegistry],
})
export class CommonModule {}
