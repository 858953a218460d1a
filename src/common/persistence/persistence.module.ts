import { DynamicModule, Module, Provider } from '@nestjs/common';
import { repositoryToken } from './entity-repository';
import { RepositoryRegistry } from './repository.registry';
import { TableName } from './tables';

@Module({})
export class PersistenceModule {
  /**
   * Registers an injectable repository (see InjectRepository) for each table.
   * RepositoryRegistry comes from the global CommonModule.
   */
  static forFeature(tables: TableName[]): DynamicModule {
    const providers: Provider[] = tables.map((table) => ({
      provide: repositoryToken(table),
      useFactory: (registry: RepositoryRegistry) => registry.get(table),
      inject: [RepositoryRegistry],
    }));
    return { module: PersistenceModule, providers, exports: providers };
  }
}
