import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseService } from '../supabase.service';
import { PersistenceMode } from '../../config/env.validation';
import { EntityRepository, Row } from './entity-repository';
import { InMemoryEntityRepository } from './in-memory-entity.repository';
import { SupabaseEntityRepository } from './supabase-entity.repository';
import { TableName } from './tables';

/**
 * Hands out one repository per table for the configured backend, so every
 * module that imports a table shares the same instance.
 */
@Injectable()
export class RepositoryRegistry {
  private readonly logger = new Logger(RepositoryRegistry.name);
  private readonly repositories = new Map<TableName, EntityRepository<Row>>();
  private readonly mode: PersistenceMode;

  constructor(
    configService: ConfigService,
    private readonly supabaseService: SupabaseService,
  ) {
    this.mode = configService.get<PersistenceMode>('PERSISTENCE') ?? 'supabase';
  }

  get(table: TableName): EntityRepository<Row> {
    let repository = this.repositories.get(table);
    if (!repository) {
      this.logger.debug(`Creating ${this.mode} repository for ${table}`);
      repository =
        this.mode === 'memory'
          ? new InMemoryEntityRepository<Row>(table)
          : new SupabaseEntityRepository<Row>(this.supabaseService, table);
      this.repositories.set(table, repository);
    }
    return repository;
  }
}
