import { ActivityLog, ActivityLogService } from '../activity-log.service';
import { InMemoryEntityRepository } from '../persistence/in-memory-entity.repository';
import { NewRow, Row } from '../persistence/entity-repository';
import { TableName, Tables } from '../persistence/tables';
import { MerchantStore } from '../../merchant-stores/entities/merchant-store.entity';

/** Helpers shared by the service specs; everything runs on in-memory tables. */

export function memoryTable<T extends Row>(table: TableName): InMemoryEntityRepository<T> {
  return new InMemoryEntityRepository<T>(table);
}

export function activityLog(): { service: ActivityLogService; rows: InMemoryEntityRepository<ActivityLog> } {
  const rows = memoryTable<ActivityLog>(Tables.ActivityLogs);
  return { service: new ActivityLogService(rows), rows };
}

export function storeRow(overrides: Partial<NewRow<MerchantStore>> = {}): NewRow<MerchantStore> {
  return {
    Code: 'DEFAULT',
    Name: 'Default store',
    Email: 'owner@example.com',
    Phone: null,
    Address: '1 Main Street',
    City: 'Montreal',
    PostalCode: 'H2X 1Y4',
    Country: 'CA',
    Zone: 'QC',
    Currency: 'CAD',
    DefaultLanguage: 'en',
    SupportedLanguages: ['en'],
    WeightUnit: 'KG',
    SizeUnit: 'CM',
    InBusinessSince: null,
    UseCache: false,
    IsRetailer: true,
    Logo: null,
    ...overrides,
  };
}
