import { Injectable, Logger } from '@nestjs/common';
import { EntityRepository, InjectRepository, Row } from './persistence/entity-repository';
import { Tables } from './persistence/tables';
import { errorMessage } from './utils/errors';

export type ActivityEntityType =
  | 'MerchantStore'
  | 'Category'
  | 'Product'
  | 'ProductVariant'
  | 'ShoppingCart'
  | 'Order'
  | 'PaymentConfiguration'
  | 'ShippingConfiguration'
  | 'Content';

export type ActivityStatus = 'Success' | 'Failed';

export interface ActivityLog extends Row {
  StoreCode: string | null;
  UserId: string | null;
  EntityType: ActivityEntityType | null;
  EntityId: string | null;
  EventType: string;
  Status: ActivityStatus;
  Message: string;
  Details: Record<string, unknown> | null;
}

export interface ActivityLogEntry {
  storeCode?: string;
  userId?: string;
  entityType?: ActivityEntityType;
  entityId?: string;
  eventType: string;
  status?: ActivityStatus;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Audit trail of administrative changes. Writing the log never fails the
 * calling operation.
 */
@Injectable()
export class ActivityLogService {
  private readonly logger = new Logger(ActivityLogService.name);

  constructor(
    @InjectRepository(Tables.ActivityLogs)
    private readonly activityLogs: EntityRepository<ActivityLog>,
  ) {}

  async logActivity(entry: ActivityLogEntry): Promise<void> {
    try {
      await this.activityLogs.insert({
        StoreCode: entry.storeCode ?? null,
        UserId: entry.userId ?? null,
        EntityType: entry.entityType ?? null,
        EntityId: entry.entityId ?? null,
        EventType: entry.eventType,
        Status: entry.status ?? 'Success',
        Message: entry.message,
        Details: entry.details ?? null,
      });
      this.logger.debug(`Activity logged: ${entry.eventType} - ${entry.message}`);
    } catch (error) {
      this.logger.error(`Failed to log activity ${entry.eventType}: ${errorMessage(error)}`);
    }
  }

  async findForEntity(entityType: ActivityEntityType, entityId: string): Promise<ActivityLog[]> {
    return this.activityLogs.list({
      where: { EntityType: entityType, EntityId: entityId },
      orderBy: [{ column: 'CreatedAt', ascending: true }],
    });
  }
}
