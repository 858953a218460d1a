import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ActivityLogService } from '../common/activity-log.service';
import {
  ORDER_CREATED,
  ORDER_STATUS_CHANGED,
  OrderCreatedEvent,
  OrderStatusChangedEvent,
} from './order-events.service';

/** Writes order lifecycle events to the activity log. */
@Injectable()
export class OrderEventListenersService {
  private readonly logger = new Logger(OrderEventListenersService.name);

  constructor(private readonly activityLogService: ActivityLogService) {}

  @OnEvent(ORDER_CREATED)
  async handleOrderCreated(event: OrderCreatedEvent): Promise<void> {
    this.logger.debug(`Recording creation of order ${event.orderId}`);
    await this.activityLogService.logActivity({
      storeCode: event.storeCode,
      entityType: 'Order',
      entityId: event.orderId,
      eventType: 'ORDER_CREATED',
      message: `Order placed by ${event.customerEmail} for ${event.total} ${event.currency}`,
      details: { cartCode: event.cartCode, total: event.total },
    });
  }

  @OnEvent(ORDER_STATUS_CHANGED)
  async handleOrderStatusChanged(event: OrderStatusChangedEvent): Promise<void> {
    this.logger.debug(`Recording status change of order ${event.orderId}`);
    await this.activityLogService.logActivity({
      storeCode: event.storeCode,
      entityType: 'Order',
      entityId: event.orderId,
      eventType: 'ORDER_STATUS_CHANGED',
      message: `Order moved from ${event.from} to ${event.to}`,
      details: { from: event.from, to: event.to, comment: event.comment },
    });
  }
}
