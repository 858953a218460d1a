import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { OrderStatus } from './entities/order.entity';

export const ORDER_CREATED = 'order.created';
export const ORDER_STATUS_CHANGED = 'order.status.changed';

export interface OrderCreatedEvent {
  storeCode: string;
  orderId: string;
  cartCode: string;
  customerEmail: string;
  total: number;
  currency: string;
}

export interface OrderStatusChangedEvent {
  storeCode: string;
  orderId: string;
  from: OrderStatus;
  to: OrderStatus;
  comment: string | null;
}

@Injectable()
export class OrderEventsService {
  private readonly logger = new Logger(OrderEventsService.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  emitOrderCreated(event: OrderCreatedEvent): void {
    this.logger.log(`Emitting ${ORDER_CREATED} for order ${event.orderId} in ${event.storeCode}`);
    this.eventEmitter.emit(ORDER_CREATED, event);
  }

  emitOrderStatusChanged(event: OrderStatusChangedEvent): void {
    this.logger.log(`Emitting ${ORDER_STATUS_CHANGED} for order ${event.orderId}: ${event.from} -> ${event.to}`);
    this.eventEmitter.emit(ORDER_STATUS_CHANGED, event);
  }
}
