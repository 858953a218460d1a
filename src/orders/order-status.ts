import { OrderStatus } from './entities/order.entity';

/** Statuses each status may move to. CANCELED and REFUNDED are final. */
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  ORDERED: ['PROCESSED', 'CANCELED'],
  PROCESSED: ['SHIPPED', 'CANCELED', 'REFUNDED'],
  SHIPPED: ['DELIVERED', 'REFUNDED'],
  DELIVERED: ['REFUNDED'],
  CANCELED: [],
  REFUNDED: [],
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}
