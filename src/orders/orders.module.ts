import { Module } from '@nestjs/common';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { PaymentsModule } from '../payments/payments.module';
import { ProductVariationsModule } from '../product-variations/product-variations.module';
import { ShippingModule } from '../shipping/shipping.module';
import { ShoppingCartsModule } from '../shopping-carts/shopping-carts.module';
import { OrderEventListenersService } from './order-event-listeners.service';
import { OrderEventsService } from './order-events.service';
import { OrdersController } from './orders.controller';
import { OrdersService } from './orders.service';

@Module({
  imports: [
    PersistenceModule.forFeature([
      Tables.Orders,
      Tables.OrderProducts,
      Tables.OrderTotals,
      Tables.OrderStatusHistory,
      Tables.Transactions,
    ]),
    MerchantStoresModule,
    ProductVariationsModule,
    ShoppingCartsModule,
    ShippingModule,
    PaymentsModule,
  ],
  controllers: [OrdersController],
  providers: [OrdersService, OrderEventsService, OrderEventListenersService],
})
export class OrdersModule {}
