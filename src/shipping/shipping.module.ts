import { Module } from '@nestjs/common';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { ProductsModule } from '../products/products.module';
import { ShoppingCartsModule } from '../shopping-carts/shopping-carts.module';
import { ShippingController } from './shipping.controller';
import { ShippingService } from './shipping.service';

@Module({
  imports: [
    PersistenceModule.forFeature([Tables.ShippingConfigurations]),
    MerchantStoresModule,
    ProductsModule,
    ShoppingCartsModule,
  ],
  controllers: [ShippingController],
  providers: [ShippingService],
  exports: [ShippingService],
})
export class ShippingModule {}
