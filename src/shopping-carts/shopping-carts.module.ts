import { Module } from '@nestjs/common';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { ProductVariationsModule } from '../product-variations/product-variations.module';
import { ShoppingCartsController } from './shopping-carts.controller';
import { ShoppingCartsService } from './shopping-carts.service';

@Module({
  imports: [
    PersistenceModule.forFeature([Tables.ShoppingCarts, Tables.ShoppingCartItems]),
    MerchantStoresModule,
    ProductVariationsModule,
  ],
  controllers: [ShoppingCartsController],
  providers: [ShoppingCartsService],
  exports: [ShoppingCartsService],
})
export class ShoppingCartsModule {}
