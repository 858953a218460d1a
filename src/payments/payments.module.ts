import { Module } from '@nestjs/common';
import { PersistenceModule } from '../common/persistence/persistence.module';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresModule } from '../merchant-stores/merchant-stores.module';
import { PaymentsController } from './payments.controller';
import { PaymentsService } from './payments.service';
import { MoneyOrderProcessor } from './processors/money-order.processor';
import { StripePaymentProcessor } from './processors/stripe.processor';

@Module({
  imports: [PersistenceModule.forFeature([Tables.PaymentConfigurations]), MerchantStoresModule],
  controllers: [PaymentsController],
  providers: [PaymentsService, StripePaymentProcessor, MoneyOrderProcessor],
  exports: [PaymentsService],
})
export class PaymentsModule {}
