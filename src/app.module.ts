import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { CategoriesModule } from './categories/categories.module';
import { CmsModule } from './cms/cms.module';
import { CommonModule } from './common/common.module';
import { ServiceExceptionFilter } from './common/filters/service-exception.filter';
import { RequestLoggerMiddleware } from './common/middleware/request-logger.middleware';
import { SanitizeInputMiddleware } from './common/middleware/sanitize-input.middleware';
import { validate } from './config/env.validation';
import { ContentModule } from './content/content.module';
import { ExportModule } from './export/export.module';
import { MerchantStoresModule } from './merchant-stores/merchant-stores.module';
import { OrdersModule } from './orders/orders.module';
import { PaymentsModule } from './payments/payments.module';
import { ProductVariationsModule } from './product-variations/product-variations.module';
import { ProductsModule } from './products/products.module';
import { ShippingModule } from './shipping/shipping.module';
import { ShoppingCartsModule } from './shopping-carts/shopping-carts.module';
import { TasksModule } from './tasks/tasks.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    ScheduleModule.forRoot(),
    EventEmitterModule.forRoot(),
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 1 minute
        limit: 60,
      },
    ]),
    CommonModule,
    CmsModule,
    MerchantStoresModule,
    CategoriesModule,
    ProductsModule,
    ProductVariationsModule,
    ShoppingCartsModule,
    ShippingModule,
    PaymentsModule,
    OrdersModule,
    ContentModule,
    ExportModule,
    TasksModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: ServiceExceptionFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(RequestLoggerMiddleware, SanitizeInputMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
