import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { errorMessage, errorStack } from '../common/utils/errors';
import { ShoppingCartsService } from '../shopping-carts/shopping-carts.service';

const DEFAULT_CART_EXPIRY_DAYS = 30;

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly shoppingCartsService: ShoppingCartsService,
  ) {}

  /** Carts never turned into an order and left untouched for CART_EXPIRY_DAYS. */
  async removeAbandonedCarts(now = new Date()): Promise<number> {
    const days = Number(this.configService.get('CART_EXPIRY_DAYS') ?? DEFAULT_CART_EXPIRY_DAYS);
    return this.shoppingCartsService.removeExpired(days > 0 ? days : DEFAULT_CART_EXPIRY_DAYS, now);
  }

  @Cron(CronExpression.EVERY_DAY_AT_3AM, { name: 'abandonedCarts' })
  async handleAbandonedCarts(): Promise<void> {
    this.logger.log('[CRON - abandonedCarts] Removing abandoned carts...');
    try {
      const removed = await this.removeAbandonedCarts();
      this.logger.log(`[CRON - abandonedCarts] Removed ${removed} cart(s).`);
    } catch (error) {
      this.logger.error(`[CRON - abandonedCarts] Cleanup failed: ${errorMessage(error)}`, errorStack(error));
    }
  }
}
