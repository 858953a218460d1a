import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Put, UseGuards } from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { SavePaymentConfigurationDto } from './dto/payment-configuration.dto';
import { ReadablePaymentConfiguration, ReadablePaymentModule } from './entities/payment-configuration.entity';
import { PaymentsService } from './payments.service';

@Controller('stores/:store/payments')
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  /** Modules offered at checkout. */
  @Get()
  async listActive(@Param('store') store: string): Promise<ReadablePaymentModule[]> {
    return this.paymentsService.listActive(store);
  }

  @Get('modules')
  @UseGuards(SupabaseAuthGuard)
  async listModules(@Param('store') store: string): Promise<ReadablePaymentModule[]> {
    return this.paymentsService.listModules(store);
  }

  @Get('modules/:code')
  @UseGuards(SupabaseAuthGuard)
  async getConfiguration(
    @Param('store') store: string,
    @Param('code') code: string,
  ): Promise<ReadablePaymentConfiguration> {
    return this.paymentsService.getConfiguration(store, code);
  }

  @Put('modules/:code')
  @UseGuards(SupabaseAuthGuard)
  async saveConfiguration(
    @Param('store') store: string,
    @Param('code') code: string,
    @Body() dto: SavePaymentConfigurationDto,
  ): Promise<ReadablePaymentConfiguration> {
    return this.paymentsService.saveConfiguration(store, code, dto);
  }

  @Delete('modules/:code')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeConfiguration(@Param('store') store: string, @Param('code') code: string): Promise<void> {
    await this.paymentsService.removeConfiguration(store, code);
  }
}
