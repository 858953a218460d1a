import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put, UseGuards } from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { SaveShippingConfigurationDto, ShippingQuoteDto } from './dto/shipping.dto';
import { ReadableShippingConfiguration, ShippingQuote } from './entities/shipping-configuration.entity';
import { ShippingService } from './shipping.service';

@Controller('stores/:store/shipping')
export class ShippingController {
  constructor(private readonly shippingService: ShippingService) {}

  @Get('configuration')
  @UseGuards(SupabaseAuthGuard)
  async getConfiguration(@Param('store') store: string): Promise<ReadableShippingConfiguration> {
    return this.shippingService.getConfiguration(store);
  }

  @Put('configuration')
  @UseGuards(SupabaseAuthGuard)
  async saveConfiguration(
    @Param('store') store: string,
    @Body() dto: SaveShippingConfigurationDto,
  ): Promise<ReadableShippingConfiguration> {
    return this.shippingService.saveConfiguration(store, dto);
  }

  @Delete('configuration')
  @UseGuards(SupabaseAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteConfiguration(@Param('store') store: string): Promise<void> {
    await this.shippingService.deleteConfiguration(store);
  }

  @Post('quote')
  @HttpCode(HttpStatus.OK)
  async quote(@Param('store') store: string, @Body() dto: ShippingQuoteDto): Promise<ShippingQuote> {
    return this.shippingService.quote(store, dto);
  }
}
