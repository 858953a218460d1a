import { Body, Controller, Get, Param, ParseUUIDPipe, Post, Put, Query, UseGuards } from '@nestjs/common';
import { SupabaseAuthGuard } from '../auth/guards/supabase-auth.guard';
import { Page } from '../common/types/pagination';
import { CheckoutDto, ListOrdersDto, RefundOrderDto, UpdateOrderStatusDto } from './dto/order.dto';
import { ReadableOrder } from './entities/order.entity';
import { OrdersService } from './orders.service';

@Controller('stores/:store')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post('checkout')
  async checkout(@Param('store') store: string, @Body() dto: CheckoutDto): Promise<ReadableOrder> {
    return this.ordersService.checkout(store, dto);
  }

  @Get('orders')
  @UseGuards(SupabaseAuthGuard)
  async list(@Param('store') store: string, @Query() query: ListOrdersDto): Promise<Page<ReadableOrder>> {
    return this.ordersService.list(store, query);
  }

  @Get('orders/:id')
  @UseGuards(SupabaseAuthGuard)
  async get(@Param('store') store: string, @Param('id', ParseUUIDPipe) id: string): Promise<ReadableOrder> {
    return this.ordersService.get(store, id);
  }

  @Put('orders/:id/status')
  @UseGuards(SupabaseAuthGuard)
  async updateStatus(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateOrderStatusDto,
  ): Promise<ReadableOrder> {
    return this.ordersService.updateStatus(store, id, dto);
  }

  @Post('orders/:id/refund')
  @UseGuards(SupabaseAuthGuard)
  async refund(
    @Param('store') store: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RefundOrderDto,
  ): Promise<ReadableOrder> {
    return this.ordersService.refund(store, id, dto.amount);
  }
}
