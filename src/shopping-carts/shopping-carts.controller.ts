import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
} from '@nestjs/common';
import { AddCartItemDto, MergeCartsDto, UpdateCartItemDto } from './dto/shopping-cart.dto';
import { ReadableShoppingCart } from './entities/shopping-cart.entity';
import { ShoppingCartsService } from './shopping-carts.service';

/** Shop-facing cart routes; the cart code is the shopper's handle. */
@Controller('stores/:store/carts')
export class ShoppingCartsController {
  constructor(private readonly shoppingCartsService: ShoppingCartsService) {}

  @Post()
  async create(@Param('store') store: string, @Body() dto: AddCartItemDto): Promise<ReadableShoppingCart> {
    return this.shoppingCartsService.addItem(store, undefined, dto);
  }

  @Get(':code')
  async get(@Param('store') store: string, @Param('code') code: string): Promise<ReadableShoppingCart> {
    return this.shoppingCartsService.get(store, code);
  }

  @Post(':code/items')
  async addItem(
    @Param('store') store: string,
    @Param('code') code: string,
    @Body() dto: AddCartItemDto,
  ): Promise<ReadableShoppingCart> {
    return this.shoppingCartsService.addItem(store, code, dto);
  }

  @Put(':code/items/:itemId')
  async updateItem(
    @Param('store') store: string,
    @Param('code') code: string,
    @Param('itemId', ParseUUIDPipe) itemId: string,
    @Body() dto: UpdateCartItemDto,
  ): Promise<ReadableShoppingCart> {
    return this.shoppingCartsService.updateItem(store, code, itemId, dto.quantity);
  }

  @Delete(':code/items/:itemId')
  async removeItem(
    @Param('store') store: string,
    @Param('code') code: string,
    @Param('itemId', ParseUUIDPipe) itemId: string,
  ): Promise<ReadableShoppingCart> {
    return this.shoppingCartsService.removeItem(store, code, itemId);
  }

  @Post(':code/merge')
  async merge(
    @Param('store') store: string,
    @Param('code') code: string,
    @Body() dto: MergeCartsDto,
  ): Promise<ReadableShoppingCart> {
    return this.shoppingCartsService.merge(store, code, dto.sourceCode);
  }

  @Delete(':code')
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Param('store') store: string, @Param('code') code: string): Promise<void> {
    await this.shoppingCartsService.delete(store, code);
  }
}
