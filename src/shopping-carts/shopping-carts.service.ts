import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ActivityLogService } from '../common/activity-log.service';
import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { formatAmount, fromCents, lineTotal, toCents } from '../common/utils/money';
import { MerchantStore } from '../merchant-stores/entities/merchant-store.entity';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { ProductVariantsService, Purchasable } from '../product-variations/product-variants.service';
import { AddCartItemDto } from './dto/shopping-cart.dto';
import {
  ReadableShoppingCart,
  ReadableShoppingCartItem,
  ShoppingCart,
  ShoppingCartItem,
} from './entities/shopping-cart.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CartTotals {
  itemCount: number;
  /** Sum of line totals, added up in cents. */
  subTotal: number;
}

export function cartTotals(items: Pick<ShoppingCartItem, 'Quantity' | 'UnitPrice'>[]): CartTotals {
  return {
    itemCount: items.reduce((count, item) => count + item.Quantity, 0),
    subTotal: fromCents(items.reduce((cents, item) => cents + toCents(item.UnitPrice) * item.Quantity, 0)),
  };
}

/**
 * Checks that `quantity` units of a purchasable can be sold right now.
 * @throws ValidationException naming the SKU otherwise
 */
export function assertPurchasable(purchasable: Purchasable, quantity: number, now = new Date()): void {
  const sku = purchasable.variant?.Sku ?? purchasable.product.Sku;
  if (!purchasable.available) {
    throw new ValidationException(`${sku} is not available`, { sku });
  }
  const { DateAvailable } = purchasable.product;
  if (DateAvailable && new Date(DateAvailable).getTime() > now.getTime()) {
    throw new ValidationException(`${sku} is not available before ${DateAvailable}`, { sku });
  }
  if (quantity > purchasable.stock) {
    throw new ValidationException(`Only ${purchasable.stock} unit(s) of ${sku} in stock`, {
      sku,
      requested: quantity,
      stock: purchasable.stock,
    });
  }
}

@Injectable()
export class ShoppingCartsService {
  private readonly logger = new Logger(ShoppingCartsService.name);

  constructor(
    @InjectRepository(Tables.ShoppingCarts)
    private readonly carts: EntityRepository<ShoppingCart>,
    @InjectRepository(Tables.ShoppingCartItems)
    private readonly items: EntityRepository<ShoppingCartItem>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly productVariantsService: ProductVariantsService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  async findByCode(storeId: string, code: string): Promise<ShoppingCart> {
    const cart = await this.carts.findOne({ StoreId: storeId, Code: code });
    if (!cart) {
      throw new EntityNotFoundException('ShoppingCart', code);
    }
    return cart;
  }

  async linesOf(cartId: string): Promise<ShoppingCartItem[]> {
    return this.items.list({ where: { CartId: cartId }, orderBy: [{ column: 'CreatedAt' }] });
  }

  async get(storeCode: string, code: string): Promise<ReadableShoppingCart> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    return this.toReadable(store, await this.findByCode(store.Id, code));
  }

  /**
   * Adds a product, or one of its variants, to the cart with the given code.
   * Without a code a new cart is created. A line for the same product and
   * variant is increased instead of duplicated.
   */
  async addItem(storeCode: string, cartCode: string | undefined, dto: AddCartItemDto): Promise<ReadableShoppingCart> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const purchasable = await this.productVariantsService.resolvePurchasable(store.Id, dto.sku, dto.variantSku);

    let cart: ShoppingCart;
    if (cartCode) {
      cart = this.assertOpen(await this.findByCode(store.Id, cartCode));
    } else {
      assertPurchasable(purchasable, dto.quantity);
      cart = await this.carts.insert({
        Code: uuidv4().replace(/-/g, ''),
        StoreId: store.Id,
        CustomerEmail: dto.customerEmail ?? null,
        OrderId: null,
      });
      this.logger.log(`Created cart ${cart.Code} in ${storeCode}`);
    }

    await this.addLine(cart, purchasable, dto.quantity);
    cart = await this.carts.update(cart.Id, dto.customerEmail ? { CustomerEmail: dto.customerEmail } : {});
    return this.toReadable(store, cart);
  }

  /** Sets the quantity of a line; zero removes it. */
  async updateItem(storeCode: string, code: string, itemId: string, quantity: number): Promise<ReadableShoppingCart> {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new ValidationException('Quantity must be a non-negative integer');
    }
    const store = await this.merchantStoresService.findByCode(storeCode);
    const cart = this.assertOpen(await this.findByCode(store.Id, code));
    const item = await this.findItem(cart, itemId);
    if (quantity === 0) {
      await this.items.delete(item.Id);
    } else {
      const purchasable = await this.productVariantsService.resolvePurchasable(
        store.Id,
        item.Sku,
        item.VariantSku ?? undefined,
      );
      assertPurchasable(purchasable, quantity);
      await this.items.update(item.Id, { Quantity: quantity, UnitPrice: purchasable.unitPrice });
    }
    return this.toReadable(store, await this.carts.update(cart.Id, {}));
  }

  async removeItem(storeCode: string, code: string, itemId: string): Promise<ReadableShoppingCart> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const cart = this.assertOpen(await this.findByCode(store.Id, code));
    const item = await this.findItem(cart, itemId);
    await this.items.delete(item.Id);
    return this.toReadable(store, await this.carts.update(cart.Id, {}));
  }

  async delete(storeCode: string, code: string): Promise<void> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const cart = this.assertOpen(await this.findByCode(store.Id, code));
    await this.items.deleteWhere({ where: { CartId: cart.Id } });
    await this.carts.delete(cart.Id);
    this.logger.log(`Deleted cart ${code} of ${storeCode}`);
  }

  /**
   * Moves every line of the source cart into the target cart, re-checking
   * stock for the merged quantities, then deletes the source cart.
   */
  async merge(storeCode: string, targetCode: string, sourceCode: string): Promise<ReadableShoppingCart> {
    if (targetCode === sourceCode) {
      throw new ValidationException('A cart cannot be merged into itself');
    }
    const store = await this.merchantStoresService.findByCode(storeCode);
    const target = this.assertOpen(await this.findByCode(store.Id, targetCode));
    const source = this.assertOpen(await this.findByCode(store.Id, sourceCode));

    const lines = await this.linesOf(source.Id);
    const merged = new Map<string, { purchasable: Purchasable; quantity: number }>();
    for (const line of lines) {
      const purchasable = await this.productVariantsService.resolvePurchasable(
        store.Id,
        line.Sku,
        line.VariantSku ?? undefined,
      );
      const key = `${purchasable.product.Id}:${purchasable.variant?.Id ?? ''}`;
      const entry = merged.get(key);
      if (entry) {
        entry.quantity += line.Quantity;
      } else {
        merged.set(key, { purchasable, quantity: line.Quantity });
      }
    }
    const writes: Array<{ purchasable: Purchasable; existing: ShoppingCartItem | null; total: number }> = [];
    for (const { purchasable, quantity } of merged.values()) {
      const existing = await this.items.findOne({
        CartId: target.Id,
        ProductId: purchasable.product.Id,
        VariantId: purchasable.variant?.Id ?? null,
      });
      const total = (existing?.Quantity ?? 0) + quantity;
      assertPurchasable(purchasable, total);
      writes.push({ purchasable, existing, total });
    }
    for (const { purchasable, existing, total } of writes) {
      await this.writeLine(target, purchasable, existing, total);
    }
    await this.items.deleteWhere({ where: { CartId: source.Id } });
    await this.carts.delete(source.Id);

    const updated = await this.carts.update(target.Id, {
      CustomerEmail: target.CustomerEmail ?? source.CustomerEmail,
    });
    this.logger.log(`Merged cart ${sourceCode} into ${targetCode} (${lines.length} line(s))`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'ShoppingCart',
      entityId: updated.Id,
      eventType: 'CART_MERGED',
      message: `Cart ${sourceCode} merged into ${targetCode}`,
      details: { lines: lines.length },
    });
    return this.toReadable(store, updated);
  }

  /**
   * Sets the cart's order id only while it is still unset, so two checkouts
   * of the same cart cannot both proceed.
   */
  async claimForOrder(cart: Pick<ShoppingCart, 'Id' | 'Code'>, orderId: string): Promise<void> {
    const claimed = await this.carts.updateWhere({ where: { Id: cart.Id, OrderId: null } }, { OrderId: orderId });
    if (claimed !== 1) {
      throw new ValidationException(`Cart ${cart.Code} has already been ordered`);
    }
  }

  /** Undoes `claimForOrder` when the order could not be completed. */
  async releaseClaim(cartId: string, orderId: string): Promise<void> {
    await this.carts.updateWhere({ where: { Id: cartId, OrderId: orderId } }, { OrderId: null });
  }

  /**
   * Deletes carts that were never ordered and have not changed for `days`
   * days. Returns the number of carts removed.
   */
  async removeExpired(days: number, now = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - days * DAY_MS).toISOString();
    const expired = await this.carts.list({ where: { OrderId: null }, before: { UpdatedAt: cutoff } });
    if (expired.length === 0) {
      return 0;
    }
    const ids = expired.map((cart) => cart.Id);
    await this.items.deleteWhere({ in: { CartId: ids } });
    const removed = await this.carts.deleteWhere({ in: { Id: ids } });
    this.logger.log(`Removed ${removed} cart(s) idle since ${cutoff}`);
    return removed;
  }

  async toReadable(store: MerchantStore, cart: ShoppingCart): Promise<ReadableShoppingCart> {
    const items = await this.linesOf(cart.Id);
    const { itemCount, subTotal } = cartTotals(items);
    return {
      id: cart.Id,
      code: cart.Code,
      customerEmail: cart.CustomerEmail,
      orderId: cart.OrderId,
      currency: store.Currency,
      items: items.map((item) => this.toReadableItem(item)),
      itemCount,
      subTotal,
      displaySubTotal: formatAmount(subTotal, store.Currency),
    };
  }

  private async addLine(cart: ShoppingCart, purchasable: Purchasable, quantity: number): Promise<void> {
    const existing = await this.items.findOne({
      CartId: cart.Id,
      ProductId: purchasable.product.Id,
      VariantId: purchasable.variant?.Id ?? null,
    });
    const total = (existing?.Quantity ?? 0) + quantity;
    assertPurchasable(purchasable, total);
    await this.writeLine(cart, purchasable, existing, total);
  }

  private async writeLine(
    cart: ShoppingCart,
    purchasable: Purchasable,
    existing: ShoppingCartItem | null,
    total: number,
  ): Promise<void> {
    if (existing) {
      await this.items.update(existing.Id, { Quantity: total, UnitPrice: purchasable.unitPrice });
      return;
    }
    await this.items.insert({
      CartId: cart.Id,
      ProductId: purchasable.product.Id,
      VariantId: purchasable.variant?.Id ?? null,
      Sku: purchasable.product.Sku,
      VariantSku: purchasable.variant?.Sku ?? null,
      Name: purchasable.product.Name,
      Quantity: total,
      UnitPrice: purchasable.unitPrice,
    });
  }

  private async findItem(cart: ShoppingCart, itemId: string): Promise<ShoppingCartItem> {
    const item = await this.items.findOne({ Id: itemId, CartId: cart.Id });
    if (!item) {
      throw new EntityNotFoundException('ShoppingCartItem', itemId);
    }
    return item;
  }

  private assertOpen(cart: ShoppingCart): ShoppingCart {
    if (cart.OrderId) {
      throw new ValidationException(`Cart ${cart.Code} has already been ordered`, { orderId: cart.OrderId });
    }
    return cart;
  }

  private toReadableItem(item: ShoppingCartItem): ReadableShoppingCartItem {
    return {
      id: item.Id,
      productId: item.ProductId,
      variantId: item.VariantId,
      sku: item.Sku,
      variantSku: item.VariantSku,
      name: item.Name,
      quantity: item.Quantity,
      unitPrice: item.UnitPrice,
      lineTotal: lineTotal(item.UnitPrice, item.Quantity),
    };
  }
}
