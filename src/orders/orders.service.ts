import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { EntityRepository, FilterCriteria, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { DEFAULT_PAGE_SIZE, Page, toPage } from '../common/types/pagination';
import { errorMessage } from '../common/utils/errors';
import { formatAmount, fromCents, lineTotal, sumAmounts, toCents } from '../common/utils/money';
import { MerchantStore } from '../merchant-stores/entities/merchant-store.entity';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { PaymentsService } from '../payments/payments.service';
import { PaymentResult } from '../payments/processors/payment-processor';
import { ProductVariantsService } from '../product-variations/product-variants.service';
import { ShippingService } from '../shipping/shipping.service';
import { ShoppingCartItem } from '../shopping-carts/entities/shopping-cart.entity';
import { assertPurchasable, cartTotals, ShoppingCartsService } from '../shopping-carts/shopping-carts.service';
import { CheckoutDto, ListOrdersDto, UpdateOrderStatusDto } from './dto/order.dto';
import {
  Order,
  OrderAddress,
  OrderProduct,
  OrderStatus,
  OrderStatusHistory,
  ORDER_TOTAL_CODES,
  OrderTotal,
  ReadableOrder,
  Transaction,
} from './entities/order.entity';
import { OrderEventsService } from './order-events.service';
import { canTransition } from './order-status';

function toAddress(address: OrderAddress): OrderAddress {
  return { ...address, country: address.country.toUpperCase() };
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectRepository(Tables.Orders)
    private readonly orders: EntityRepository<Order>,
    @InjectRepository(Tables.OrderProducts)
    private readonly orderProducts: EntityRepository<OrderProduct>,
    @InjectRepository(Tables.OrderTotals)
    private readonly orderTotals: EntityRepository<OrderTotal>,
    @InjectRepository(Tables.OrderStatusHistory)
    private readonly statusHistory: EntityRepository<OrderStatusHistory>,
    @InjectRepository(Tables.Transactions)
    private readonly transactions: EntityRepository<Transaction>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly shoppingCartsService: ShoppingCartsService,
    private readonly productVariantsService: ProductVariantsService,
    private readonly shippingService: ShippingService,
    private readonly paymentsService: PaymentsService,
    private readonly orderEventsService: OrderEventsService,
  ) {}

  /**
   * Turns a cart into an order. The cart is claimed and the stock taken before
   * the payment; both are given back when the payment fails. No order row is
   * written until the payment succeeds.
   */
  async checkout(storeCode: string, dto: CheckoutDto): Promise<ReadableOrder> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const cart = await this.shoppingCartsService.findByCode(store.Id, dto.cartCode);
    if (cart.OrderId) {
      throw new ValidationException(`Cart ${cart.Code} has already been ordered`, { orderId: cart.OrderId });
    }
    const lines = await this.shoppingCartsService.linesOf(cart.Id);
    if (lines.length === 0) {
      throw new ValidationException(`Cart ${cart.Code} is empty`);
    }
    for (const line of lines) {
      const purchasable = await this.productVariantsService.resolvePurchasable(
        store.Id,
        line.Sku,
        line.VariantSku ?? undefined,
      );
      assertPurchasable(purchasable, line.Quantity);
    }
    await this.paymentsService.assertUsable(store, dto.paymentModule);

    const billing = toAddress(dto.billing);
    const delivery = dto.delivery ? toAddress(dto.delivery) : null;
    const quote = await this.shippingService.quoteLines(store, (delivery ?? billing).country, lines);
    let shippingTotal = 0;
    let shippingOptionCode: string | null = null;
    if (quote.shippingRequired) {
      if (quote.error) {
        throw new ValidationException(`Shipping to ${quote.country} is not possible: ${quote.error}`, {
          error: quote.error,
        });
      }
      const option = dto.shippingOptionCode
        ? quote.options.find((candidate) => candidate.code === dto.shippingOptionCode)
        : quote.options[0];
      if (!option) {
        throw new ValidationException(`Unknown shipping option ${dto.shippingOptionCode}`);
      }
      shippingTotal = option.price;
      shippingOptionCode = option.code;
    }
    const { subTotal } = cartTotals(lines);
    const total = sumAmounts([subTotal, shippingTotal]);

    const orderId = uuidv4();
    await this.shoppingCartsService.claimForOrder(cart, orderId);
    const taken: ShoppingCartItem[] = [];
    let payment: PaymentResult;
    try {
      for (const line of lines) {
        await this.productVariantsService.takeStock(line.ProductId, line.VariantId, line.Quantity);
        taken.push(line);
      }
      payment = await this.paymentsService.charge(store, {
        moduleCode: dto.paymentModule,
        amount: total,
        chargeType: dto.chargeType ?? 'AUTHORIZECAPTURE',
        paymentToken: dto.paymentToken,
        description: `${store.Name} order of cart ${cart.Code}`,
        metadata: { store: store.Code, cartCode: cart.Code },
      });
    } catch (error) {
      await this.undoCheckout(cart.Id, orderId, taken);
      throw error;
    }

    const order = await this.orders.insert({
      Id: orderId,
      StoreId: store.Id,
      CartCode: cart.Code,
      Status: 'ORDERED',
      CustomerEmail: dto.customer.email,
      CustomerFirstName: dto.customer.firstName,
      CustomerLastName: dto.customer.lastName,
      Billing: billing,
      Delivery: delivery,
      Currency: store.Currency,
      PaymentModuleCode: dto.paymentModule,
      ShippingOptionCode: shippingOptionCode,
      SubTotal: subTotal,
      ShippingTotal: shippingTotal,
      Total: total,
      DatePurchased: new Date().toISOString(),
    });
    await this.orderProducts.insertMany(
      lines.map((line) => ({
        OrderId: order.Id,
        ProductId: line.ProductId,
        VariantId: line.VariantId,
        Sku: line.Sku,
        VariantSku: line.VariantSku,
        Name: line.Name,
        Quantity: line.Quantity,
        UnitPrice: line.UnitPrice,
        LineTotal: lineTotal(line.UnitPrice, line.Quantity),
      })),
    );
    await this.orderTotals.insertMany([
      { OrderId: order.Id, Code: ORDER_TOTAL_CODES.subTotal, Title: 'Sub-total', Value: subTotal, SortOrder: 0 },
      { OrderId: order.Id, Code: ORDER_TOTAL_CODES.shipping, Title: 'Shipping', Value: shippingTotal, SortOrder: 100 },
      { OrderId: order.Id, Code: ORDER_TOTAL_CODES.total, Title: 'Total', Value: total, SortOrder: 500 },
    ]);
    await this.statusHistory.insert({
      OrderId: order.Id,
      Status: 'ORDERED',
      Comment: dto.comments ?? null,
      CustomerNotified: false,
    });
    await this.transactions.insert({
      OrderId: order.Id,
      PaymentModuleCode: dto.paymentModule,
      TransactionType: payment.transactionType,
      Amount: payment.amount,
      Reference: payment.reference,
      Details: payment.details,
    });

    this.logger.log(`Order ${order.Id} placed in ${storeCode} for ${total} ${store.Currency}`);
    this.orderEventsService.emitOrderCreated({
      storeCode,
      orderId: order.Id,
      cartCode: cart.Code,
      customerEmail: order.CustomerEmail,
      total,
      currency: store.Currency,
    });
    return this.toReadable(order);
  }

  async list(storeCode: string, query: ListOrdersDto): Promise<Page<ReadableOrder>> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const filter: FilterCriteria<Order> = {
      where: query.status ? { StoreId: store.Id, Status: query.status } : { StoreId: store.Id },
      contains: query.email ? { CustomerEmail: query.email } : undefined,
    };
    const { items, total } = await this.orders.findAll({
      ...filter,
      orderBy: [{ column: 'DatePurchased', ascending: false }],
      page: query.page ?? 0,
      count: query.count ?? DEFAULT_PAGE_SIZE,
    });
    const orders: ReadableOrder[] = [];
    for (const order of items) {
      orders.push(await this.toReadable(order));
    }
    return toPage(orders, total, query);
  }

  async get(storeCode: string, id: string): Promise<ReadableOrder> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    return this.toReadable(await this.findInStore(store.Id, id));
  }

  /**
   * Moves an order along its lifecycle. Canceling puts the ordered quantities
   * back in stock.
   */
  async updateStatus(storeCode: string, id: string, dto: UpdateOrderStatusDto): Promise<ReadableOrder> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const order = await this.findInStore(store.Id, id);
    const updated = await this.transition(store, order, dto.status, dto.comment ?? null, dto.customerNotified ?? false);
    return this.toReadable(updated);
  }

  /**
   * Refunds `amount`, or whatever has not been refunded yet. Once the whole
   * total is refunded the order becomes REFUNDED.
   */
  async refund(storeCode: string, id: string, amount?: number): Promise<ReadableOrder> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    let order = await this.findInStore(store.Id, id);
    if (!canTransition(order.Status, 'REFUNDED')) {
      throw new ValidationException(`Order ${order.Id} cannot be refunded while ${order.Status}`);
    }
    const transactions = await this.transactionsOf(order.Id);
    const refunded = sumAmounts(
      transactions.filter((transaction) => transaction.TransactionType === 'REFUND').map((transaction) => transaction.Amount),
    );
    const payment = [...transactions].reverse().find((transaction) => transaction.TransactionType !== 'REFUND');
    const refundAmount = amount ?? fromCents(toCents(order.Total) - toCents(refunded));

    const result = await this.paymentsService.refund(
      store,
      { moduleCode: order.PaymentModuleCode, total: order.Total, refunded, reference: payment?.Reference ?? null },
      refundAmount,
    );
    await this.transactions.insert({
      OrderId: order.Id,
      PaymentModuleCode: order.PaymentModuleCode,
      TransactionType: 'REFUND',
      Amount: result.amount,
      Reference: result.reference,
      Details: result.details,
    });
    this.logger.log(`Refunded ${result.amount} ${order.Currency} of order ${order.Id}`);

    if (toCents(refunded) + toCents(result.amount) === toCents(order.Total)) {
      order = await this.transition(store, order, 'REFUNDED', `Refunded ${result.amount}`, false);
    }
    return this.toReadable(order);
  }

  private async transition(
    store: MerchantStore,
    order: Order,
    status: OrderStatus,
    comment: string | null,
    customerNotified: boolean,
  ): Promise<Order> {
    if (!canTransition(order.Status, status)) {
      throw new ValidationException(`Order ${order.Id} cannot move from ${order.Status} to ${status}`, {
        from: order.Status,
        to: status,
      });
    }
    if (status === 'CANCELED') {
      const lines = await this.orderProducts.list({ where: { OrderId: order.Id } });
      for (const line of lines) {
        await this.productVariantsService.returnStock(line.ProductId, line.VariantId, line.Quantity);
      }
    }
    const updated = await this.orders.update(order.Id, { Status: status });
    await this.statusHistory.insert({ OrderId: order.Id, Status: status, Comment: comment, CustomerNotified: customerNotified });
    this.orderEventsService.emitOrderStatusChanged({
      storeCode: store.Code,
      orderId: order.Id,
      from: order.Status,
      to: status,
      comment,
    });
    return updated;
  }

  private async undoCheckout(cartId: string, orderId: string, taken: ShoppingCartItem[]): Promise<void> {
    try {
      for (const line of taken) {
        await this.productVariantsService.returnStock(line.ProductId, line.VariantId, line.Quantity);
      }
      await this.shoppingCartsService.releaseClaim(cartId, orderId);
    } catch (error) {
      this.logger.error(`Could not release cart ${cartId} after a failed checkout: ${errorMessage(error)}`);
    }
  }

  private async findInStore(storeId: string, id: string): Promise<Order> {
    const order = await this.orders.findOne({ Id: id, StoreId: storeId });
    if (!order) {
      throw new EntityNotFoundException('Order', id);
    }
    return order;
  }

  private async transactionsOf(orderId: string): Promise<Transaction[]> {
    return this.transactions.list({ where: { OrderId: orderId }, orderBy: [{ column: 'CreatedAt' }] });
  }

  private async toReadable(order: Order): Promise<ReadableOrder> {
    const [products, totals, history, transactions] = await Promise.all([
      this.orderProducts.list({ where: { OrderId: order.Id }, orderBy: [{ column: 'CreatedAt' }] }),
      this.orderTotals.list({ where: { OrderId: order.Id }, orderBy: [{ column: 'SortOrder' }] }),
      this.statusHistory.list({ where: { OrderId: order.Id }, orderBy: [{ column: 'CreatedAt' }] }),
      this.transactionsOf(order.Id),
    ]);
    return {
      id: order.Id,
      cartCode: order.CartCode,
      status: order.Status,
      customer: { email: order.CustomerEmail, firstName: order.CustomerFirstName, lastName: order.CustomerLastName },
      billing: order.Billing,
      delivery: order.Delivery,
      currency: order.Currency,
      paymentModule: order.PaymentModuleCode,
      shippingOption: order.ShippingOptionCode,
      subTotal: order.SubTotal,
      shippingTotal: order.ShippingTotal,
      total: order.Total,
      displayTotal: formatAmount(order.Total, order.Currency),
      datePurchased: order.DatePurchased,
      products: products.map((line) => ({
        id: line.Id,
        productId: line.ProductId,
        variantId: line.VariantId,
        sku: line.Sku,
        variantSku: line.VariantSku,
        name: line.Name,
        quantity: line.Quantity,
        unitPrice: line.UnitPrice,
        lineTotal: line.LineTotal,
      })),
      totals: totals.map((total) => ({
        code: total.Code,
        title: total.Title,
        value: total.Value,
        sortOrder: total.SortOrder,
      })),
      history: history.map((entry) => ({
        status: entry.Status,
        comment: entry.Comment,
        customerNotified: entry.CustomerNotified,
        date: entry.CreatedAt,
      })),
      transactions: transactions.map((transaction) => ({
        id: transaction.Id,
        type: transaction.TransactionType,
        paymentModule: transaction.PaymentModuleCode,
        amount: transaction.Amount,
        reference: transaction.Reference,
        date: transaction.CreatedAt,
      })),
    };
  }
}
