import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { createCarts, createCatalog, TestCarts, TestCatalog } from '../common/testing/catalog';
import { ReadableProduct } from '../products/entities/product.entity';
import { cartTotals } from './shopping-carts.service';

describe('ShoppingCartsService', () => {
  let catalog: TestCatalog;
  let carts: TestCarts;
  let tee: ReadableProduct;

  beforeEach(async () => {
    catalog = await createCatalog();
    carts = createCarts(catalog);
    tee = await catalog.productsService.create('DEFAULT', { sku: 'TEE', name: 'Tee', price: 19.99, quantity: 10 });
    await catalog.productsService.create('DEFAULT', { sku: 'MUG', name: 'Mug', price: 8.5, quantity: 4 });
  });

  it('adds up totals in cents', () => {
    expect(
      cartTotals([
        { Quantity: 3, UnitPrice: 0.1 },
        { Quantity: 1, UnitPrice: 0.2 },
      ]),
    ).toEqual({ itemCount: 4, subTotal: 0.5 });
  });

  it('creates a cart when no code is given', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, {
      sku: 'TEE',
      quantity: 3,
      customerEmail: 'shopper@example.com',
    });

    expect(cart.code).toMatch(/^[0-9a-f]{32}$/);
    expect(cart.customerEmail).toBe('shopper@example.com');
    expect(cart.items).toHaveLength(1);
    expect(cart.items[0]).toMatchObject({ sku: 'TEE', quantity: 3, unitPrice: 19.99, lineTotal: 59.97 });
    expect(cart.itemCount).toBe(3);
    expect(cart.subTotal).toBe(59.97);
    expect(cart.displaySubTotal).toBe('CA$59.97');
  });

  it('merges lines for the same product', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 2 });
    const updated = await carts.service.addItem('DEFAULT', cart.code, { sku: 'TEE', quantity: 3 });

    expect(updated.items).toHaveLength(1);
    expect(updated.items[0].quantity).toBe(5);
  });

  it('snapshots the price current when the line changes', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });
    await catalog.productsService.update('DEFAULT', tee.id, { price: 17 });

    const updated = await carts.service.addItem('DEFAULT', cart.code, { sku: 'TEE', quantity: 1 });

    expect(updated.items[0].unitPrice).toBe(17);
    expect(updated.subTotal).toBe(34);
  });

  it('refuses more than the stock across merged lines', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 8 });

    await expect(carts.service.addItem('DEFAULT', cart.code, { sku: 'TEE', quantity: 3 })).rejects.toBeInstanceOf(
      ValidationException,
    );
    expect((await carts.service.get('DEFAULT', cart.code)).items[0].quantity).toBe(8);
  });

  it('does not create a cart for an unsellable first item', async () => {
    await expect(carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 11 })).rejects.toBeInstanceOf(
      ValidationException,
    );
    expect(await carts.carts.count()).toBe(0);
  });

  it('refuses unavailable products and products not yet released', async () => {
    await catalog.productsService.create('DEFAULT', { sku: 'OFF', name: 'Off', price: 1, quantity: 5, available: false });
    await catalog.productsService.create('DEFAULT', {
      sku: 'SOON',
      name: 'Soon',
      price: 1,
      quantity: 5,
      dateAvailable: '2999-01-01',
    });

    await expect(carts.service.addItem('DEFAULT', undefined, { sku: 'OFF', quantity: 1 })).rejects.toThrow(
      'OFF is not available',
    );
    await expect(carts.service.addItem('DEFAULT', undefined, { sku: 'SOON', quantity: 1 })).rejects.toThrow(
      'SOON is not available before 2999-01-01',
    );
  });

  it('checks variant stock and price for variant lines', async () => {
    const options = catalog.productOptionsService;
    const color = await options.createOption('DEFAULT', { code: 'color', name: 'Color', type: 'select' });
    const red = await options.createOptionValue('DEFAULT', { code: 'red', name: 'Red' });
    const variation = await options.createVariation('DEFAULT', { code: 'color-red', optionId: color.id, optionValueId: red.id });
    await catalog.productVariantsService.create('DEFAULT', tee.id, {
      sku: 'TEE-RED',
      variationId: variation.id,
      price: 24.5,
      quantity: 2,
    });

    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', variantSku: 'TEE-RED', quantity: 2 });
    const withPlain = await carts.service.addItem('DEFAULT', cart.code, { sku: 'TEE', quantity: 1 });

    expect(withPlain.items.map((item) => [item.variantSku, item.quantity, item.unitPrice])).toEqual([
      ['TEE-RED', 2, 24.5],
      [null, 1, 19.99],
    ]);
    expect(withPlain.subTotal).toBe(68.99);
    await expect(
      carts.service.addItem('DEFAULT', cart.code, { sku: 'TEE', variantSku: 'TEE-RED', quantity: 1 }),
    ).rejects.toBeInstanceOf(ValidationException);
  });

  it('updates and removes lines', async () => {
    let cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });
    cart = await carts.service.addItem('DEFAULT', cart.code, { sku: 'MUG', quantity: 1 });
    const [teeLine, mugLine] = cart.items;

    cart = await carts.service.updateItem('DEFAULT', cart.code, teeLine.id, 4);
    expect(cart.items.map((item) => item.quantity)).toEqual([4, 1]);

    cart = await carts.service.updateItem('DEFAULT', cart.code, teeLine.id, 0);
    expect(cart.items.map((item) => item.sku)).toEqual(['MUG']);

    cart = await carts.service.removeItem('DEFAULT', cart.code, mugLine.id);
    expect(cart.items).toEqual([]);
    expect(cart.subTotal).toBe(0);
  });

  it('keeps ordered carts read-only', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });
    await carts.service.claimForOrder({ Id: cart.id, Code: cart.code }, 'order-1');

    await expect(carts.service.addItem('DEFAULT', cart.code, { sku: 'TEE', quantity: 1 })).rejects.toThrow(
      `Cart ${cart.code} has already been ordered`,
    );
    await expect(carts.service.delete('DEFAULT', cart.code)).rejects.toBeInstanceOf(ValidationException);
    expect((await carts.service.get('DEFAULT', cart.code)).orderId).toBe('order-1');
  });

  it('lets only one order claim a cart', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });
    const ref = { Id: cart.id, Code: cart.code };

    const results = await Promise.allSettled([
      carts.service.claimForOrder(ref, 'order-1'),
      carts.service.claimForOrder(ref, 'order-2'),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    expect((await carts.service.get('DEFAULT', cart.code)).orderId).toBe('order-1');
  });

  it('releases a claim only for the order that holds it', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });
    await carts.service.claimForOrder({ Id: cart.id, Code: cart.code }, 'order-1');

    await carts.service.releaseClaim(cart.id, 'order-2');
    expect((await carts.service.get('DEFAULT', cart.code)).orderId).toBe('order-1');

    await carts.service.releaseClaim(cart.id, 'order-1');
    expect((await carts.service.get('DEFAULT', cart.code)).orderId).toBeNull();
  });

  it('deletes a cart with its lines', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });

    await carts.service.delete('DEFAULT', cart.code);

    await expect(carts.service.get('DEFAULT', cart.code)).rejects.toBeInstanceOf(EntityNotFoundException);
    expect(await carts.items.count()).toBe(0);
  });

  it('merges a source cart into a target cart', async () => {
    const target = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 2 });
    let source = await carts.service.addItem('DEFAULT', undefined, {
      sku: 'TEE',
      quantity: 1,
      customerEmail: 'shopper@example.com',
    });
    source = await carts.service.addItem('DEFAULT', source.code, { sku: 'MUG', quantity: 1 });

    const merged = await carts.service.merge('DEFAULT', target.code, source.code);

    expect(merged.items.map((item) => [item.sku, item.quantity])).toEqual([
      ['TEE', 3],
      ['MUG', 1],
    ]);
    expect(merged.customerEmail).toBe('shopper@example.com');
    await expect(carts.service.get('DEFAULT', source.code)).rejects.toBeInstanceOf(EntityNotFoundException);
  });

  it('re-checks stock when merging', async () => {
    const target = await carts.service.addItem('DEFAULT', undefined, { sku: 'MUG', quantity: 3 });
    const source = await carts.service.addItem('DEFAULT', undefined, { sku: 'MUG', quantity: 2 });

    await expect(carts.service.merge('DEFAULT', target.code, source.code)).rejects.toBeInstanceOf(ValidationException);
    expect((await carts.service.get('DEFAULT', source.code)).itemCount).toBe(2);
  });

  it('leaves both carts untouched when any merged line is short of stock', async () => {
    const target = await carts.service.addItem('DEFAULT', undefined, { sku: 'MUG', quantity: 3 });
    let source = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 2 });
    source = await carts.service.addItem('DEFAULT', source.code, { sku: 'MUG', quantity: 2 });

    await expect(carts.service.merge('DEFAULT', target.code, source.code)).rejects.toThrow(
      'Only 4 unit(s) of MUG in stock',
    );

    const unchanged = await carts.service.get('DEFAULT', target.code);
    expect(unchanged.items.map((item) => [item.sku, item.quantity])).toEqual([['MUG', 3]]);
    expect((await carts.service.get('DEFAULT', source.code)).items).toHaveLength(2);
  });

  it('removes carts idle for longer than the retention period', async () => {
    const storeId = catalog.store.Id;
    await carts.carts.insert({
      Code: 'idle',
      StoreId: storeId,
      CustomerEmail: null,
      OrderId: null,
      UpdatedAt: '2020-01-01T00:00:00.000Z',
    });
    await carts.carts.insert({
      Code: 'ordered',
      StoreId: storeId,
      CustomerEmail: null,
      OrderId: 'order-1',
      UpdatedAt: '2020-01-01T00:00:00.000Z',
    });
    await carts.carts.insert({
      Code: 'recent',
      StoreId: storeId,
      CustomerEmail: null,
      OrderId: null,
      UpdatedAt: '2020-02-15T00:00:00.000Z',
    });

    const removed = await carts.service.removeExpired(30, new Date('2020-03-01T00:00:00.000Z'));

    expect(removed).toBe(1);
    expect((await carts.carts.list({ orderBy: [{ column: 'Code' }] })).map((cart) => cart.Code)).toEqual([
      'ordered',
      'recent',
    ]);
  });
});
