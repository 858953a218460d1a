import { ConfigService } from '@nestjs/config';
import { createCarts, createCatalog, TestCarts } from '../common/testing/catalog';
import { TasksService } from './tasks.service';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('TasksService', () => {
  let carts: TestCarts;

  beforeEach(async () => {
    const catalog = await createCatalog();
    carts = createCarts(catalog);
    await catalog.productsService.create('DEFAULT', { sku: 'TEE', name: 'Tee', price: 20, quantity: 10 });
  });

  it('removes carts idle for longer than the configured days', async () => {
    const cart = await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });
    const service = new TasksService(new ConfigService({ CART_EXPIRY_DAYS: 7 }), carts.service);
    const now = Date.now();

    await expect(service.removeAbandonedCarts(new Date(now + 6 * DAY_MS))).resolves.toBe(0);
    await expect(service.removeAbandonedCarts(new Date(now + 8 * DAY_MS))).resolves.toBe(1);
    await expect(carts.carts.findById(cart.id)).resolves.toBeNull();
    await expect(carts.items.count({ where: { CartId: cart.id } })).resolves.toBe(0);
  });

  it('falls back to thirty days', async () => {
    await carts.service.addItem('DEFAULT', undefined, { sku: 'TEE', quantity: 1 });
    const service = new TasksService(new ConfigService({}), carts.service);
    const now = Date.now();

    await expect(service.removeAbandonedCarts(new Date(now + 29 * DAY_MS))).resolves.toBe(0);
    await expect(service.removeAbandonedCarts(new Date(now + 31 * DAY_MS))).resolves.toBe(1);
  });
});
