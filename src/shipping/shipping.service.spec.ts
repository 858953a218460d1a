import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { createCarts, createCatalog, createShipping, TestCarts, TestCatalog } from '../common/testing/catalog';
import { SaveShippingConfigurationDto } from './dto/shipping.dto';
import { ShippingService } from './shipping.service';

const national: SaveShippingConfigurationDto = {
  shippingType: 'NATIONAL',
  handlingFee: 2,
  regions: [
    {
      name: 'Canada',
      countries: ['CA'],
      priceTable: [
        { maxWeight: 5, price: 15 },
        { maxWeight: 1, price: 8 },
      ],
    },
  ],
};

describe('ShippingService', () => {
  let catalog: TestCatalog;
  let carts: TestCarts;
  let service: ShippingService;

  beforeEach(async () => {
    catalog = await createCatalog();
    carts = createCarts(catalog);
    service = createShipping(catalog, carts);
    await catalog.productsService.create('DEFAULT', { sku: 'TEE', name: 'Tee', price: 20, quantity: 10, weight: 0.5 });
    await catalog.productsService.create('DEFAULT', {
      sku: 'EBOOK',
      name: 'E-book',
      price: 5,
      quantity: 100,
      shippable: false,
    });
    await catalog.productsService.create('DEFAULT', { sku: 'ANVIL', name: 'Anvil', price: 40, quantity: 5, weight: 6 });
  });

  async function cartWith(sku: string, quantity: number): Promise<string> {
    return (await carts.service.addItem('DEFAULT', undefined, { sku, quantity })).code;
  }

  describe('configuration', () => {
    it('saves, replaces and deletes the store configuration', async () => {
      const created = await service.saveConfiguration('DEFAULT', national);
      const replaced = await service.saveConfiguration('DEFAULT', { ...national, handlingFee: 3 });

      expect(replaced.id).toBe(created.id);
      expect((await service.getConfiguration('DEFAULT')).handlingFee).toBe(3);

      await service.deleteConfiguration('DEFAULT');
      await expect(service.getConfiguration('DEFAULT')).rejects.toBeInstanceOf(EntityNotFoundException);
      await expect(service.deleteConfiguration('DEFAULT')).rejects.toBeInstanceOf(EntityNotFoundException);
    });

    it('upper-cases countries', async () => {
      const saved = await service.saveConfiguration('DEFAULT', {
        shippingType: 'INTERNATIONAL',
        shipToCountries: ['us', 'US', 'fr'],
        regions: [{ name: 'Abroad', countries: ['us'], priceTable: [{ maxWeight: 1, price: 1 }] }],
      });

      expect(saved.shipToCountries).toEqual(['US', 'FR']);
      expect(saved.regions[0].countries).toEqual(['US']);
    });

    it('rejects a country listed in two regions', async () => {
      await expect(
        service.saveConfiguration('DEFAULT', {
          ...national,
          regions: [...national.regions, { name: 'Again', countries: ['CA'], priceTable: [{ maxWeight: 1, price: 1 }] }],
        }),
      ).rejects.toThrow('CA is in both Canada and Again');
    });

    it('rejects empty price tables and negative amounts', async () => {
      await expect(
        service.saveConfiguration('DEFAULT', {
          ...national,
          regions: [{ name: 'Canada', countries: ['CA'], priceTable: [] }],
        }),
      ).rejects.toBeInstanceOf(ValidationException);
      await expect(
        service.saveConfiguration('DEFAULT', {
          ...national,
          regions: [{ name: 'Canada', countries: ['CA'], priceTable: [{ maxWeight: 1, price: -1 }] }],
        }),
      ).rejects.toBeInstanceOf(ValidationException);
    });

    it('requires destinations for international shipping', async () => {
      await expect(
        service.saveConfiguration('DEFAULT', { ...national, shippingType: 'INTERNATIONAL' }),
      ).rejects.toBeInstanceOf(ValidationException);
    });
  });

  describe('quote', () => {
    it('reports a missing configuration', async () => {
      const quote = await service.quote('DEFAULT', { country: 'CA', cartCode: await cartWith('TEE', 1) });

      expect(quote.error).toBe('NO_SHIPPING_MODULE_CONFIGURED');
      expect(quote.options).toEqual([]);
    });

    it('needs no shipping for carts without shippable items', async () => {
      await service.saveConfiguration('DEFAULT', national);

      const quote = await service.quote('DEFAULT', { country: 'US', cartCode: await cartWith('EBOOK', 2) });

      expect(quote).toMatchObject({ shippingRequired: false, error: null, options: [] });
    });

    it('ships nationally only to the store country', async () => {
      await service.saveConfiguration('DEFAULT', national);

      const quote = await service.quote('DEFAULT', { country: 'US', cartCode: await cartWith('TEE', 1) });

      expect(quote.error).toBe('NO_SHIPPING_TO_SELECTED_COUNTRY');
    });

    it('prices by the lightest matching row plus handling', async () => {
      await service.saveConfiguration('DEFAULT', national);

      const light = await service.quote('DEFAULT', { country: 'ca', cartCode: await cartWith('TEE', 2) });
      const heavier = await service.quote('DEFAULT', { country: 'CA', cartCode: await cartWith('TEE', 3) });

      expect(light).toMatchObject({ country: 'CA', weight: 1, weightUnit: 'KG', subTotal: 40, error: null });
      expect(light.options).toEqual([{ code: 'weightBased', name: 'Canada', price: 10, displayPrice: 'CA$10.00' }]);
      expect(heavier.weight).toBe(1.5);
      expect(heavier.options[0].price).toBe(17);
    });

    it('ignores the weight of items that are not shipped', async () => {
      await service.saveConfiguration('DEFAULT', national);
      const code = await cartWith('TEE', 1);
      await carts.service.addItem('DEFAULT', code, { sku: 'EBOOK', quantity: 3 });

      const quote = await service.quote('DEFAULT', { country: 'CA', cartCode: code });

      expect(quote.weight).toBe(0.5);
      expect(quote.subTotal).toBe(35);
    });

    it('reports items heavier than every row', async () => {
      await service.saveConfiguration('DEFAULT', national);

      const quote = await service.quote('DEFAULT', { country: 'CA', cartCode: await cartWith('ANVIL', 1) });

      expect(quote.error).toBe('ITEMS_TOO_HEAVY');
      expect(quote.weight).toBe(6);
    });

    it('offers free shipping from the threshold', async () => {
      await service.saveConfiguration('DEFAULT', { ...national, freeShippingEnabled: true, freeShippingThreshold: 50 });

      const below = await service.quote('DEFAULT', { country: 'CA', cartCode: await cartWith('TEE', 2) });
      const above = await service.quote('DEFAULT', { country: 'CA', cartCode: await cartWith('TEE', 3) });

      expect(below.options[0].code).toBe('weightBased');
      expect(above.options).toEqual([{ code: 'freeShipping', name: 'Free shipping', price: 0, displayPrice: 'CA$0.00' }]);
    });

    it('ships internationally to listed countries that have a region', async () => {
      await service.saveConfiguration('DEFAULT', {
        shippingType: 'INTERNATIONAL',
        shipToCountries: ['US', 'FR'],
        regions: [{ name: 'United States', countries: ['US'], priceTable: [{ maxWeight: 10, price: 25 }] }],
      });
      const code = await cartWith('TEE', 1);

      expect((await service.quote('DEFAULT', { country: 'US', cartCode: code })).options[0].price).toBe(25);
      expect((await service.quote('DEFAULT', { country: 'FR', cartCode: code })).error).toBe(
        'NO_SHIPPING_TO_SELECTED_COUNTRY',
      );
      expect((await service.quote('DEFAULT', { country: 'CA', cartCode: code })).error).toBe(
        'NO_SHIPPING_TO_SELECTED_COUNTRY',
      );
    });
  });
});
