import { DuplicateEntityException, EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { createCatalog, TestCatalog } from '../common/testing/catalog';
import { ReadableProduct } from '../products/entities/product.entity';
import { ReadableProductVariation } from './entities/product-variations.entity';

describe('product variations', () => {
  let catalog: TestCatalog;
  let product: ReadableProduct;
  let red: ReadableProductVariation;
  let blue: ReadableProductVariation;
  let large: ReadableProductVariation;

  beforeEach(async () => {
    catalog = await createCatalog();
    const options = catalog.productOptionsService;
    const color = await options.createOption('DEFAULT', { code: 'color', name: 'Color', type: 'select' });
    const size = await options.createOption('DEFAULT', { code: 'size', name: 'Size', type: 'radio' });
    const redValue = await options.createOptionValue('DEFAULT', { code: 'red', name: 'Red' });
    const blueValue = await options.createOptionValue('DEFAULT', { code: 'blue', name: 'Blue' });
    const largeValue = await options.createOptionValue('DEFAULT', { code: 'l', name: 'Large' });
    red = await options.createVariation('DEFAULT', { code: 'color-red', optionId: color.id, optionValueId: redValue.id });
    blue = await options.createVariation('DEFAULT', { code: 'color-blue', optionId: color.id, optionValueId: blueValue.id });
    large = await options.createVariation('DEFAULT', { code: 'size-l', optionId: size.id, optionValueId: largeValue.id });
    product = await catalog.productsService.create('DEFAULT', { sku: 'TEE', name: 'Tee', price: 20, quantity: 3 });
  });

  it('describes variations with their option and value', () => {
    expect(red.option.code).toBe('color');
    expect(red.optionValue.name).toBe('Red');
  });

  it('rejects a second variation for the same option and value', async () => {
    await expect(
      catalog.productOptionsService.createVariation('DEFAULT', {
        code: 'color-red-2',
        optionId: red.option.id,
        optionValueId: red.optionValue.id,
      }),
    ).rejects.toBeInstanceOf(DuplicateEntityException);
  });

  it('prices a variant at its override or the product price', async () => {
    const plain = await catalog.productVariantsService.create('DEFAULT', product.id, {
      sku: 'TEE-RED',
      variationId: red.id,
      quantity: 2,
    });
    const premium = await catalog.productVariantsService.create('DEFAULT', product.id, {
      sku: 'TEE-BLUE-L',
      variationId: blue.id,
      variationValueId: large.id,
      price: 24.5,
      quantity: 1,
    });

    expect(plain.price).toBe(20);
    expect(plain.priceOverride).toBeNull();
    expect(premium.price).toBe(24.5);
    expect(premium.variationValue?.code).toBe('size-l');
  });

  it('requires the two variations to use different options', async () => {
    await expect(
      catalog.productVariantsService.create('DEFAULT', product.id, {
        sku: 'TEE-RED-BLUE',
        variationId: red.id,
        variationValueId: blue.id,
        quantity: 1,
      }),
    ).rejects.toBeInstanceOf(ValidationException);
  });

  it('allows each variation pair once per product', async () => {
    await catalog.productVariantsService.create('DEFAULT', product.id, { sku: 'TEE-RED', variationId: red.id, quantity: 1 });
    await expect(
      catalog.productVariantsService.create('DEFAULT', product.id, { sku: 'TEE-RED-2', variationId: red.id, quantity: 1 }),
    ).rejects.toBeInstanceOf(DuplicateEntityException);
  });

  it('keeps variant SKUs apart from product SKUs', async () => {
    await expect(
      catalog.productVariantsService.create('DEFAULT', product.id, { sku: 'TEE', variationId: red.id, quantity: 1 }),
    ).rejects.toBeInstanceOf(DuplicateEntityException);
  });

  it('keeps a single default selection per product', async () => {
    const first = await catalog.productVariantsService.create('DEFAULT', product.id, {
      sku: 'TEE-RED',
      variationId: red.id,
      quantity: 1,
    });
    const second = await catalog.productVariantsService.create('DEFAULT', product.id, {
      sku: 'TEE-BLUE',
      variationId: blue.id,
      quantity: 1,
    });
    expect(first.defaultSelection).toBe(true);
    expect(second.defaultSelection).toBe(false);

    await catalog.productVariantsService.update('DEFAULT', product.id, second.id, { defaultSelection: true });

    const variants = await catalog.productVariantsService.list('DEFAULT', product.id);
    expect(variants.filter((variant) => variant.defaultSelection).map((variant) => variant.sku)).toEqual(['TEE-BLUE']);
  });

  it('protects options, values and variations in use', async () => {
    await catalog.productVariantsService.create('DEFAULT', product.id, { sku: 'TEE-RED', variationId: red.id, quantity: 1 });

    await expect(catalog.productOptionsService.deleteVariation('DEFAULT', red.id)).rejects.toBeInstanceOf(ValidationException);
    await expect(catalog.productOptionsService.deleteOption('DEFAULT', red.option.id)).rejects.toBeInstanceOf(
      ValidationException,
    );
    await expect(catalog.productOptionsService.deleteOptionValue('DEFAULT', red.optionValue.id)).rejects.toBeInstanceOf(
      ValidationException,
    );
    await expect(catalog.productOptionsService.deleteVariation('DEFAULT', blue.id)).resolves.toBeUndefined();
  });

  it('resolves what a SKU sells for and how many are in stock', async () => {
    await catalog.productVariantsService.create('DEFAULT', product.id, {
      sku: 'TEE-RED',
      variationId: red.id,
      price: 22,
      quantity: 7,
      available: false,
    });

    const base = await catalog.productVariantsService.resolvePurchasable(catalog.store.Id, 'TEE');
    expect([base.unitPrice, base.stock, base.available]).toEqual([20, 3, true]);
    const variant = await catalog.productVariantsService.resolvePurchasable(catalog.store.Id, 'TEE', 'TEE-RED');
    expect([variant.unitPrice, variant.stock, variant.available]).toEqual([22, 7, false]);
    await expect(
      catalog.productVariantsService.resolvePurchasable(catalog.store.Id, 'TEE', 'TEE-GREEN'),
    ).rejects.toBeInstanceOf(EntityNotFoundException);
  });

  it('takes and returns stock on the variant or the product', async () => {
    const variant = await catalog.productVariantsService.create('DEFAULT', product.id, {
      sku: 'TEE-RED',
      variationId: red.id,
      quantity: 2,
    });

    await catalog.productVariantsService.takeStock(product.id, variant.id, 2);
    await catalog.productVariantsService.takeStock(product.id, null, 1);
    await catalog.productVariantsService.returnStock(product.id, variant.id, 1);

    await expect(catalog.variants.findById(variant.id)).resolves.toMatchObject({ Quantity: 1 });
    await expect(catalog.products.findById(product.id)).resolves.toMatchObject({ Quantity: 2 });
  });

  it('refuses to take more stock than is left', async () => {
    const variant = await catalog.productVariantsService.create('DEFAULT', product.id, {
      sku: 'TEE-RED',
      variationId: red.id,
      quantity: 2,
    });

    await expect(catalog.productVariantsService.takeStock(product.id, variant.id, 3)).rejects.toThrow(
      'Only 2 unit(s) of TEE-RED in stock',
    );
    await expect(catalog.variants.findById(variant.id)).resolves.toMatchObject({ Quantity: 2 });
  });

  it('never sells the same unit twice when taken at once', async () => {
    const results = await Promise.allSettled([
      catalog.productVariantsService.takeStock(product.id, null, 2),
      catalog.productVariantsService.takeStock(product.id, null, 2),
    ]);

    expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
    await expect(catalog.products.findById(product.id)).resolves.toMatchObject({ Quantity: 1 });
  });
});
