import { EntityNotFoundException } from '../common/errors/service.exception';
import { createCatalog, TestCatalog } from '../common/testing/catalog';
import { ExportService } from './export.service';
import { CsvExportFormatter } from './formatters/csv-export.formatter';

describe('ExportService', () => {
  let catalog: TestCatalog;
  let service: ExportService;

  beforeEach(async () => {
    catalog = await createCatalog();
    service = new ExportService(
      catalog.products,
      catalog.variants,
      catalog.merchantStoresService,
      catalog.categoriesService,
      catalog.productsService,
      catalog.productOptionsService,
      new CsvExportFormatter(),
    );
  });

  it('writes only the header for an empty catalog', async () => {
    await expect(service.exportCatalogCsv('DEFAULT')).resolves.toBe(
      'sku,parent_sku,name,price,quantity,available,weight,categories',
    );
  });

  it('writes one row per product followed by its variants', async () => {
    const apparel = await catalog.categoriesService.create('DEFAULT', { code: 'apparel', name: 'Apparel' });
    const summer = await catalog.categoriesService.create('DEFAULT', { code: 'summer', name: 'Summer' });
    const options = catalog.productOptionsService;
    const color = await options.createOption('DEFAULT', { code: 'color', name: 'Color', type: 'select' });
    const size = await options.createOption('DEFAULT', { code: 'size', name: 'Size', type: 'radio' });
    const redValue = await options.createOptionValue('DEFAULT', { code: 'red', name: 'Red' });
    const blueValue = await options.createOptionValue('DEFAULT', { code: 'blue', name: 'Blue' });
    const largeValue = await options.createOptionValue('DEFAULT', { code: 'l', name: 'Large' });
    const red = await options.createVariation('DEFAULT', { code: 'color-red', optionId: color.id, optionValueId: redValue.id });
    const blue = await options.createVariation('DEFAULT', { code: 'color-blue', optionId: color.id, optionValueId: blueValue.id });
    const large = await options.createVariation('DEFAULT', { code: 'size-l', optionId: size.id, optionValueId: largeValue.id });

    const tee = await catalog.productsService.create('DEFAULT', {
      sku: 'TEE',
      name: 'Tee',
      price: 20,
      quantity: 3,
      weight: 0.25,
      categoryIds: [summer.id, apparel.id],
    });
    await catalog.productsService.create('DEFAULT', { sku: 'MUG', name: 'Mug, large', price: 12, quantity: 5 });
    await catalog.productVariantsService.create('DEFAULT', tee.id, {
      sku: 'TEE-RED',
      variationId: red.id,
      quantity: 2,
      available: false,
    });
    await catalog.productVariantsService.create('DEFAULT', tee.id, {
      sku: 'TEE-BLUE-L',
      variationId: blue.id,
      variationValueId: large.id,
      price: 24.5,
      quantity: 1,
    });

    const csv = await service.exportCatalogCsv('DEFAULT');

    expect(csv.split('\n')).toEqual([
      'sku,parent_sku,name,price,quantity,available,weight,categories',
      'MUG,,"Mug, large",12,5,true,,',
      'TEE,,Tee,20,3,true,0.25,apparel|summer',
      'TEE-BLUE-L,TEE,Tee - Blue / Large,24.5,1,true,0.25,apparel|summer',
      'TEE-RED,TEE,Tee - Red,20,2,false,0.25,apparel|summer',
    ]);
  });

  it('rejects an unknown store', async () => {
    await expect(service.exportCatalogCsv('NOPE')).rejects.toBeInstanceOf(EntityNotFoundException);
  });
});
