import { Injectable, Logger } from '@nestjs/common';
import { CategoriesService } from '../categories/categories.service';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { ProductVariant } from '../product-variations/entities/product-variations.entity';
import { effectivePrice } from '../product-variations/product-variants.service';
import { ProductOptionsService } from '../product-variations/product-options.service';
import { Product } from '../products/entities/product.entity';
import { ProductsService } from '../products/products.service';
import { CatalogCsvRow, CsvExportFormatter } from './formatters/csv-export.formatter';

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(
    @InjectRepository(Tables.Products)
    private readonly products: EntityRepository<Product>,
    @InjectRepository(Tables.ProductVariants)
    private readonly variants: EntityRepository<ProductVariant>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly categoriesService: CategoriesService,
    private readonly productsService: ProductsService,
    private readonly productOptionsService: ProductOptionsService,
    private readonly csvFormatter: CsvExportFormatter,
  ) {}

  /** One row per product followed by one row per variant of that product. */
  async exportCatalogCsv(storeCode: string): Promise<string> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const categoryCodes = new Map(
      (await this.categoriesService.list(storeCode)).map((category) => [category.id, category.code]),
    );
    const products = await this.products.list({
      where: { StoreId: store.Id },
      orderBy: [{ column: 'SortOrder' }, { column: 'Sku' }],
    });

    const rows: CatalogCsvRow[] = [];
    for (const product of products) {
      const categories = (await this.productsService.categoryIdsOf(product.Id))
        .map((id) => categoryCodes.get(id))
        .filter((code): code is string => code !== undefined)
        .sort()
        .join('|');
      rows.push({
        sku: product.Sku,
        parent_sku: '',
        name: product.Name,
        price: product.Price,
        quantity: product.Quantity,
        available: product.Available,
        weight: product.Weight,
        categories,
      });
      const variants = await this.variants.list({
        where: { ProductId: product.Id },
        orderBy: [{ column: 'SortOrder' }, { column: 'Sku' }],
      });
      for (const variant of variants) {
        rows.push({
          sku: variant.Sku,
          parent_sku: product.Sku,
          name: `${product.Name} - ${await this.variantLabel(store.Id, variant)}`,
          price: effectivePrice(product, variant),
          quantity: variant.Quantity,
          available: product.Available && variant.Available,
          weight: product.Weight,
          categories,
        });
      }
    }
    this.logger.log(`Exported ${rows.length} catalog row(s) of ${storeCode}`);
    return this.csvFormatter.convertToCsvString(rows);
  }

  private async variantLabel(storeId: string, variant: ProductVariant): Promise<string> {
    const ids = variant.VariationValueId ? [variant.VariationId, variant.VariationValueId] : [variant.VariationId];
    const names: string[] = [];
    for (const id of ids) {
      const variation = await this.productOptionsService.toReadableVariation(
        await this.productOptionsService.findVariation(storeId, id),
      );
      names.push(variation.optionValue.name);
    }
    return names.join(' / ');
  }
}
