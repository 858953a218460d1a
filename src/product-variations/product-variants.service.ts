import { Injectable, Logger } from '@nestjs/common';
import { ActivityLogService } from '../common/activity-log.service';
import {
  DuplicateEntityException,
  EntityNotFoundException,
  ValidationException,
} from '../common/errors/service.exception';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { Product } from '../products/entities/product.entity';
import { ProductsService } from '../products/products.service';
import { CreateProductVariantDto, UpdateProductVariantDto } from './dto/product-variations.dto';
import { ProductVariant, ReadableProductVariant } from './entities/product-variations.entity';
import { ProductOptionsService } from './product-options.service';

/** A product, or one of its variants, as sold at a given moment. */
export interface Purchasable {
  product: Product;
  variant: ProductVariant | null;
  unitPrice: number;
  stock: number;
  available: boolean;
}

const STOCK_UPDATE_ATTEMPTS = 5;

export function effectivePrice(product: Pick<Product, 'Price'>, variant: Pick<ProductVariant, 'Price'> | null): number {
  return variant?.Price ?? product.Price;
}

@Injectable()
export class ProductVariantsService {
  private readonly logger = new Logger(ProductVariantsService.name);

  constructor(
    @InjectRepository(Tables.ProductVariants)
    private readonly variants: EntityRepository<ProductVariant>,
    @InjectRepository(Tables.Products)
    private readonly products: EntityRepository<Product>,
    private readonly productsService: ProductsService,
    private readonly productOptionsService: ProductOptionsService,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  async create(storeCode: string, productId: string, dto: CreateProductVariantDto): Promise<ReadableProductVariant> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.productsService.findInStore(store.Id, productId);
    if (await this.products.findOne({ StoreId: store.Id, Sku: dto.sku })) {
      throw new DuplicateEntityException('ProductVariant', dto.sku);
    }

    const variation = await this.productOptionsService.findVariation(store.Id, dto.variationId);
    if (dto.variationValueId) {
      const second = await this.productOptionsService.findVariation(store.Id, dto.variationValueId);
      if (second.OptionId === variation.OptionId) {
        throw new ValidationException('The two variations of a variant must use different options');
      }
    }
    const clash = await this.variants.findOne({
      ProductId: product.Id,
      VariationId: dto.variationId,
      VariationValueId: dto.variationValueId ?? null,
    });
    if (clash) {
      throw new DuplicateEntityException('ProductVariant', `${product.Sku} variation ${clash.Sku}`);
    }

    const defaultSelection =
      dto.defaultSelection ?? (await this.variants.count({ where: { ProductId: product.Id } })) === 0;
    if (defaultSelection) {
      await this.clearDefault(product.Id);
    }
    const variant = await this.variants.insert({
      ProductId: product.Id,
      StoreId: store.Id,
      Sku: dto.sku,
      VariationId: dto.variationId,
      VariationValueId: dto.variationValueId ?? null,
      Price: dto.price ?? null,
      Quantity: dto.quantity,
      Available: dto.available ?? true,
      DefaultSelection: defaultSelection,
      SortOrder: dto.sortOrder ?? 0,
    });
    this.logger.log(`Created variant ${variant.Sku} of ${product.Sku}`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'ProductVariant',
      entityId: variant.Id,
      eventType: 'VARIANT_CREATED',
      message: `Variant ${variant.Sku} of ${product.Sku} created`,
    });
    return this.toReadable(product, variant);
  }

  async list(storeCode: string, productId: string): Promise<ReadableProductVariant[]> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.productsService.findInStore(store.Id, productId);
    const variants = await this.variants.list({
      where: { ProductId: product.Id },
      orderBy: [{ column: 'SortOrder' }, { column: 'Sku' }],
    });
    const readable: ReadableProductVariant[] = [];
    for (const variant of variants) {
      readable.push(await this.toReadable(product, variant));
    }
    return readable;
  }

  async get(storeCode: string, productId: string, variantId: string): Promise<ReadableProductVariant> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.productsService.findInStore(store.Id, productId);
    return this.toReadable(product, await this.findForProduct(product.Id, variantId));
  }

  async update(
    storeCode: string,
    productId: string,
    variantId: string,
    dto: UpdateProductVariantDto,
  ): Promise<ReadableProductVariant> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.productsService.findInStore(store.Id, productId);
    const variant = await this.findForProduct(product.Id, variantId);
    if (dto.defaultSelection) {
      await this.clearDefault(product.Id);
    }
    const updated = await this.variants.update(variant.Id, {
      Price: dto.price,
      Quantity: dto.quantity,
      Available: dto.available,
      DefaultSelection: dto.defaultSelection,
      SortOrder: dto.sortOrder,
    });
    return this.toReadable(product, updated);
  }

  async delete(storeCode: string, productId: string, variantId: string): Promise<void> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.productsService.findInStore(store.Id, productId);
    const variant = await this.findForProduct(product.Id, variantId);
    await this.variants.delete(variant.Id);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'ProductVariant',
      entityId: variant.Id,
      eventType: 'VARIANT_DELETED',
      message: `Variant ${variant.Sku} of ${product.Sku} deleted`,
    });
  }

  /**
   * Looks up what a cart line refers to: the product by SKU and, when given,
   * one of its variants by SKU.
   */
  async resolvePurchasable(storeId: string, sku: string, variantSku?: string): Promise<Purchasable> {
    const product = await this.productsService.findBySku(storeId, sku);
    if (!variantSku) {
      return { product, variant: null, unitPrice: product.Price, stock: product.Quantity, available: product.Available };
    }
    const variant = await this.variants.findOne({ ProductId: product.Id, Sku: variantSku });
    if (!variant) {
      throw new EntityNotFoundException('ProductVariant', variantSku);
    }
    return {
      product,
      variant,
      unitPrice: effectivePrice(product, variant),
      stock: variant.Quantity,
      available: product.Available && variant.Available,
    };
  }

  async findById(id: string): Promise<ProductVariant | null> {
    return this.variants.findById(id);
  }

  /**
   * Removes `quantity` units from the variant, or the product when there is
   * no variant. Fails without writing when fewer units are left.
   */
  async takeStock(productId: string, variantId: string | null, quantity: number): Promise<void> {
    await this.changeStock(productId, variantId, -quantity);
  }

  async returnStock(productId: string, variantId: string | null, quantity: number): Promise<void> {
    await this.changeStock(productId, variantId, quantity);
  }

  private async changeStock(productId: string, variantId: string | null, delta: number): Promise<void> {
    for (let attempt = 0; attempt < STOCK_UPDATE_ATTEMPTS; attempt++) {
      const variant = variantId ? await this.variants.findById(variantId) : null;
      const row = variant ?? (await this.products.findById(productId));
      if (!row) {
        if (delta < 0) {
          throw new EntityNotFoundException('Product', productId);
        }
        this.logger.warn(`Cannot return ${delta} unit(s) to missing product ${productId}`);
        return;
      }
      const next = row.Quantity + delta;
      if (next < 0) {
        throw new ValidationException(`Only ${row.Quantity} unit(s) of ${row.Sku} in stock`, {
          sku: row.Sku,
          stock: row.Quantity,
        });
      }
      const filter = { where: { Id: row.Id, Quantity: row.Quantity } };
      const changed = variant
        ? await this.variants.updateWhere(filter, { Quantity: next })
        : await this.products.updateWhere(filter, { Quantity: next });
      if (changed === 1) {
        return;
      }
    }
    throw new ValidationException(`Stock of product ${productId} is changing too fast, try again`);
  }

  private async findForProduct(productId: string, variantId: string): Promise<ProductVariant> {
    const variant = await this.variants.findOne({ Id: variantId, ProductId: productId });
    if (!variant) {
      throw new EntityNotFoundException('ProductVariant', variantId);
    }
    return variant;
  }

  private async clearDefault(productId: string): Promise<void> {
    await this.variants.updateWhere({ where: { ProductId: productId, DefaultSelection: true } }, { DefaultSelection: false });
  }

  private async toReadable(product: Product, variant: ProductVariant): Promise<ReadableProductVariant> {
    const variation = await this.productOptionsService.toReadableVariation(
      await this.productOptionsService.findVariation(variant.StoreId, variant.VariationId),
    );
    const variationValue = variant.VariationValueId
      ? await this.productOptionsService.toReadableVariation(
          await this.productOptionsService.findVariation(variant.StoreId, variant.VariationValueId),
        )
      : null;
    return {
      id: variant.Id,
      productId: variant.ProductId,
      sku: variant.Sku,
      variation,
      variationValue,
      price: effectivePrice(product, variant),
      priceOverride: variant.Price,
      quantity: variant.Quantity,
      available: variant.Available,
      defaultSelection: variant.DefaultSelection,
      sortOrder: variant.SortOrder,
    };
  }
}
