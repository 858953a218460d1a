import { Injectable, Logger } from '@nestjs/common';
import { ActivityLogService } from '../common/activity-log.service';
import {
  DuplicateEntityException,
  EntityNotFoundException,
} from '../common/errors/service.exception';
import { EntityRepository, InjectRepository, RowPatch } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { DEFAULT_PAGE_SIZE, Page, toPage } from '../common/types/pagination';
import { formatAmount } from '../common/utils/money';
import { CategoriesService } from '../categories/categories.service';
import { ProductCategory } from '../categories/entities/product-category.entity';
import { OutputContentFile, ProductImageSize } from '../cms/file-content-type';
import { ProductImageManager, ProductImageUpload } from '../cms/product-image-manager';
import { MerchantStore } from '../merchant-stores/entities/merchant-store.entity';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { ProductVariant } from '../product-variations/entities/product-variations.entity';
import { CreateProductDto, ListProductsDto, UpdateProductDto } from './dto/product.dto';
import { Product, ProductImage, ReadableProduct, ReadableProductImage } from './entities/product.entity';

@Injectable()
export class ProductsService {
  private readonly logger = new Logger(ProductsService.name);

  constructor(
    @InjectRepository(Tables.Products)
    private readonly products: EntityRepository<Product>,
    @InjectRepository(Tables.ProductCategories)
    private readonly productCategories: EntityRepository<ProductCategory>,
    @InjectRepository(Tables.ProductImages)
    private readonly productImages: EntityRepository<ProductImage>,
    @InjectRepository(Tables.ProductVariants)
    private readonly productVariants: EntityRepository<ProductVariant>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly categoriesService: CategoriesService,
    private readonly productImageManager: ProductImageManager,
    private readonly activityLogService: ActivityLogService,
  ) {}

  async findInStore(storeId: string, id: string): Promise<Product> {
    const product = await this.products.findOne({ Id: id, StoreId: storeId });
    if (!product) {
      throw new EntityNotFoundException('Product', id);
    }
    return product;
  }

  async findBySku(storeId: string, sku: string): Promise<Product> {
    const product = await this.products.findOne({ StoreId: storeId, Sku: sku });
    if (!product) {
      throw new EntityNotFoundException('Product', sku);
    }
    return product;
  }

  async create(storeCode: string, dto: CreateProductDto): Promise<ReadableProduct> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    if (await this.productVariants.findOne({ StoreId: store.Id, Sku: dto.sku })) {
      throw new DuplicateEntityException('Product', dto.sku);
    }
    for (const categoryId of dto.categoryIds ?? []) {
      await this.categoriesService.findInStore(store.Id, categoryId);
    }
    const product = await this.products.insert({
      StoreId: store.Id,
      Sku: dto.sku,
      Name: dto.name,
      Description: dto.description ?? null,
      Price: dto.price,
      Quantity: dto.quantity ?? 0,
      Available: dto.available ?? true,
      Shippable: dto.shippable ?? true,
      Weight: dto.weight ?? null,
      Length: dto.length ?? null,
      Width: dto.width ?? null,
      Height: dto.height ?? null,
      DateAvailable: dto.dateAvailable ?? null,
      SortOrder: dto.sortOrder ?? 0,
    });
    if (dto.categoryIds && dto.categoryIds.length > 0) {
      await this.productCategories.insertMany(
        [...new Set(dto.categoryIds)].map((categoryId) => ({ ProductId: product.Id, CategoryId: categoryId })),
      );
    }
    this.logger.log(`Created product ${product.Sku} in ${storeCode}`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Product',
      entityId: product.Id,
      eventType: 'PRODUCT_CREATED',
      message: `Product ${product.Sku} created`,
    });
    return this.toReadable(store, product);
  }

  async getById(storeCode: string, id: string): Promise<ReadableProduct> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    return this.toReadable(store, await this.findInStore(store.Id, id));
  }

  async getBySku(storeCode: string, sku: string): Promise<ReadableProduct> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    return this.toReadable(store, await this.findBySku(store.Id, sku));
  }

  async list(storeCode: string, query: ListProductsDto): Promise<Page<ReadableProduct>> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    let productIds: string[] | undefined;
    if (query.categoryId) {
      const links = await this.productCategories.list({ where: { CategoryId: query.categoryId } });
      productIds = links.map((link) => link.ProductId);
      if (productIds.length === 0) {
        return toPage([], 0, query);
      }
    }
    const { items, total } = await this.products.findAll({
      where: { StoreId: store.Id, Available: query.available },
      contains: query.name ? { Name: query.name } : undefined,
      in: productIds ? { Id: productIds } : undefined,
      orderBy: [{ column: 'SortOrder' }, { column: 'Name' }],
      page: query.page ?? 0,
      count: query.count ?? DEFAULT_PAGE_SIZE,
    });
    const readable: ReadableProduct[] = [];
    for (const product of items) {
      readable.push(await this.toReadable(store, product));
    }
    return toPage(readable, total, query);
  }

  async update(storeCode: string, id: string, dto: UpdateProductDto): Promise<ReadableProduct> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, id);
    const patch: RowPatch<Product> = {
      Name: dto.name,
      Description: dto.description,
      Price: dto.price,
      Quantity: dto.quantity,
      Available: dto.available,
      Shippable: dto.shippable,
      Weight: dto.weight,
      Length: dto.length,
      Width: dto.width,
      Height: dto.height,
      DateAvailable: dto.dateAvailable,
      SortOrder: dto.sortOrder,
    };
    const updated = await this.products.update(product.Id, patch);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Product',
      entityId: product.Id,
      eventType: 'PRODUCT_UPDATED',
      message: `Product ${product.Sku} updated`,
    });
    return this.toReadable(store, updated);
  }

  /** Removes the product with its variants, category links and images. */
  async delete(storeCode: string, id: string): Promise<void> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, id);
    const variants = await this.productVariants.deleteWhere({ where: { ProductId: product.Id } });
    await this.productCategories.deleteWhere({ where: { ProductId: product.Id } });
    await this.productImages.deleteWhere({ where: { ProductId: product.Id } });
    const files = await this.productImageManager.removeProductImages(storeCode, product.Sku);
    await this.products.delete(product.Id);
    this.logger.log(`Deleted product ${product.Sku} (${variants} variant(s), ${files} image file(s))`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Product',
      entityId: product.Id,
      eventType: 'PRODUCT_DELETED',
      message: `Product ${product.Sku} deleted`,
    });
  }

  async addToCategory(storeCode: string, productId: string, categoryId: string): Promise<ReadableProduct> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, productId);
    await this.categoriesService.findInStore(store.Id, categoryId);
    const existing = await this.productCategories.findOne({ ProductId: product.Id, CategoryId: categoryId });
    if (!existing) {
      await this.productCategories.insert({ ProductId: product.Id, CategoryId: categoryId });
    }
    return this.toReadable(store, product);
  }

  async removeFromCategory(storeCode: string, productId: string, categoryId: string): Promise<ReadableProduct> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, productId);
    await this.productCategories.deleteWhere({ where: { ProductId: product.Id, CategoryId: categoryId } });
    return this.toReadable(store, product);
  }

  async categoryIdsOf(productId: string): Promise<string[]> {
    const links = await this.productCategories.list({ where: { ProductId: productId } });
    return links.map((link) => link.CategoryId);
  }

  /** Stores both renditions through the CMS; the first image becomes the default one. */
  async addImage(storeCode: string, productId: string, upload: ProductImageUpload): Promise<ReadableProductImage> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, productId);
    if (await this.productImages.findOne({ ProductId: product.Id, FileName: upload.fileName })) {
      throw new DuplicateEntityException('ProductImage', `${product.Sku}/${upload.fileName}`);
    }
    await this.productImageManager.addProductImage(storeCode, product.Sku, upload);
    let image: ProductImage;
    try {
      const existing = await this.productImages.count({ where: { ProductId: product.Id } });
      image = await this.productImages.insert({
        ProductId: product.Id,
        FileName: upload.fileName,
        MimeType: upload.mimeType,
        SortOrder: existing,
        DefaultImage: existing === 0,
      });
    } catch (error) {
      await this.productImageManager.removeProductImage(storeCode, product.Sku, upload.fileName);
      throw error;
    }
    return this.toReadableImage(storeCode, product.Sku, image);
  }

  async listImages(storeCode: string, productId: string): Promise<ReadableProductImage[]> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, productId);
    return this.imagesOf(storeCode, product);
  }

  /** Deletes the image; when it was the default one the next image takes over. */
  async removeImage(storeCode: string, productId: string, imageId: string): Promise<void> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, productId);
    const image = await this.productImages.findOne({ Id: imageId, ProductId: product.Id });
    if (!image) {
      throw new EntityNotFoundException('ProductImage', imageId);
    }
    await this.productImageManager.removeProductImage(storeCode, product.Sku, image.FileName);
    await this.productImages.delete(image.Id);
    if (image.DefaultImage) {
      const [next] = await this.productImages.list({
        where: { ProductId: product.Id },
        orderBy: [{ column: 'SortOrder' }],
        count: 1,
      });
      if (next) {
        await this.productImages.update(next.Id, { DefaultImage: true });
      }
    }
  }

  async getImageContent(
    storeCode: string,
    productId: string,
    imageId: string,
    size: ProductImageSize,
  ): Promise<OutputContentFile> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const product = await this.findInStore(store.Id, productId);
    const image = await this.productImages.findOne({ Id: imageId, ProductId: product.Id });
    if (!image) {
      throw new EntityNotFoundException('ProductImage', imageId);
    }
    const file = await this.productImageManager.getProductImage(storeCode, product.Sku, image.FileName, size);
    if (!file) {
      throw new EntityNotFoundException('ProductImage', `${product.Sku}/${size}/${image.FileName}`);
    }
    return file;
  }

  async toReadable(store: MerchantStore, product: Product): Promise<ReadableProduct> {
    return {
      id: product.Id,
      sku: product.Sku,
      name: product.Name,
      description: product.Description,
      price: product.Price,
      displayPrice: formatAmount(product.Price, store.Currency),
      quantity: product.Quantity,
      available: product.Available,
      shippable: product.Shippable,
      weight: product.Weight,
      dimensions: { length: product.Length, width: product.Width, height: product.Height },
      dateAvailable: product.DateAvailable,
      sortOrder: product.SortOrder,
      categoryIds: await this.categoryIdsOf(product.Id),
      images: await this.imagesOf(store.Code, product),
    };
  }

  private async imagesOf(storeCode: string, product: Product): Promise<ReadableProductImage[]> {
    const images = await this.productImages.list({
      where: { ProductId: product.Id },
      orderBy: [{ column: 'SortOrder' }],
    });
    return images.map((image) => this.toReadableImage(storeCode, product.Sku, image));
  }

  private toReadableImage(storeCode: string, sku: string, image: ProductImage): ReadableProductImage {
    return {
      id: image.Id,
      fileName: image.FileName,
      mimeType: image.MimeType,
      defaultImage: image.DefaultImage,
      sortOrder: image.SortOrder,
      urls: {
        SMALL: this.productImageManager.imageUrl(storeCode, sku, image.FileName, 'SMALL'),
        LARGE: this.productImageManager.imageUrl(storeCode, sku, image.FileName, 'LARGE'),
      },
    };
  }
}
