import { Injectable, Logger } from '@nestjs/common';
import { ActivityLogService } from '../common/activity-log.service';
import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { CreateCategoryDto, UpdateCategoryDto } from './dto/category.dto';
import { Category, CategoryNode, ReadableCategory } from './entities/category.entity';
import { ProductCategory } from './entities/product-category.entity';

export const ROOT_LINEAGE = '/';

export function childLineage(parent: Pick<Category, 'Id' | 'Lineage'>): string {
  return `${parent.Lineage}${parent.Id}/`;
}

export function lineageDepth(lineage: string): number {
  return lineage.split('/').filter((segment) => segment.length > 0).length;
}

@Injectable()
export class CategoriesService {
  private readonly logger = new Logger(CategoriesService.name);

  constructor(
    @InjectRepository(Tables.Categories)
    private readonly categories: EntityRepository<Category>,
    @InjectRepository(Tables.ProductCategories)
    private readonly productCategories: EntityRepository<ProductCategory>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  /** The category row, scoped to the store. */
  async findInStore(storeId: string, id: string): Promise<Category> {
    const category = await this.categories.findOne({ Id: id, StoreId: storeId });
    if (!category) {
      throw new EntityNotFoundException('Category', id);
    }
    return category;
  }

  async create(storeCode: string, dto: CreateCategoryDto): Promise<ReadableCategory> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const parent = dto.parentId ? await this.findInStore(store.Id, dto.parentId) : null;
    const lineage = parent ? childLineage(parent) : ROOT_LINEAGE;
    const category = await this.categories.insert({
      StoreId: store.Id,
      Code: dto.code,
      Name: dto.name,
      Description: dto.description ?? null,
      ParentId: parent?.Id ?? null,
      Lineage: lineage,
      Depth: lineageDepth(lineage),
      SortOrder: dto.sortOrder ?? 0,
      Visible: dto.visible ?? true,
    });
    this.logger.log(`Created category ${category.Code} in ${storeCode}`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Category',
      entityId: category.Id,
      eventType: 'CATEGORY_CREATED',
      message: `Category ${category.Code} created`,
    });
    return this.toReadable(category);
  }

  async get(storeCode: string, id: string): Promise<ReadableCategory> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    return this.toReadable(await this.findInStore(store.Id, id));
  }

  async getByCode(storeCode: string, code: string): Promise<ReadableCategory> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const category = await this.categories.findOne({ StoreId: store.Id, Code: code });
    if (!category) {
      throw new EntityNotFoundException('Category', code);
    }
    return this.toReadable(category);
  }

  async update(storeCode: string, id: string, dto: UpdateCategoryDto): Promise<ReadableCategory> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const category = await this.findInStore(store.Id, id);
    const updated = await this.categories.update(category.Id, {
      Name: dto.name,
      Description: dto.description,
      SortOrder: dto.sortOrder,
      Visible: dto.visible,
    });
    return this.toReadable(updated);
  }

  /**
   * Re-parents the category (null makes it a root) and rewrites the lineage of
   * its whole subtree.
   */
  async move(storeCode: string, id: string, parentId: string | null): Promise<ReadableCategory> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const category = await this.findInStore(store.Id, id);
    const subtreePrefix = childLineage(category);
    let newLineage = ROOT_LINEAGE;
    if (parentId !== null) {
      if (parentId === category.Id) {
        throw new ValidationException('A category cannot be its own parent');
      }
      const parent = await this.findInStore(store.Id, parentId);
      if (parent.Lineage.startsWith(subtreePrefix)) {
        throw new ValidationException('A category cannot be moved below one of its descendants');
      }
      newLineage = childLineage(parent);
    }

    const moved = await this.categories.update(category.Id, {
      ParentId: parentId,
      Lineage: newLineage,
      Depth: lineageDepth(newLineage),
    });
    const newSubtreePrefix = childLineage(moved);
    const descendants = await this.descendantsOf(category);
    for (const descendant of descendants) {
      const lineage = newSubtreePrefix + descendant.Lineage.slice(subtreePrefix.length);
      await this.categories.update(descendant.Id, { Lineage: lineage, Depth: lineageDepth(lineage) });
    }
    this.logger.log(`Moved category ${category.Code} (${descendants.length} descendant(s)) to ${parentId ?? 'root'}`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Category',
      entityId: category.Id,
      eventType: 'CATEGORY_MOVED',
      message: `Category ${category.Code} moved`,
      details: { parentId },
    });
    return this.toReadable(moved);
  }

  /** Removes the category, its descendants and their product links. */
  async delete(storeCode: string, id: string): Promise<number> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const category = await this.findInStore(store.Id, id);
    const ids = [category.Id, ...(await this.descendantsOf(category)).map((descendant) => descendant.Id)];
    await this.productCategories.deleteWhere({ in: { CategoryId: ids } });
    const removed = await this.categories.deleteWhere({ in: { Id: ids } });
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Category',
      entityId: category.Id,
      eventType: 'CATEGORY_DELETED',
      message: `Category ${category.Code} deleted with ${removed - 1} descendant(s)`,
    });
    return removed;
  }

  async list(storeCode: string, visibleOnly = false): Promise<ReadableCategory[]> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const categories = await this.categories.list({
      where: visibleOnly ? { StoreId: store.Id, Visible: true } : { StoreId: store.Id },
      orderBy: [{ column: 'Depth' }, { column: 'SortOrder' }, { column: 'Name' }],
    });
    return categories.map((category) => this.toReadable(category));
  }

  /**
   * Nested view of the store's categories, siblings ordered by sort order then
   * name. With `visibleOnly`, a hidden category hides its whole subtree.
   */
  async tree(storeCode: string, options: { visibleOnly?: boolean } = {}): Promise<CategoryNode[]> {
    const categories = await this.list(storeCode);
    const nodes = new Map<string, CategoryNode>();
    categories.forEach((category) => nodes.set(category.id, { ...category, children: [] }));

    const roots: CategoryNode[] = [];
    for (const node of nodes.values()) {
      const parent = node.parentId ? nodes.get(node.parentId) : undefined;
      (parent ? parent.children : roots).push(node);
    }

    const arrange = (level: CategoryNode[]): CategoryNode[] =>
      level
        .filter((node) => !options.visibleOnly || node.visible)
        .sort((a, b) => a.sortOrder - b.sortOrder || a.name.localeCompare(b.name))
        .map((node) => ({ ...node, children: arrange(node.children) }));
    return arrange(roots);
  }

  toReadable(category: Category): ReadableCategory {
    return {
      id: category.Id,
      code: category.Code,
      name: category.Name,
      description: category.Description,
      parentId: category.ParentId,
      lineage: category.Lineage,
      depth: category.Depth,
      sortOrder: category.SortOrder,
      visible: category.Visible,
    };
  }

  private async descendantsOf(category: Category): Promise<Category[]> {
    return this.categories.list({
      where: { StoreId: category.StoreId },
      startsWith: { Lineage: childLineage(category) },
    });
  }
}
