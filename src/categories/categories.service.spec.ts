import { MemoryBlobBackend } from '../cms/backends/memory-blob.backend';
import { ContentFileManager } from '../cms/content-file-manager';
import { DuplicateEntityException, ValidationException } from '../common/errors/service.exception';
import { InMemoryEntityRepository } from '../common/persistence/in-memory-entity.repository';
import { Tables } from '../common/persistence/tables';
import { activityLog, memoryTable, storeRow } from '../common/testing/fixtures';
import { MerchantStore } from '../merchant-stores/entities/merchant-store.entity';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { CategoriesService, lineageDepth } from './categories.service';
import { Category } from './entities/category.entity';
import { ProductCategory } from './entities/product-category.entity';

describe('CategoriesService', () => {
  let categories: InMemoryEntityRepository<Category>;
  let links: InMemoryEntityRepository<ProductCategory>;
  let service: CategoriesService;

  beforeEach(async () => {
    const stores = memoryTable<MerchantStore>(Tables.MerchantStores);
    await stores.insert(storeRow());
    await stores.insert(storeRow({ Code: 'other' }));
    const log = activityLog().service;
    const merchantStores = new MerchantStoresService(stores, new ContentFileManager(new MemoryBlobBackend('/static')), log);
    categories = memoryTable<Category>(Tables.Categories);
    links = memoryTable<ProductCategory>(Tables.ProductCategories);
    service = new CategoriesService(categories, links, merchantStores, log);
  });

  it('derives lineage and depth from the parent', async () => {
    const men = await service.create('DEFAULT', { code: 'men', name: 'Men' });
    const shirts = await service.create('DEFAULT', { code: 'shirts', name: 'Shirts', parentId: men.id });

    expect(men.lineage).toBe('/');
    expect(men.depth).toBe(0);
    expect(shirts.lineage).toBe(`/${men.id}/`);
    expect(shirts.depth).toBe(1);
    expect(lineageDepth(`/${men.id}/${shirts.id}/`)).toBe(2);
  });

  it('keeps codes unique per store only', async () => {
    await service.create('DEFAULT', { code: 'men', name: 'Men' });
    await expect(service.create('DEFAULT', { code: 'men', name: 'Men again' })).rejects.toBeInstanceOf(
      DuplicateEntityException,
    );
    await expect(service.create('other', { code: 'men', name: 'Men' })).resolves.toMatchObject({ code: 'men' });
  });

  it('moves a subtree and rewrites every lineage below it', async () => {
    const men = await service.create('DEFAULT', { code: 'men', name: 'Men' });
    const women = await service.create('DEFAULT', { code: 'women', name: 'Women' });
    const shirts = await service.create('DEFAULT', { code: 'shirts', name: 'Shirts', parentId: men.id });
    const polos = await service.create('DEFAULT', { code: 'polos', name: 'Polos', parentId: shirts.id });

    await service.move('DEFAULT', shirts.id, women.id);

    await expect(service.get('DEFAULT', shirts.id)).resolves.toMatchObject({
      parentId: women.id,
      lineage: `/${women.id}/`,
      depth: 1,
    });
    await expect(service.get('DEFAULT', polos.id)).resolves.toMatchObject({
      lineage: `/${women.id}/${shirts.id}/`,
      depth: 2,
    });

    await service.move('DEFAULT', shirts.id, null);
    await expect(service.get('DEFAULT', polos.id)).resolves.toMatchObject({ lineage: `/${shirts.id}/`, depth: 1 });
  });

  it('refuses to move a category below itself or a descendant', async () => {
    const men = await service.create('DEFAULT', { code: 'men', name: 'Men' });
    const shirts = await service.create('DEFAULT', { code: 'shirts', name: 'Shirts', parentId: men.id });

    await expect(service.move('DEFAULT', men.id, men.id)).rejects.toBeInstanceOf(ValidationException);
    await expect(service.move('DEFAULT', men.id, shirts.id)).rejects.toBeInstanceOf(ValidationException);
  });

  it('deletes descendants and product links', async () => {
    const men = await service.create('DEFAULT', { code: 'men', name: 'Men' });
    const shirts = await service.create('DEFAULT', { code: 'shirts', name: 'Shirts', parentId: men.id });
    const sale = await service.create('DEFAULT', { code: 'sale', name: 'Sale' });
    await links.insert({ ProductId: 'product-1', CategoryId: shirts.id });
    await links.insert({ ProductId: 'product-1', CategoryId: sale.id });

    await expect(service.delete('DEFAULT', men.id)).resolves.toBe(2);

    expect((await categories.list()).map((category) => category.Code)).toEqual(['sale']);
    expect((await links.list()).map((link) => link.CategoryId)).toEqual([sale.id]);
  });

  it('builds a sorted tree and hides invisible branches on request', async () => {
    const men = await service.create('DEFAULT', { code: 'men', name: 'Men', sortOrder: 2 });
    await service.create('DEFAULT', { code: 'women', name: 'Women', sortOrder: 1 });
    await service.create('DEFAULT', { code: 'kids', name: 'Kids', sortOrder: 2, visible: false });
    await service.create('DEFAULT', { code: 'shirts', name: 'Shirts', parentId: men.id });
    await service.create('DEFAULT', { code: 'pants', name: 'Pants', parentId: men.id });

    const tree = await service.tree('DEFAULT');
    expect(tree.map((node) => node.code)).toEqual(['women', 'kids', 'men']);
    expect(tree[2].children.map((node) => node.code)).toEqual(['pants', 'shirts']);

    const visible = await service.tree('DEFAULT', { visibleOnly: true });
    expect(visible.map((node) => node.code)).toEqual(['women', 'men']);
  });
});
