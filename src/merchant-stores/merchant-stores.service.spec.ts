import { MemoryBlobBackend } from '../cms/backends/memory-blob.backend';
import { ContentFileManager } from '../cms/content-file-manager';
import { DuplicateEntityException, EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { InMemoryEntityRepository } from '../common/persistence/in-memory-entity.repository';
import { Tables } from '../common/persistence/tables';
import { activityLog, memoryTable, storeRow } from '../common/testing/fixtures';
import { CreateMerchantStoreDto } from './dto/create-merchant-store.dto';
import { MerchantStore } from './entities/merchant-store.entity';
import { MerchantStoresService } from './merchant-stores.service';

function createDto(overrides: Partial<CreateMerchantStoreDto> = {}): CreateMerchantStoreDto {
  return Object.assign(new CreateMerchantStoreDto(), {
    code: 'north',
    name: 'North Outfitters',
    email: 'north@example.com',
    country: 'ca',
    currency: 'cad',
    defaultLanguage: 'en',
    ...overrides,
  });
}

describe('MerchantStoresService', () => {
  let stores: InMemoryEntityRepository<MerchantStore>;
  let backend: MemoryBlobBackend;
  let service: MerchantStoresService;

  beforeEach(() => {
    stores = memoryTable<MerchantStore>(Tables.MerchantStores);
    backend = new MemoryBlobBackend('/static');
    service = new MerchantStoresService(stores, new ContentFileManager(backend), activityLog().service);
  });

  it('creates a store with normalised codes and languages', async () => {
    const store = await service.create(createDto({ supportedLanguages: ['fr'] }));

    expect(store.address.country).toBe('CA');
    expect(store.currency).toBe('CAD');
    expect(store.supportedLanguages).toEqual(['en', 'fr']);
    expect(store.weightUnit).toBe('KG');
    expect(store.logo).toBeNull();
  });

  it('rejects a duplicate code', async () => {
    await service.create(createDto());
    await expect(service.create(createDto({ name: 'Other' }))).rejects.toBeInstanceOf(DuplicateEntityException);
  });

  it('reports whether a code exists', async () => {
    await service.create(createDto());
    await expect(service.exists('north')).resolves.toBe(true);
    await expect(service.exists('south')).resolves.toBe(false);
  });

  it('pages and filters by name', async () => {
    await stores.insert(storeRow());
    await stores.insert(storeRow({ Code: 'north', Name: 'North Outfitters' }));
    await stores.insert(storeRow({ Code: 'south', Name: 'South Outfitters' }));

    const page = await service.list({ name: 'outfit', page: 0, count: 1 });

    expect(page.items.map((store) => store.code)).toEqual(['north']);
    expect(page.totalCount).toBe(2);
    expect(page.totalPages).toBe(2);
  });

  it('updates fields but keeps the default language supported', async () => {
    await service.create(createDto());

    const updated = await service.update('north', { name: 'North Co', defaultLanguage: 'fr', supportedLanguages: ['en'] });

    expect(updated.name).toBe('North Co');
    expect(updated.email).toBe('north@example.com');
    expect(updated.supportedLanguages).toEqual(['fr', 'en']);
  });

  it('throws for an unknown store', async () => {
    await expect(service.getByCode('nowhere')).rejects.toBeInstanceOf(EntityNotFoundException);
  });

  it('never deletes the default store', async () => {
    await stores.insert(storeRow());
    await expect(service.delete('DEFAULT')).rejects.toBeInstanceOf(ValidationException);
  });

  it('deletes the store with all its content files', async () => {
    await service.create(createDto());
    await backend.put('north/IMAGE/banner.png', Buffer.from('x'), 'image/png');
    await backend.put('north/PRODUCT/SKU-1/SMALL/a.png', Buffer.from('x'), 'image/png');
    await backend.put('other/IMAGE/keep.png', Buffer.from('x'), 'image/png');

    await service.delete('north');

    await expect(service.exists('north')).resolves.toBe(false);
    await expect(backend.list('')).resolves.toEqual(['other/IMAGE/keep.png']);
  });

  it('replaces the logo file', async () => {
    await service.create(createDto());

    await service.addLogo('north', { fileName: 'old.png', mimeType: 'image/png', content: Buffer.from('1') });
    const store = await service.addLogo('north', { fileName: 'new.png', mimeType: 'image/png', content: Buffer.from('2') });

    expect(store.logo).toEqual({ name: 'new.png', url: '/static/north/LOGO/new.png' });
    await expect(backend.list('north/LOGO/')).resolves.toEqual(['north/LOGO/new.png']);

    await service.removeLogo('north');
    await expect(backend.list('north/LOGO/')).resolves.toEqual([]);
    await expect(service.getByCode('north')).resolves.toMatchObject({ logo: null });
  });

  it('accepts only images as logos', async () => {
    await service.create(createDto());
    await expect(
      service.addLogo('north', { fileName: 'logo.pdf', mimeType: 'application/pdf', content: Buffer.from('%PDF') }),
    ).rejects.toBeInstanceOf(ValidationException);
  });
});
