import {
  DuplicateEntityException,
  EntityNotFoundException,
  ValidationException,
} from '../common/errors/service.exception';
import { createCatalog, TestCatalog } from '../common/testing/catalog';
import { memoryTable } from '../common/testing/fixtures';
import { Tables } from '../common/persistence/tables';
import { ContentService } from './content.service';
import { Content } from './entities/content.entity';

describe('ContentService', () => {
  let catalog: TestCatalog;
  let service: ContentService;

  beforeEach(async () => {
    catalog = await createCatalog();
    service = new ContentService(
      memoryTable<Content>(Tables.Contents),
      catalog.merchantStoresService,
      catalog.activityLogService,
    );
  });

  it('derives a page slug from its title', async () => {
    const page = await service.create('DEFAULT', {
      code: 'about',
      contentType: 'PAGE',
      title: 'About Us!',
      body: '<p>Hello</p>',
    });

    expect(page.slug).toBe('about-us');
    expect(page.visible).toBe(true);
    expect(page.linkToMenu).toBe(false);
    expect(page.metaDescription).toBeNull();
  });

  it('keeps boxes without a slug', async () => {
    const box = await service.create('DEFAULT', {
      code: 'banner',
      contentType: 'BOX',
      title: 'Banner',
      slug: 'banner',
      body: 'Free shipping',
    });

    expect(box.slug).toBeNull();
  });

  it('rejects duplicate codes and slugs', async () => {
    await service.create('DEFAULT', { code: 'about', contentType: 'PAGE', title: 'About', body: '' });

    await expect(
      service.create('DEFAULT', { code: 'about', contentType: 'BOX', title: 'Other', body: '' }),
    ).rejects.toBeInstanceOf(DuplicateEntityException);
    await expect(
      service.create('DEFAULT', { code: 'about-2', contentType: 'PAGE', title: 'About', body: '' }),
    ).rejects.toBeInstanceOf(DuplicateEntityException);
  });

  it('rejects a title that gives no slug', async () => {
    await expect(
      service.create('DEFAULT', { code: 'dots', contentType: 'PAGE', title: '...', body: '' }),
    ).rejects.toBeInstanceOf(ValidationException);
  });

  it('updates fields and re-checks a changed slug', async () => {
    await service.create('DEFAULT', { code: 'about', contentType: 'PAGE', title: 'About', body: '' });
    await service.create('DEFAULT', { code: 'terms', contentType: 'PAGE', title: 'Terms', body: '' });

    const updated = await service.update('DEFAULT', 'about', { slug: 'who-we-are', body: 'We sell tees' });
    expect(updated.slug).toBe('who-we-are');
    expect(updated.body).toBe('We sell tees');
    expect(updated.title).toBe('About');

    await expect(service.update('DEFAULT', 'about', { slug: 'terms' })).rejects.toBeInstanceOf(
      DuplicateEntityException,
    );
    await expect(service.update('DEFAULT', 'missing', { title: 'x' })).rejects.toBeInstanceOf(
      EntityNotFoundException,
    );
  });

  it('serves visible pages by slug only', async () => {
    await service.create('DEFAULT', { code: 'about', contentType: 'PAGE', title: 'About', body: 'Hi' });
    await service.create('DEFAULT', {
      code: 'draft',
      contentType: 'PAGE',
      title: 'Draft',
      body: '',
      visible: false,
    });

    await expect(service.getPage('DEFAULT', 'about')).resolves.toMatchObject({ code: 'about', body: 'Hi' });
    await expect(service.getPage('DEFAULT', 'draft')).rejects.toBeInstanceOf(EntityNotFoundException);
  });

  it('lists by sort order then title, optionally filtered', async () => {
    await service.create('DEFAULT', { code: 'c', contentType: 'PAGE', title: 'Zeta', body: '', sortOrder: 1 });
    await service.create('DEFAULT', { code: 'b', contentType: 'BOX', title: 'Beta', body: '', sortOrder: 2 });
    await service.create('DEFAULT', { code: 'a', contentType: 'PAGE', title: 'Alpha', body: '', sortOrder: 1 });
    await service.create('DEFAULT', {
      code: 'h',
      contentType: 'PAGE',
      title: 'Hidden',
      body: '',
      visible: false,
    });

    expect((await service.list('DEFAULT', {})).map((content) => content.code)).toEqual(['h', 'a', 'c', 'b']);
    expect((await service.list('DEFAULT', { type: 'PAGE', visibleOnly: true })).map((content) => content.code)).toEqual([
      'a',
      'c',
    ]);
  });

  it('deletes content and records it', async () => {
    const box = await service.create('DEFAULT', { code: 'banner', contentType: 'BOX', title: 'Banner', body: '' });

    await service.delete('DEFAULT', 'banner');

    await expect(service.get('DEFAULT', 'banner')).rejects.toBeInstanceOf(EntityNotFoundException);
    const events = await catalog.activityLogService.findForEntity('Content', box.id);
    expect(events.map((event) => event.EventType)).toEqual(['CONTENT_CREATED', 'CONTENT_DELETED']);
  });
});
