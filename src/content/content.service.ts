import { Injectable, Logger } from '@nestjs/common';
import { ActivityLogService } from '../common/activity-log.service';
import {
  DuplicateEntityException,
  EntityNotFoundException,
  ValidationException,
} from '../common/errors/service.exception';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { slugify } from '../common/utils/slug';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { CreateContentDto, ListContentDto, UpdateContentDto } from './dto/content.dto';
import { Content, ReadableContent } from './entities/content.entity';

@Injectable()
export class ContentService {
  private readonly logger = new Logger(ContentService.name);

  constructor(
    @InjectRepository(Tables.Contents)
    private readonly contents: EntityRepository<Content>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  async create(storeCode: string, dto: CreateContentDto): Promise<ReadableContent> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    if (await this.contents.findOne({ StoreId: store.Id, Code: dto.code })) {
      throw new DuplicateEntityException('Content', dto.code);
    }
    const slug = dto.contentType === 'PAGE' ? await this.pageSlug(store.Id, dto.slug ?? dto.title) : null;
    const content = await this.contents.insert({
      StoreId: store.Id,
      Code: dto.code,
      ContentType: dto.contentType,
      Title: dto.title,
      Slug: slug,
      Body: dto.body,
      MetaDescription: dto.metaDescription ?? null,
      Visible: dto.visible ?? true,
      LinkToMenu: dto.linkToMenu ?? false,
      SortOrder: dto.sortOrder ?? 0,
    });
    this.logger.log(`Created ${content.ContentType} ${content.Code} in ${storeCode}`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Content',
      entityId: content.Id,
      eventType: 'CONTENT_CREATED',
      message: `${content.ContentType} ${content.Code} created`,
    });
    return this.toReadable(content);
  }

  async update(storeCode: string, code: string, dto: UpdateContentDto): Promise<ReadableContent> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const content = await this.findByCode(store.Id, code);
    let slug = content.Slug;
    if (content.ContentType === 'PAGE' && dto.slug !== undefined && dto.slug !== content.Slug) {
      slug = await this.pageSlug(store.Id, dto.slug, content.Id);
    }
    const updated = await this.contents.update(content.Id, {
      Title: dto.title,
      Slug: slug,
      Body: dto.body,
      MetaDescription: dto.metaDescription,
      Visible: dto.visible,
      LinkToMenu: dto.linkToMenu,
      SortOrder: dto.sortOrder,
    });
    this.logger.log(`Updated content ${code} of ${storeCode}`);
    return this.toReadable(updated);
  }

  async get(storeCode: string, code: string): Promise<ReadableContent> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    return this.toReadable(await this.findByCode(store.Id, code));
  }

  /** A visible page by slug; hidden pages are reported as missing. */
  async getPage(storeCode: string, slug: string): Promise<ReadableContent> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const page = await this.contents.findOne({ StoreId: store.Id, ContentType: 'PAGE', Slug: slug, Visible: true });
    if (!page) {
      throw new EntityNotFoundException('Page', slug);
    }
    return this.toReadable(page);
  }

  async list(storeCode: string, query: ListContentDto): Promise<ReadableContent[]> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const where: Partial<Content> = { StoreId: store.Id };
    if (query.type) where.ContentType = query.type;
    if (query.visibleOnly) where.Visible = true;
    const contents = await this.contents.list({
      where,
      orderBy: [{ column: 'SortOrder' }, { column: 'Title' }],
    });
    return contents.map((content) => this.toReadable(content));
  }

  async delete(storeCode: string, code: string): Promise<void> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const content = await this.findByCode(store.Id, code);
    await this.contents.delete(content.Id);
    this.logger.log(`Deleted content ${code} of ${storeCode}`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'Content',
      entityId: content.Id,
      eventType: 'CONTENT_DELETED',
      message: `${content.ContentType} ${content.Code} deleted`,
    });
  }

  private async findByCode(storeId: string, code: string): Promise<Content> {
    const content = await this.contents.findOne({ StoreId: storeId, Code: code });
    if (!content) {
      throw new EntityNotFoundException('Content', code);
    }
    return content;
  }

  /** Normalizes a slug (or a title to derive one from) and checks it is free in the store. */
  private async pageSlug(storeId: string, source: string, ownId?: string): Promise<string> {
    const slug = slugify(source);
    if (!slug) {
      throw new ValidationException(`Cannot derive a slug from "${source}"`);
    }
    const owner = await this.contents.findOne({ StoreId: storeId, ContentType: 'PAGE', Slug: slug });
    if (owner && owner.Id !== ownId) {
      throw new DuplicateEntityException('Page', slug);
    }
    return slug;
  }

  private toReadable(content: Content): ReadableContent {
    return {
      id: content.Id,
      code: content.Code,
      contentType: content.ContentType,
      title: content.Title,
      slug: content.Slug,
      body: content.Body,
      metaDescription: content.MetaDescription,
      visible: content.Visible,
      linkToMenu: content.LinkToMenu,
      sortOrder: content.SortOrder,
    };
  }
}
