import { Injectable, Logger } from '@nestjs/common';
import { ActivityLogService } from '../common/activity-log.service';
import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { EntityRepository, InjectRepository, RowPatch } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { Page, toPage, DEFAULT_PAGE_SIZE } from '../common/types/pagination';
import { ContentFileManager } from '../cms/content-file-manager';
import { isImageMimeType } from '../cms/file-content-type';
import { CreateMerchantStoreDto } from './dto/create-merchant-store.dto';
import { ListMerchantStoresDto } from './dto/list-merchant-stores.dto';
import { UpdateMerchantStoreDto } from './dto/update-merchant-store.dto';
import { DEFAULT_STORE_CODE, MerchantStore, ReadableMerchantStore } from './entities/merchant-store.entity';

export interface UploadedImage {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

function withDefaultLanguage(languages: string[] | undefined, defaultLanguage: string): string[] {
  const supported = languages ?? [];
  return supported.includes(defaultLanguage) ? supported : [defaultLanguage, ...supported];
}

@Injectable()
export class MerchantStoresService {
  private readonly logger = new Logger(MerchantStoresService.name);

  constructor(
    @InjectRepository(Tables.MerchantStores)
    private readonly stores: EntityRepository<MerchantStore>,
    private readonly contentFiles: ContentFileManager,
    private readonly activityLogService: ActivityLogService,
  ) {}

  /** The store row, for the modules that scope their data by store. */
  async findByCode(code: string): Promise<MerchantStore> {
    const store = await this.stores.findOne({ Code: code });
    if (!store) {
      throw new EntityNotFoundException('MerchantStore', code);
    }
    return store;
  }

  async getByCode(code: string): Promise<ReadableMerchantStore> {
    return this.toReadable(await this.findByCode(code));
  }

  async exists(code: string): Promise<boolean> {
    return (await this.stores.count({ where: { Code: code } })) > 0;
  }

  async list(query: ListMerchantStoresDto): Promise<Page<ReadableMerchantStore>> {
    const { items, total } = await this.stores.findAll({
      contains: query.name ? { Name: query.name } : undefined,
      orderBy: [{ column: 'Code' }],
      page: query.page ?? 0,
      count: query.count ?? DEFAULT_PAGE_SIZE,
    });
    return toPage(
      items.map((store) => this.toReadable(store)),
      total,
      query,
    );
  }

  async create(dto: CreateMerchantStoreDto): Promise<ReadableMerchantStore> {
    const store = await this.stores.insert({
      Code: dto.code,
      Name: dto.name,
      Email: dto.email,
      Phone: dto.phone ?? null,
      Address: dto.address ?? null,
      City: dto.city ?? null,
      PostalCode: dto.postalCode ?? null,
      Country: dto.country.toUpperCase(),
      Zone: dto.zone ?? null,
      Currency: dto.currency.toUpperCase(),
      DefaultLanguage: dto.defaultLanguage,
      SupportedLanguages: withDefaultLanguage(dto.supportedLanguages, dto.defaultLanguage),
      WeightUnit: dto.weightUnit ?? 'KG',
      SizeUnit: dto.sizeUnit ?? 'CM',
      InBusinessSince: dto.inBusinessSince ?? null,
      UseCache: dto.useCache ?? false,
      IsRetailer: dto.retailer ?? false,
      Logo: null,
    });
    this.logger.log(`Created merchant store ${store.Code}`);
    await this.activityLogService.logActivity({
      storeCode: store.Code,
      entityType: 'MerchantStore',
      entityId: store.Id,
      eventType: 'STORE_CREATED',
      message: `Store ${store.Code} created`,
    });
    return this.toReadable(store);
  }

  async update(code: string, dto: UpdateMerchantStoreDto): Promise<ReadableMerchantStore> {
    const existing = await this.findByCode(code);
    const defaultLanguage = dto.defaultLanguage ?? existing.DefaultLanguage;
    const patch: RowPatch<MerchantStore> = {
      Name: dto.name,
      Email: dto.email,
      Phone: dto.phone,
      Address: dto.address,
      City: dto.city,
      PostalCode: dto.postalCode,
      Country: dto.country?.toUpperCase(),
      Zone: dto.zone,
      Currency: dto.currency?.toUpperCase(),
      DefaultLanguage: defaultLanguage,
      SupportedLanguages: withDefaultLanguage(dto.supportedLanguages ?? existing.SupportedLanguages, defaultLanguage),
      WeightUnit: dto.weightUnit,
      SizeUnit: dto.sizeUnit,
      InBusinessSince: dto.inBusinessSince,
      UseCache: dto.useCache,
      IsRetailer: dto.retailer,
    };
    const updated = await this.stores.update(existing.Id, patch);
    await this.activityLogService.logActivity({
      storeCode: code,
      entityType: 'MerchantStore',
      entityId: existing.Id,
      eventType: 'STORE_UPDATED',
      message: `Store ${code} updated`,
    });
    return this.toReadable(updated);
  }

  async delete(code: string): Promise<void> {
    if (code === DEFAULT_STORE_CODE) {
      throw new ValidationException(`Store ${DEFAULT_STORE_CODE} cannot be deleted`);
    }
    const store = await this.findByCode(code);
    const removedFiles = await this.contentFiles.removeFiles(code);
    await this.stores.delete(store.Id);
    this.logger.log(`Deleted merchant store ${code} and ${removedFiles} content file(s)`);
    await this.activityLogService.logActivity({
      storeCode: code,
      entityType: 'MerchantStore',
      entityId: store.Id,
      eventType: 'STORE_DELETED',
      message: `Store ${code} deleted`,
      details: { removedFiles },
    });
  }

  async addLogo(code: string, image: UploadedImage): Promise<ReadableMerchantStore> {
    if (!isImageMimeType(image.mimeType)) {
      throw new ValidationException(`Unsupported logo type ${image.mimeType}`);
    }
    const store = await this.findByCode(code);
    await this.contentFiles.addFile(code, {
      fileName: image.fileName,
      mimeType: image.mimeType,
      fileContentType: 'LOGO',
      content: image.content,
    });
    if (store.Logo && store.Logo !== image.fileName) {
      await this.contentFiles.removeFile(code, 'LOGO', store.Logo);
    }
    return this.toReadable(await this.stores.update(store.Id, { Logo: image.fileName }));
  }

  async removeLogo(code: string): Promise<void> {
    const store = await this.findByCode(code);
    if (!store.Logo) {
      return;
    }
    await this.contentFiles.removeFile(code, 'LOGO', store.Logo);
    await this.stores.update(store.Id, { Logo: null });
  }

  toReadable(store: MerchantStore): ReadableMerchantStore {
    return {
      id: store.Id,
      code: store.Code,
      name: store.Name,
      email: store.Email,
      phone: store.Phone,
      address: {
        address: store.Address,
        city: store.City,
        postalCode: store.PostalCode,
        country: store.Country,
        zone: store.Zone,
      },
      currency: store.Currency,
      defaultLanguage: store.DefaultLanguage,
      supportedLanguages: store.SupportedLanguages,
      weightUnit: store.WeightUnit,
      sizeUnit: store.SizeUnit,
      inBusinessSince: store.InBusinessSince,
      useCache: store.UseCache,
      retailer: store.IsRetailer,
      logo: store.Logo ? { name: store.Logo, url: this.contentFiles.fileUrl(store.Code, 'LOGO', store.Logo) } : null,
    };
  }
}
