import { Injectable, Logger } from '@nestjs/common';
import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import {
  CreateProductOptionDto,
  CreateProductOptionValueDto,
  CreateProductVariationDto,
  UpdateProductOptionDto,
} from './dto/product-variations.dto';
import {
  ProductOption,
  ProductOptionValue,
  ProductVariant,
  ProductVariation,
  ReadableProductOption,
  ReadableProductOptionValue,
  ReadableProductVariation,
} from './entities/product-variations.entity';

/**
 * Store-level building blocks of variants: options (color), option values
 * (red) and the variations pairing them (color/red).
 */
@Injectable()
export class ProductOptionsService {
  private readonly logger = new Logger(ProductOptionsService.name);

  constructor(
    @InjectRepository(Tables.ProductOptions)
    private readonly options: EntityRepository<ProductOption>,
    @InjectRepository(Tables.ProductOptionValues)
    private readonly optionValues: EntityRepository<ProductOptionValue>,
    @InjectRepository(Tables.ProductVariations)
    private readonly variations: EntityRepository<ProductVariation>,
    @InjectRepository(Tables.ProductVariants)
    private readonly variants: EntityRepository<ProductVariant>,
    private readonly merchantStoresService: MerchantStoresService,
  ) {}

  // Options

  async createOption(storeCode: string, dto: CreateProductOptionDto): Promise<ReadableProductOption> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const option = await this.options.insert({ StoreId: store.Id, Code: dto.code, Name: dto.name, Type: dto.type });
    this.logger.log(`Created option ${option.Code} in ${storeCode}`);
    return this.toReadableOption(option);
  }

  async listOptions(storeCode: string): Promise<ReadableProductOption[]> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const options = await this.options.list({ where: { StoreId: store.Id }, orderBy: [{ column: 'Code' }] });
    return options.map((option) => this.toReadableOption(option));
  }

  async updateOption(storeCode: string, id: string, dto: UpdateProductOptionDto): Promise<ReadableProductOption> {
    const option = await this.findOption(await this.storeId(storeCode), id);
    return this.toReadableOption(await this.options.update(option.Id, { Name: dto.name, Type: dto.type }));
  }

  async deleteOption(storeCode: string, id: string): Promise<void> {
    const option = await this.findOption(await this.storeId(storeCode), id);
    if ((await this.variations.count({ where: { OptionId: option.Id } })) > 0) {
      throw new ValidationException(`Option ${option.Code} is used by a variation`);
    }
    await this.options.delete(option.Id);
  }

  // Option values

  async createOptionValue(storeCode: string, dto: CreateProductOptionValueDto): Promise<ReadableProductOptionValue> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const value = await this.optionValues.insert({ StoreId: store.Id, Code: dto.code, Name: dto.name });
    return this.toReadableValue(value);
  }

  async listOptionValues(storeCode: string): Promise<ReadableProductOptionValue[]> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const values = await this.optionValues.list({ where: { StoreId: store.Id }, orderBy: [{ column: 'Code' }] });
    return values.map((value) => this.toReadableValue(value));
  }

  async updateOptionValue(storeCode: string, id: string, name: string): Promise<ReadableProductOptionValue> {
    const value = await this.findOptionValue(await this.storeId(storeCode), id);
    return this.toReadableValue(await this.optionValues.update(value.Id, { Name: name }));
  }

  async deleteOptionValue(storeCode: string, id: string): Promise<void> {
    const value = await this.findOptionValue(await this.storeId(storeCode), id);
    if ((await this.variations.count({ where: { OptionValueId: value.Id } })) > 0) {
      throw new ValidationException(`Option value ${value.Code} is used by a variation`);
    }
    await this.optionValues.delete(value.Id);
  }

  // Variations

  async createVariation(storeCode: string, dto: CreateProductVariationDto): Promise<ReadableProductVariation> {
    const storeId = await this.storeId(storeCode);
    await this.findOption(storeId, dto.optionId);
    await this.findOptionValue(storeId, dto.optionValueId);
    const variation = await this.variations.insert({
      StoreId: storeId,
      Code: dto.code,
      OptionId: dto.optionId,
      OptionValueId: dto.optionValueId,
      SortOrder: dto.sortOrder ?? 0,
    });
    return this.toReadableVariation(variation);
  }

  async listVariations(storeCode: string): Promise<ReadableProductVariation[]> {
    const storeId = await this.storeId(storeCode);
    const variations = await this.variations.list({
      where: { StoreId: storeId },
      orderBy: [{ column: 'SortOrder' }, { column: 'Code' }],
    });
    const readable: ReadableProductVariation[] = [];
    for (const variation of variations) {
      readable.push(await this.toReadableVariation(variation));
    }
    return readable;
  }

  async getVariation(storeCode: string, id: string): Promise<ReadableProductVariation> {
    return this.toReadableVariation(await this.findVariation(await this.storeId(storeCode), id));
  }

  async deleteVariation(storeCode: string, id: string): Promise<void> {
    const variation = await this.findVariation(await this.storeId(storeCode), id);
    const used =
      (await this.variants.count({ where: { VariationId: variation.Id } })) +
      (await this.variants.count({ where: { VariationValueId: variation.Id } }));
    if (used > 0) {
      throw new ValidationException(`Variation ${variation.Code} is used by ${used} variant(s)`);
    }
    await this.variations.delete(variation.Id);
  }

  async findVariation(storeId: string, id: string): Promise<ProductVariation> {
    const variation = await this.variations.findOne({ Id: id, StoreId: storeId });
    if (!variation) {
      throw new EntityNotFoundException('ProductVariation', id);
    }
    return variation;
  }

  async toReadableVariation(variation: ProductVariation): Promise<ReadableProductVariation> {
    const option = await this.findOption(variation.StoreId, variation.OptionId);
    const value = await this.findOptionValue(variation.StoreId, variation.OptionValueId);
    return {
      id: variation.Id,
      code: variation.Code,
      sortOrder: variation.SortOrder,
      option: this.toReadableOption(option),
      optionValue: this.toReadableValue(value),
    };
  }

  private async storeId(storeCode: string): Promise<string> {
    return (await this.merchantStoresService.findByCode(storeCode)).Id;
  }

  private async findOption(storeId: string, id: string): Promise<ProductOption> {
    const option = await this.options.findOne({ Id: id, StoreId: storeId });
    if (!option) {
      throw new EntityNotFoundException('ProductOption', id);
    }
    return option;
  }

  private async findOptionValue(storeId: string, id: string): Promise<ProductOptionValue> {
    const value = await this.optionValues.findOne({ Id: id, StoreId: storeId });
    if (!value) {
      throw new EntityNotFoundException('ProductOptionValue', id);
    }
    return value;
  }

  private toReadableOption(option: ProductOption): ReadableProductOption {
    return { id: option.Id, code: option.Code, name: option.Name, type: option.Type };
  }

  private toReadableValue(value: ProductOptionValue): ReadableProductOptionValue {
    return { id: value.Id, code: value.Code, name: value.Name };
  }
}
