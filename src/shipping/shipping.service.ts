import { Injectable, Logger } from '@nestjs/common';
import { ActivityLogService } from '../common/activity-log.service';
import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { formatAmount, sumAmounts } from '../common/utils/money';
import { MerchantStore } from '../merchant-stores/entities/merchant-store.entity';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { ProductsService } from '../products/products.service';
import { ShoppingCartItem } from '../shopping-carts/entities/shopping-cart.entity';
import { cartTotals, ShoppingCartsService } from '../shopping-carts/shopping-carts.service';
import { SaveShippingConfigurationDto, ShippingQuoteDto } from './dto/shipping.dto';
import {
  FREE_SHIPPING_OPTION,
  ReadableShippingConfiguration,
  ShippingConfiguration,
  ShippingOption,
  ShippingQuote,
  ShippingQuoteError,
  ShippingRegion,
  WEIGHT_BASED_OPTION,
} from './entities/shipping-configuration.entity';

export type ShippableLine = Pick<ShoppingCartItem, 'ProductId' | 'Quantity' | 'UnitPrice'>;

function roundWeight(weight: number): number {
  return Math.round(weight * 1000) / 1000;
}

@Injectable()
export class ShippingService {
  private readonly logger = new Logger(ShippingService.name);

  constructor(
    @InjectRepository(Tables.ShippingConfigurations)
    private readonly configurations: EntityRepository<ShippingConfiguration>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly productsService: ProductsService,
    private readonly shoppingCartsService: ShoppingCartsService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  async getConfiguration(storeCode: string): Promise<ReadableShippingConfiguration> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const configuration = await this.configurations.findOne({ StoreId: store.Id });
    if (!configuration) {
      throw new EntityNotFoundException('ShippingConfiguration', storeCode);
    }
    return this.toReadable(configuration);
  }

  /** Creates or replaces the store's shipping configuration. */
  async saveConfiguration(
    storeCode: string,
    dto: SaveShippingConfigurationDto,
  ): Promise<ReadableShippingConfiguration> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const regions = this.validateRegions(dto.regions);
    const shipToCountries = [...new Set((dto.shipToCountries ?? []).map((country) => country.toUpperCase()))];
    if (dto.shippingType === 'INTERNATIONAL' && shipToCountries.length === 0) {
      throw new ValidationException('International shipping needs at least one destination country');
    }
    const freeShippingEnabled = dto.freeShippingEnabled ?? false;
    if (freeShippingEnabled && dto.freeShippingThreshold === undefined) {
      throw new ValidationException('Free shipping needs a threshold');
    }

    const values = {
      ShippingType: dto.shippingType,
      ShipToCountries: shipToCountries,
      FreeShippingEnabled: freeShippingEnabled,
      FreeShippingThreshold: dto.freeShippingThreshold ?? null,
      HandlingFee: dto.handlingFee ?? 0,
      Regions: regions,
    };
    const existing = await this.configurations.findOne({ StoreId: store.Id });
    const saved = existing
      ? await this.configurations.update(existing.Id, values)
      : await this.configurations.insert({ StoreId: store.Id, ...values });

    this.logger.log(`Saved ${saved.ShippingType} shipping configuration of ${storeCode}`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'ShippingConfiguration',
      entityId: saved.Id,
      eventType: existing ? 'SHIPPING_CONFIGURATION_UPDATED' : 'SHIPPING_CONFIGURATION_CREATED',
      message: `Shipping configuration saved with ${regions.length} region(s)`,
    });
    return this.toReadable(saved);
  }

  async deleteConfiguration(storeCode: string): Promise<void> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const removed = await this.configurations.deleteWhere({ where: { StoreId: store.Id } });
    if (removed === 0) {
      throw new EntityNotFoundException('ShippingConfiguration', storeCode);
    }
    this.logger.log(`Deleted shipping configuration of ${storeCode}`);
  }

  async quote(storeCode: string, dto: ShippingQuoteDto): Promise<ShippingQuote> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const cart = await this.shoppingCartsService.findByCode(store.Id, dto.cartCode);
    return this.quoteLines(store, dto.country, await this.shoppingCartsService.linesOf(cart.Id));
  }

  /**
   * Quotes shipping of the given lines to a country. Failures are reported in
   * `error` rather than thrown so the shop can show them.
   */
  async quoteLines(store: MerchantStore, country: string, lines: ShippableLine[]): Promise<ShippingQuote> {
    const destination = country.toUpperCase();
    const { subTotal } = cartTotals(lines);
    const quote: ShippingQuote = {
      country: destination,
      shippingRequired: true,
      weight: 0,
      weightUnit: store.WeightUnit,
      subTotal,
      currency: store.Currency,
      options: [],
      error: null,
    };
    const failed = (error: ShippingQuoteError): ShippingQuote => {
      this.logger.debug(`No shipping quote for ${store.Code} to ${destination}: ${error}`);
      return { ...quote, error };
    };

    const configuration = await this.configurations.findOne({ StoreId: store.Id });
    if (!configuration) {
      return failed('NO_SHIPPING_MODULE_CONFIGURED');
    }

    let weight = 0;
    let shippable = false;
    for (const line of lines) {
      const product = await this.productsService.findInStore(store.Id, line.ProductId);
      if (product.Shippable) {
        shippable = true;
        weight += (product.Weight ?? 0) * line.Quantity;
      }
    }
    quote.weight = roundWeight(weight);
    if (!shippable) {
      return { ...quote, shippingRequired: false };
    }

    const served =
      configuration.ShippingType === 'NATIONAL'
        ? destination === store.Country.toUpperCase()
        : configuration.ShipToCountries.includes(destination);
    if (!served) {
      return failed('NO_SHIPPING_TO_SELECTED_COUNTRY');
    }

    if (
      configuration.FreeShippingEnabled &&
      configuration.FreeShippingThreshold !== null &&
      subTotal >= configuration.FreeShippingThreshold
    ) {
      return { ...quote, options: [this.option(store, FREE_SHIPPING_OPTION, 'Free shipping', 0)] };
    }

    const region = configuration.Regions.find((candidate) => candidate.countries.includes(destination));
    if (!region) {
      return failed('NO_SHIPPING_TO_SELECTED_COUNTRY');
    }
    const row = [...region.priceTable]
      .sort((a, b) => a.maxWeight - b.maxWeight)
      .find((candidate) => candidate.maxWeight >= quote.weight);
    if (!row) {
      return failed('ITEMS_TOO_HEAVY');
    }
    const price = sumAmounts([row.price, configuration.HandlingFee]);
    return { ...quote, options: [this.option(store, WEIGHT_BASED_OPTION, region.name, price)] };
  }

  private option(store: MerchantStore, code: string, name: string, price: number): ShippingOption {
    return { code, name, price, displayPrice: formatAmount(price, store.Currency) };
  }

  private validateRegions(regions: ShippingRegion[]): ShippingRegion[] {
    const owner = new Map<string, string>();
    return regions.map((region) => {
      if (region.priceTable.length === 0) {
        throw new ValidationException(`Region ${region.name} has no price table`);
      }
      for (const row of region.priceTable) {
        if (row.maxWeight < 0 || row.price < 0) {
          throw new ValidationException(`Region ${region.name} has a negative weight or price`, { row });
        }
      }
      const countries = [...new Set(region.countries.map((country) => country.toUpperCase()))];
      for (const country of countries) {
        const other = owner.get(country);
        if (other !== undefined) {
          throw new ValidationException(`${country} is in both ${other} and ${region.name}`, { country });
        }
        owner.set(country, region.name);
      }
      return {
        name: region.name,
        countries,
        priceTable: region.priceTable.map(({ maxWeight, price }) => ({ maxWeight, price })),
      };
    });
  }

  private toReadable(configuration: ShippingConfiguration): ReadableShippingConfiguration {
    return {
      id: configuration.Id,
      shippingType: configuration.ShippingType,
      shipToCountries: configuration.ShipToCountries,
      freeShippingEnabled: configuration.FreeShippingEnabled,
      freeShippingThreshold: configuration.FreeShippingThreshold,
      handlingFee: configuration.HandlingFee,
      regions: configuration.Regions,
    };
  }
}
