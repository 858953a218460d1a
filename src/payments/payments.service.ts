import { Injectable, Logger } from '@nestjs/common';
import { ActivityLogService } from '../common/activity-log.service';
import { EncryptionService } from '../common/encryption.service';
import {
  EntityNotFoundException,
  PaymentException,
  ValidationException,
} from '../common/errors/service.exception';
import { EntityRepository, InjectRepository } from '../common/persistence/entity-repository';
import { Tables } from '../common/persistence/tables';
import { fromCents, toCents } from '../common/utils/money';
import { MerchantStore } from '../merchant-stores/entities/merchant-store.entity';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { SavePaymentConfigurationDto } from './dto/payment-configuration.dto';
import {
  PaymentConfiguration,
  PaymentEnvironment,
  ReadablePaymentConfiguration,
  ReadablePaymentModule,
} from './entities/payment-configuration.entity';
import {
  findPaymentModule,
  MASK_PREFIX,
  maskSecret,
  PAYMENT_MODULES,
  PaymentModuleDefinition,
} from './payment-modules';
import { MoneyOrderProcessor } from './processors/money-order.processor';
import { ChargeType, PaymentProcessor, PaymentResult } from './processors/payment-processor';
import { StripePaymentProcessor } from './processors/stripe.processor';

export interface ChargeRequest {
  moduleCode: string;
  amount: number;
  chargeType: ChargeType;
  paymentToken?: string;
  description: string;
  metadata: Record<string, string>;
}

/** What a refund needs to know about the order it applies to. */
export interface RefundableOrder {
  moduleCode: string;
  total: number;
  /** Sum of earlier refunds. */
  refunded: number;
  /** Gateway reference of the payment being refunded. */
  reference: string | null;
}

@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);
  private readonly processors: Map<string, PaymentProcessor>;

  constructor(
    @InjectRepository(Tables.PaymentConfigurations)
    private readonly configurations: EntityRepository<PaymentConfiguration>,
    private readonly merchantStoresService: MerchantStoresService,
    private readonly encryptionService: EncryptionService,
    private readonly activityLogService: ActivityLogService,
    stripeProcessor: StripePaymentProcessor,
    moneyOrderProcessor: MoneyOrderProcessor,
  ) {
    this.processors = new Map<string, PaymentProcessor>(
      [stripeProcessor, moneyOrderProcessor].map((processor) => [processor.code, processor]),
    );
  }

  async listModules(storeCode: string): Promise<ReadablePaymentModule[]> {
    const store = await this.merchantStoresService.findByCode(storeCode);
    const configured = new Map(
      (await this.configurations.list({ where: { StoreId: store.Id } })).map((row) => [row.ModuleCode, row]),
    );
    return PAYMENT_MODULES.map((module) => {
      const configuration = configured.get(module.code);
      return {
        code: module.code,
        name: module.name,
        type: module.type,
        requiredKeys: [...module.requiredKeys],
        configured: configuration !== undefined,
        active: configuration?.Active ?? false,
        defaultSelected: configuration?.DefaultSelected ?? false,
      };
    });
  }

  /** Active modules a shopper can choose at checkout, the default first. */
  async listActive(storeCode: string): Promise<ReadablePaymentModule[]> {
    const modules = await this.listModules(storeCode);
    return modules
      .filter((module) => module.active)
      .sort((a, b) => Number(b.defaultSelected) - Number(a.defaultSelected));
  }

  async getConfiguration(storeCode: string, code: string): Promise<ReadablePaymentConfiguration> {
    const module = this.definition(code);
    const store = await this.merchantStoresService.findByCode(storeCode);
    return this.toReadable(module, await this.findConfiguration(store.Id, code));
  }

  async saveConfiguration(
    storeCode: string,
    code: string,
    dto: SavePaymentConfigurationDto,
  ): Promise<ReadablePaymentConfiguration> {
    const module = this.definition(code);
    const store = await this.merchantStoresService.findByCode(storeCode);
    const existing = await this.configurations.findOne({ StoreId: store.Id, ModuleCode: code });
    const storedKeys = existing ? this.decryptKeys(existing) : {};

    const keys: Record<string, string> = {};
    for (const [name, value] of Object.entries(dto.keys)) {
      if (typeof value !== 'string') {
        throw new ValidationException(`Key ${name} must be a string`);
      }
      const kept = value.startsWith(MASK_PREFIX) ? storedKeys[name] : value;
      if (kept !== undefined && kept.trim() !== '') {
        keys[name] = kept;
      }
    }

    const active = dto.active ?? existing?.Active ?? false;
    if (active) {
      const missing = module.requiredKeys.filter((name) => !(name in keys));
      if (missing.length > 0) {
        throw new ValidationException(`Module ${code} is missing required keys: ${missing.join(', ')}`, {
          missing,
        });
      }
    }
    const defaultSelected = dto.defaultSelected ?? existing?.DefaultSelected ?? false;

    const environment: PaymentEnvironment = dto.environment ?? existing?.Environment ?? 'TEST';
    const values = {
      Active: active,
      DefaultSelected: defaultSelected,
      Environment: environment,
      Keys: this.encryptionService.encrypt(keys),
      Options: dto.options ?? existing?.Options ?? null,
    };
    const saved = existing
      ? await this.configurations.update(existing.Id, values)
      : await this.configurations.insert({ StoreId: store.Id, ModuleCode: code, ...values });
    if (defaultSelected) {
      const previous = await this.configurations.list({ where: { StoreId: store.Id, DefaultSelected: true } });
      for (const configuration of previous.filter((candidate) => candidate.Id !== saved.Id)) {
        await this.configurations.update(configuration.Id, { DefaultSelected: false });
      }
    }

    this.logger.log(`Saved payment module ${code} of ${storeCode} (active: ${active})`);
    await this.activityLogService.logActivity({
      storeCode,
      entityType: 'PaymentConfiguration',
      entityId: saved.Id,
      eventType: existing ? 'PAYMENT_MODULE_UPDATED' : 'PAYMENT_MODULE_CONFIGURED',
      message: `Payment module ${code} saved`,
      details: { active, defaultSelected },
    });
    return this.toReadable(module, saved);
  }

  async removeConfiguration(storeCode: string, code: string): Promise<void> {
    this.definition(code);
    const store = await this.merchantStoresService.findByCode(storeCode);
    const configuration = await this.findConfiguration(store.Id, code);
    await this.configurations.delete(configuration.Id);
    this.logger.log(`Removed payment module ${code} of ${storeCode}`);
  }

  /**
   * Checks that a module can take the store's payments.
   * @throws ValidationException when it is unknown, not configured or inactive
   */
  async assertUsable(store: MerchantStore, moduleCode: string): Promise<void> {
    const configuration = await this.configurations.findOne({ StoreId: store.Id, ModuleCode: moduleCode });
    if (!findPaymentModule(moduleCode) || !configuration || !configuration.Active) {
      throw new ValidationException(`Payment module ${moduleCode} is not available in ${store.Code}`);
    }
  }

  async charge(store: MerchantStore, request: ChargeRequest): Promise<PaymentResult> {
    const { configuration, processor } = await this.resolve(store, request.moduleCode);
    const result = await processor.charge({
      amount: request.amount,
      currency: store.Currency,
      chargeType: request.chargeType,
      keys: this.decryptKeys(configuration),
      environment: configuration.Environment,
      paymentToken: request.paymentToken,
      description: request.description,
      metadata: request.metadata,
    });
    this.logger.log(`Charged ${result.amount} ${store.Currency} through ${request.moduleCode} (${result.transactionType})`);
    return result;
  }

  /**
   * Refunds part or all of an order. Refunds of an order never add up to
   * more than its total.
   */
  async refund(store: MerchantStore, order: RefundableOrder, amount: number): Promise<PaymentResult> {
    if (toCents(amount) <= 0) {
      throw new ValidationException('Refund amount must be positive');
    }
    const remaining = toCents(order.total) - toCents(order.refunded);
    if (toCents(amount) > remaining) {
      throw new ValidationException(`Refund of ${amount} exceeds the refundable ${fromCents(remaining)}`, {
        refundable: fromCents(remaining),
      });
    }
    const { configuration, processor } = await this.resolve(store, order.moduleCode);
    return processor.refund({
      amount,
      currency: store.Currency,
      keys: this.decryptKeys(configuration),
      reference: order.reference,
    });
  }

  private async resolve(
    store: MerchantStore,
    moduleCode: string,
  ): Promise<{ configuration: PaymentConfiguration; processor: PaymentProcessor }> {
    const processor = this.processors.get(moduleCode);
    if (!processor) {
      throw new PaymentException(`Payment module ${moduleCode} cannot process payments`);
    }
    const configuration = await this.configurations.findOne({ StoreId: store.Id, ModuleCode: moduleCode });
    if (!configuration) {
      throw new PaymentException(`Payment module ${moduleCode} is not configured in ${store.Code}`);
    }
    return { configuration, processor };
  }

  private definition(code: string): PaymentModuleDefinition {
    const module = findPaymentModule(code);
    if (!module) {
      throw new ValidationException(`Unknown payment module ${code}`);
    }
    return module;
  }

  private async findConfiguration(storeId: string, code: string): Promise<PaymentConfiguration> {
    const configuration = await this.configurations.findOne({ StoreId: storeId, ModuleCode: code });
    if (!configuration) {
      throw new EntityNotFoundException('PaymentConfiguration', code);
    }
    return configuration;
  }

  private decryptKeys(configuration: PaymentConfiguration): Record<string, string> {
    const keys: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.encryptionService.decrypt(configuration.Keys))) {
      if (typeof value === 'string') {
        keys[name] = value;
      }
    }
    return keys;
  }

  private toReadable(
    module: PaymentModuleDefinition,
    configuration: PaymentConfiguration,
  ): ReadablePaymentConfiguration {
    const keys: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.decryptKeys(configuration))) {
      keys[name] = module.secretKeys.includes(name) ? maskSecret(value) : value;
    }
    return {
      code: module.code,
      name: module.name,
      type: module.type,
      active: configuration.Active,
      defaultSelected: configuration.DefaultSelected,
      environment: configuration.Environment,
      keys,
      options: configuration.Options ?? {},
    };
  }
}
