import { Row } from '../../common/persistence/entity-repository';
import { PaymentType } from '../payment-modules';

export const PAYMENT_ENVIRONMENTS = ['TEST', 'PRODUCTION'] as const;
export type PaymentEnvironment = (typeof PAYMENT_ENVIRONMENTS)[number];

export interface PaymentConfiguration extends Row {
  StoreId: string;
  ModuleCode: string;
  Active: boolean;
  DefaultSelected: boolean;
  Environment: PaymentEnvironment;
  /** Module keys, encrypted with EncryptionService. */
  Keys: string;
  Options: Record<string, string> | null;
}

export interface ReadablePaymentModule {
  code: string;
  name: string;
  type: PaymentType;
  requiredKeys: string[];
  configured: boolean;
  active: boolean;
  defaultSelected: boolean;
}

export interface ReadablePaymentConfiguration {
  code: string;
  name: string;
  type: PaymentType;
  active: boolean;
  defaultSelected: boolean;
  environment: PaymentEnvironment;
  /** Secret keys masked to their last four characters. */
  keys: Record<string, string>;
  options: Record<string, string>;
}
