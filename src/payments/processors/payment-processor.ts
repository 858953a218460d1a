import { PaymentEnvironment } from '../entities/payment-configuration.entity';

export const TRANSACTION_TYPES = ['INIT', 'AUTHORIZE', 'AUTHORIZECAPTURE', 'CAPTURE', 'REFUND'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/** How a checkout payment is taken: held for later capture, or captured at once. */
export type ChargeType = Extract<TransactionType, 'AUTHORIZE' | 'AUTHORIZECAPTURE'>;

export interface PaymentRequest {
  amount: number;
  currency: string;
  chargeType: ChargeType;
  keys: Record<string, string>;
  environment: PaymentEnvironment;
  /** Gateway token for the shopper's payment method, when the module needs one. */
  paymentToken?: string;
  description: string;
  metadata: Record<string, string>;
}

export interface RefundRequest {
  amount: number;
  currency: string;
  keys: Record<string, string>;
  /** Gateway reference of the original payment. */
  reference: string | null;
}

export interface PaymentResult {
  transactionType: TransactionType;
  amount: number;
  reference: string | null;
  details: Record<string, string>;
}

export abstract class PaymentProcessor {
  abstract readonly code: string;

  abstract charge(request: PaymentRequest): Promise<PaymentResult>;

  abstract refund(request: RefundRequest): Promise<PaymentResult>;
}
