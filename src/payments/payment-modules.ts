export const PAYMENT_TYPES = ['MONEYORDER', 'CREDITCARD', 'PAYPAL'] as const;
export type PaymentType = (typeof PAYMENT_TYPES)[number];

export interface PaymentModuleDefinition {
  code: string;
  name: string;
  type: PaymentType;
  /** Keys that must be present before the module can be activated. */
  requiredKeys: readonly string[];
  /** Keys never returned in clear text. */
  secretKeys: readonly string[];
  /** Whether orders can be paid through this module. */
  processable: boolean;
}

export const PAYMENT_MODULES: readonly PaymentModuleDefinition[] = [
  {
    code: 'moneyorder',
    name: 'Money order',
    type: 'MONEYORDER',
    requiredKeys: ['address'],
    secretKeys: [],
    processable: true,
  },
  {
    code: 'stripe',
    name: 'Stripe',
    type: 'CREDITCARD',
    requiredKeys: ['publishableKey', 'secretKey'],
    secretKeys: ['secretKey'],
    processable: true,
  },
  {
    code: 'paypal-express',
    name: 'PayPal Express Checkout',
    type: 'PAYPAL',
    requiredKeys: ['api', 'username', 'signature'],
    secretKeys: ['api', 'signature'],
    processable: false,
  },
  {
    code: 'braintree',
    name: 'Braintree',
    type: 'CREDITCARD',
    requiredKeys: ['merchant_id', 'public_key', 'private_key', 'tokenization_key'],
    secretKeys: ['private_key', 'tokenization_key'],
    processable: false,
  },
  {
    code: 'beanstream',
    name: 'Beanstream',
    type: 'CREDITCARD',
    requiredKeys: ['merchantid', 'username', 'password'],
    secretKeys: ['password'],
    processable: false,
  },
];

export function findPaymentModule(code: string): PaymentModuleDefinition | undefined {
  return PAYMENT_MODULES.find((module) => module.code === code);
}

export const MASK_PREFIX = '****';

/** `****` followed by the last four characters, or only `****` for short values. */
export function maskSecret(value: string): string {
  return value.length > 4 ? `${MASK_PREFIX}${value.slice(-4)}` : MASK_PREFIX;
}
