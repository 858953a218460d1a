import { Row } from '../../common/persistence/entity-repository';
import { TransactionType } from '../../payments/processors/payment-processor';

export const ORDER_STATUSES = ['ORDERED', 'PROCESSED', 'SHIPPED', 'DELIVERED', 'CANCELED', 'REFUNDED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface OrderAddress {
  firstName: string;
  lastName: string;
  company?: string;
  address: string;
  city: string;
  postalCode: string;
  country: string;
  zone?: string;
  phone?: string;
}

export interface Order extends Row {
  StoreId: string;
  CartCode: string;
  Status: OrderStatus;
  CustomerEmail: string;
  CustomerFirstName: string;
  CustomerLastName: string;
  Billing: OrderAddress;
  Delivery: OrderAddress | null;
  Currency: string;
  PaymentModuleCode: string;
  ShippingOptionCode: string | null;
  SubTotal: number;
  ShippingTotal: number;
  Total: number;
  DatePurchased: string;
}

export interface OrderProduct extends Row {
  OrderId: string;
  ProductId: string;
  VariantId: string | null;
  Sku: string;
  VariantSku: string | null;
  Name: string;
  Quantity: number;
  UnitPrice: number;
  LineTotal: number;
}

export const ORDER_TOTAL_CODES = {
  subTotal: 'order.total.subtotal',
  shipping: 'order.total.shipping',
  total: 'order.total.total',
} as const;

export interface OrderTotal extends Row {
  OrderId: string;
  Code: string;
  Title: string;
  Value: number;
  SortOrder: number;
}

export interface OrderStatusHistory extends Row {
  OrderId: string;
  Status: OrderStatus;
  Comment: string | null;
  CustomerNotified: boolean;
}

export interface Transaction extends Row {
  OrderId: string;
  PaymentModuleCode: string;
  TransactionType: TransactionType;
  Amount: number;
  /** Gateway reference, null for offline payments. */
  Reference: string | null;
  Details: Record<string, string>;
}

export interface ReadableOrderProduct {
  id: string;
  productId: string;
  variantId: string | null;
  sku: string;
  variantSku: string | null;
  name: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface ReadableOrderTotal {
  code: string;
  title: string;
  value: number;
  sortOrder: number;
}

export interface ReadableOrderStatusHistory {
  status: OrderStatus;
  comment: string | null;
  customerNotified: boolean;
  date: string;
}

export interface ReadableTransaction {
  id: string;
  type: TransactionType;
  paymentModule: string;
  amount: number;
  reference: string | null;
  date: string;
}

export interface ReadableOrder {
  id: string;
  cartCode: string;
  status: OrderStatus;
  customer: { email: string; firstName: string; lastName: string };
  billing: OrderAddress;
  delivery: OrderAddress | null;
  currency: string;
  paymentModule: string;
  shippingOption: string | null;
  subTotal: number;
  shippingTotal: number;
  total: number;
  displayTotal: string;
  datePurchased: string;
  products: ReadableOrderProduct[];
  totals: ReadableOrderTotal[];
  history: ReadableOrderStatusHistory[];
  transactions: ReadableTransaction[];
}
