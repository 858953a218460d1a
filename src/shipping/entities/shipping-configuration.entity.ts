import { Row } from '../../common/persistence/entity-repository';

export const SHIPPING_TYPES = ['NATIONAL', 'INTERNATIONAL'] as const;
export type ShippingType = (typeof SHIPPING_TYPES)[number];

export interface PriceTableRow {
  /** Upper bound, inclusive, in the store's weight unit. */
  maxWeight: number;
  price: number;
}

export interface ShippingRegion {
  name: string;
  countries: string[];
  priceTable: PriceTableRow[];
}

export interface ShippingConfiguration extends Row {
  StoreId: string;
  ShippingType: ShippingType;
  ShipToCountries: string[];
  FreeShippingEnabled: boolean;
  FreeShippingThreshold: number | null;
  HandlingFee: number;
  Regions: ShippingRegion[];
}

export interface ReadableShippingConfiguration {
  id: string;
  shippingType: ShippingType;
  shipToCountries: string[];
  freeShippingEnabled: boolean;
  freeShippingThreshold: number | null;
  handlingFee: number;
  regions: ShippingRegion[];
}

export const SHIPPING_QUOTE_ERRORS = [
  'NO_SHIPPING_MODULE_CONFIGURED',
  'NO_SHIPPING_TO_SELECTED_COUNTRY',
  'ITEMS_TOO_HEAVY',
] as const;
export type ShippingQuoteError = (typeof SHIPPING_QUOTE_ERRORS)[number];

export const FREE_SHIPPING_OPTION = 'freeShipping';
export const WEIGHT_BASED_OPTION = 'weightBased';

export interface ShippingOption {
  code: string;
  name: string;
  price: number;
  displayPrice: string;
}

export interface ShippingQuote {
  country: string;
  shippingRequired: boolean;
  /** Total weight of the shippable lines. */
  weight: number;
  weightUnit: string;
  subTotal: number;
  currency: string;
  options: ShippingOption[];
  error: ShippingQuoteError | null;
}
