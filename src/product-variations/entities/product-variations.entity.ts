import { Row } from '../../common/persistence/entity-repository';

export const OPTION_TYPES = ['select', 'radio', 'checkbox', 'text'] as const;
export type OptionType = (typeof OPTION_TYPES)[number];

export interface ProductOption extends Row {
  StoreId: string;
  Code: string;
  Name: string;
  Type: OptionType;
}

export interface ProductOptionValue extends Row {
  StoreId: string;
  Code: string;
  Name: string;
}

/** An option paired with one of its values, e.g. color/red. */
export interface ProductVariation extends Row {
  StoreId: string;
  Code: string;
  OptionId: string;
  OptionValueId: string;
  SortOrder: number;
}

/** A purchasable combination of one or two variations of a product. */
export interface ProductVariant extends Row {
  ProductId: string;
  StoreId: string;
  Sku: string;
  VariationId: string;
  VariationValueId: string | null;
  /** Overrides the product price when set. */
  Price: number | null;
  Quantity: number;
  Available: boolean;
  DefaultSelection: boolean;
  SortOrder: number;
}

export interface ReadableProductOption {
  id: string;
  code: string;
  name: string;
  type: OptionType;
}

export interface ReadableProductOptionValue {
  id: string;
  code: string;
  name: string;
}

export interface ReadableProductVariation {
  id: string;
  code: string;
  sortOrder: number;
  option: ReadableProductOption;
  optionValue: ReadableProductOptionValue;
}

export interface ReadableProductVariant {
  id: string;
  productId: string;
  sku: string;
  variation: ReadableProductVariation;
  variationValue: ReadableProductVariation | null;
  /** Effective price: the override, or the product price. */
  price: number;
  priceOverride: number | null;
  quantity: number;
  available: boolean;
  defaultSelection: boolean;
  sortOrder: number;
}
