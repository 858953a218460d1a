import { Row } from '../../common/persistence/entity-repository';

export interface ShoppingCart extends Row {
  /** Public identifier handed to the shopper. */
  Code: string;
  StoreId: string;
  CustomerEmail: string | null;
  /** Set once the cart has been checked out; the cart is read-only from then on. */
  OrderId: string | null;
}

export interface ShoppingCartItem extends Row {
  CartId: string;
  ProductId: string;
  VariantId: string | null;
  Sku: string;
  VariantSku: string | null;
  Name: string;
  Quantity: number;
  /** Effective price when the line was last changed. */
  UnitPrice: number;
}

export interface ReadableShoppingCartItem {
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

export interface ReadableShoppingCart {
  id: string;
  code: string;
  customerEmail: string | null;
  orderId: string | null;
  currency: string;
  items: ReadableShoppingCartItem[];
  itemCount: number;
  subTotal: number;
  displaySubTotal: string;
}
