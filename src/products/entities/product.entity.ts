import { Row } from '../../common/persistence/entity-repository';
import { ProductImageSize } from '../../cms/file-content-type';

export interface Product extends Row {
  StoreId: string;
  Sku: string;
  Name: string;
  Description: string | null;
  Price: number;
  Quantity: number;
  Available: boolean;
  Shippable: boolean;
  /** In the store's weight unit. */
  Weight: number | null;
  Length: number | null;
  Width: number | null;
  Height: number | null;
  DateAvailable: string | null;
  SortOrder: number;
}

export interface ProductImage extends Row {
  ProductId: string;
  FileName: string;
  MimeType: string;
  SortOrder: number;
  DefaultImage: boolean;
}

export interface ReadableProductImage {
  id: string;
  fileName: string;
  mimeType: string;
  defaultImage: boolean;
  sortOrder: number;
  urls: Record<ProductImageSize, string>;
}

export interface ReadableProduct {
  id: string;
  sku: string;
  name: string;
  description: string | null;
  price: number;
  /** Price formatted in the store currency, e.g. `CA$19.99`. */
  displayPrice: string;
  quantity: number;
  available: boolean;
  shippable: boolean;
  weight: number | null;
  dimensions: { length: number | null; width: number | null; height: number | null };
  dateAvailable: string | null;
  sortOrder: number;
  categoryIds: string[];
  images: ReadableProductImage[];
}
