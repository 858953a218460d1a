import { Row } from '../../common/persistence/entity-repository';

export const WEIGHT_UNITS = ['LB', 'KG'] as const;
export type WeightUnit = (typeof WEIGHT_UNITS)[number];

export const SIZE_UNITS = ['CM', 'IN'] as const;
export type SizeUnit = (typeof SIZE_UNITS)[number];

/** Code of the store created by the schema migration; it cannot be deleted. */
export const DEFAULT_STORE_CODE = 'DEFAULT';

export interface MerchantStore extends Row {
  Code: string;
  Name: string;
  Email: string;
  Phone: string | null;
  Address: string | null;
  City: string | null;
  PostalCode: string | null;
  Country: string;
  Zone: string | null;
  Currency: string;
  DefaultLanguage: string;
  SupportedLanguages: string[];
  WeightUnit: WeightUnit;
  SizeUnit: SizeUnit;
  InBusinessSince: string | null;
  UseCache: boolean;
  IsRetailer: boolean;
  /** File name of the LOGO content file. */
  Logo: string | null;
}

export interface ReadableMerchantStore {
  id: string;
  code: string;
  name: string;
  email: string;
  phone: string | null;
  address: {
    address: string | null;
    city: string | null;
    postalCode: string | null;
    country: string;
    zone: string | null;
  };
  currency: string;
  defaultLanguage: string;
  supportedLanguages: string[];
  weightUnit: WeightUnit;
  sizeUnit: SizeUnit;
  inBusinessSince: string | null;
  useCache: boolean;
  retailer: boolean;
  logo: { name: string; url: string } | null;
}
