import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsDateString,
  IsEmail,
  IsIn,
  IsISO31661Alpha2,
  IsISO4217CurrencyCode,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Matches,
} from 'class-validator';
import { SIZE_UNITS, SizeUnit, WEIGHT_UNITS, WeightUnit } from '../entities/merchant-store.entity';

export const STORE_CODE_PATTERN = /^[a-zA-Z0-9_-]{2,100}$/;

export class CreateMerchantStoreDto {
  @Matches(STORE_CODE_PATTERN, { message: 'Store code must be 2-100 letters, digits, dashes or underscores.' })
  code!: string;

  @IsString()
  @IsNotEmpty()
  @Length(1, 100)
  name!: string;

  @IsEmail()
  email!: string;

  @IsOptional()
  @IsString()
  phone?: string;

  @IsOptional()
  @IsString()
  address?: string;

  @IsOptional()
  @IsString()
  city?: string;

  @IsOptional()
  @IsString()
  postalCode?: string;

  @IsISO31661Alpha2({ message: 'Country must be an ISO 3166-1 alpha-2 code.' })
  country!: string;

  @IsOptional()
  @IsString()
  zone?: string;

  @IsISO4217CurrencyCode({ message: 'Currency must be an ISO 4217 code.' })
  currency!: string;

  @IsString()
  @Length(2, 5)
  defaultLanguage!: string;

  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  supportedLanguages?: string[];

  @IsOptional()
  @IsIn(WEIGHT_UNITS)
  weightUnit?: WeightUnit;

  @IsOptional()
  @IsIn(SIZE_UNITS)
  sizeUnit?: SizeUnit;

  @IsOptional()
  @IsDateString()
  inBusinessSince?: string;

  @IsOptional()
  @IsBoolean()
  useCache?: boolean;

  @IsOptional()
  @IsBoolean()
  retailer?: boolean;
}
