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
} from 'class-validator';
import { SIZE_UNITS, SizeUnit, WEIGHT_UNITS, WeightUnit } from '../entities/merchant-store.entity';

/** Every field of a store except its code, all optional. */
export class UpdateMerchantStoreDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Length(1, 100)
  name?: string;

  @IsOptional()
  @IsEmail()
  email?: string;

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

  @IsOptional()
  @IsISO31661Alpha2()
  country?: string;

  @IsOptional()
  @IsString()
  zone?: string;

  @IsOptional()
  @IsISO4217CurrencyCode()
  currency?: string;

  @IsOptional()
  @IsString()
  @Length(2, 5)
  defaultLanguage?: string;

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
