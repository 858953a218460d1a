import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsISO31661Alpha2,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { SHIPPING_TYPES, ShippingType } from '../entities/shipping-configuration.entity';

export class PriceTableRowDto {
  @IsNumber()
  @Min(0, { message: 'Weight cannot be negative.' })
  maxWeight!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0, { message: 'Price cannot be negative.' })
  price!: number;
}

export class ShippingRegionDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsISO31661Alpha2({ each: true })
  countries!: string[];

  @IsArray()
  @ArrayNotEmpty({ message: 'A region needs at least one price table row.' })
  @ValidateNested({ each: true })
  @Type(() => PriceTableRowDto)
  priceTable!: PriceTableRowDto[];
}

export class SaveShippingConfigurationDto {
  @IsIn(SHIPPING_TYPES)
  shippingType!: ShippingType;

  @IsOptional()
  @IsArray()
  @IsISO31661Alpha2({ each: true })
  shipToCountries?: string[];

  @IsOptional()
  @IsBoolean()
  freeShippingEnabled?: boolean;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  freeShippingThreshold?: number;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  handlingFee?: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ShippingRegionDto)
  regions!: ShippingRegionDto[];
}

export class ShippingQuoteDto {
  @IsISO31661Alpha2()
  country!: string;

  @IsString()
  @IsNotEmpty()
  cartCode!: string;
}
