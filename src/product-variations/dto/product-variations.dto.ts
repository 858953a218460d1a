import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  Length,
  Matches,
  Min,
} from 'class-validator';
import { SKU_PATTERN } from '../../products/dto/product.dto';
import { OPTION_TYPES, OptionType } from '../entities/product-variations.entity';

const CODE_PATTERN = /^[a-zA-Z0-9_-]{1,100}$/;
const CODE_MESSAGE = 'Code may contain letters, digits, dashes and underscores only.';

export class CreateProductOptionDto {
  @Matches(CODE_PATTERN, { message: CODE_MESSAGE })
  code!: string;

  @IsString()
  @IsNotEmpty()
  @Length(1, 100)
  name!: string;

  @IsIn(OPTION_TYPES)
  type!: OptionType;
}

export class UpdateProductOptionDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Length(1, 100)
  name?: string;

  @IsOptional()
  @IsIn(OPTION_TYPES)
  type?: OptionType;
}

export class CreateProductOptionValueDto {
  @Matches(CODE_PATTERN, { message: CODE_MESSAGE })
  code!: string;

  @IsString()
  @IsNotEmpty()
  @Length(1, 100)
  name!: string;
}

export class UpdateProductOptionValueDto {
  @IsString()
  @IsNotEmpty()
  @Length(1, 100)
  name!: string;
}

export class CreateProductVariationDto {
  @Matches(CODE_PATTERN, { message: CODE_MESSAGE })
  code!: string;

  @IsUUID()
  optionId!: string;

  @IsUUID()
  optionValueId!: string;

  @IsOptional()
  @IsInt()
  sortOrder?: number;
}

export class CreateProductVariantDto {
  @Matches(SKU_PATTERN, { message: 'SKU can only contain letters, numbers, dots, underscores and hyphens.' })
  sku!: string;

  @IsUUID()
  variationId!: string;

  @IsOptional()
  @IsUUID()
  variationValueId?: string;

  /** Leave empty to sell at the product price. */
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price?: number;

  @IsInt()
  @Min(0)
  quantity!: number;

  @IsOptional()
  @IsBoolean()
  available?: boolean;

  @IsOptional()
  @IsBoolean()
  defaultSelection?: boolean;

  @IsOptional()
  @IsInt()
  sortOrder?: number;
}

export class UpdateProductVariantDto {
  /** `null` removes the price override. */
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  quantity?: number;

  @IsOptional()
  @IsBoolean()
  available?: boolean;

  @IsOptional()
  @IsBoolean()
  defaultSelection?: boolean;

  @IsOptional()
  @IsInt()
  sortOrder?: number;
}
