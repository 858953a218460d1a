import { IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from 'class-validator';
import { SKU_PATTERN } from '../../products/dto/product.dto';

export class AddCartItemDto {
  @Matches(SKU_PATTERN, { message: 'SKU can only contain letters, numbers, dots, underscores and hyphens.' })
  sku!: string;

  @IsOptional()
  @Matches(SKU_PATTERN, { message: 'Variant SKU can only contain letters, numbers, dots, underscores and hyphens.' })
  variantSku?: string;

  @IsInt()
  @Min(1, { message: 'Quantity must be at least 1.' })
  quantity!: number;

  @IsOptional()
  @IsEmail()
  customerEmail?: string;
}

export class UpdateCartItemDto {
  @IsInt()
  @Min(0, { message: 'Quantity cannot be negative.' })
  quantity!: number;
}

export class MergeCartsDto {
  @IsString()
  @IsNotEmpty()
  sourceCode!: string;
}
