import { Transform } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, IsUUID, Length, Matches, ValidateIf } from 'class-validator';

export const CATEGORY_CODE_PATTERN = /^[a-zA-Z0-9_-]{1,100}$/;

export class CreateCategoryDto {
  @Matches(CATEGORY_CODE_PATTERN, { message: 'Category code may contain letters, digits, dashes and underscores only.' })
  code!: string;

  @IsString()
  @IsNotEmpty()
  @Length(1, 255)
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsUUID()
  parentId?: string;

  @IsOptional()
  @IsInt()
  sortOrder?: number;

  @IsOptional()
  @IsBoolean()
  visible?: boolean;
}

export class UpdateCategoryDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Length(1, 255)
  name?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsInt()
  sortOrder?: number;

  @IsOptional()
  @IsBoolean()
  visible?: boolean;
}

export class MoveCategoryDto {
  /** New parent, or null to make the category a root. */
  @ValidateIf((dto: MoveCategoryDto) => dto.parentId !== null)
  @IsUUID()
  parentId!: string | null;
}

export class CategoryTreeQueryDto {
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true')
  @IsBoolean()
  visibleOnly?: boolean;
}
