import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Length, Matches, Min } from 'class-validator';
import { CONTENT_TYPES, ContentType } from '../entities/content.entity';

export const CONTENT_CODE_PATTERN = /^[a-zA-Z0-9_-]{1,100}$/;
export const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export class CreateContentDto {
  @Matches(CONTENT_CODE_PATTERN, { message: 'Code can only contain letters, numbers, underscores and hyphens.' })
  code!: string;

  @IsIn(CONTENT_TYPES)
  contentType!: ContentType;

  @IsString()
  @Length(1, 255)
  title!: string;

  @IsOptional()
  @Matches(SLUG_PATTERN, { message: 'Slug can only contain lower-case letters, numbers and single hyphens.' })
  slug?: string;

  @IsString()
  body!: string;

  @IsOptional()
  @IsString()
  @Length(0, 255)
  metaDescription?: string;

  @IsOptional()
  @IsBoolean()
  visible?: boolean;

  @IsOptional()
  @IsBoolean()
  linkToMenu?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  sortOrder?: number;
}

export class UpdateContentDto {
  @IsOptional()
  @IsString()
  @Length(1, 255)
  title?: string;

  @IsOptional()
  @Matches(SLUG_PATTERN, { message: 'Slug can only contain lower-case letters, numbers and single hyphens.' })
  slug?: string;

  @IsOptional()
  @IsString()
  body?: string;

  @IsOptional()
  @IsString()
  @Length(0, 255)
  metaDescription?: string;

  @IsOptional()
  @IsBoolean()
  visible?: boolean;

  @IsOptional()
  @IsBoolean()
  linkToMenu?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  sortOrder?: number;
}

export class ListContentDto {
  @IsOptional()
  @IsIn(CONTENT_TYPES)
  type?: ContentType;

  @IsOptional()
  @Transform(({ value }) => (value === undefined ? undefined : value === true || value === 'true'))
  @IsBoolean()
  visibleOnly?: boolean;
}

export class ContentFolderDto {
  @IsString()
  @IsNotEmpty()
  folder!: string;
}
