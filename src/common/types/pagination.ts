import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export class PaginationQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  count?: number;
}

export interface Page<T> {
  items: T[];
  page: number;
  count: number;
  totalCount: number;
  totalPages: number;
}

export function toPage<T>(items: T[], totalCount: number, query: PaginationQueryDto): Page<T> {
  const count = query.count ?? DEFAULT_PAGE_SIZE;
  return {
    items,
    page: query.page ?? 0,
    count,
    totalCount,
    totalPages: Math.ceil(totalCount / count),
  };
}
