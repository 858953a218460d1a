import { IsOptional, IsString } from 'class-validator';
import { PaginationQueryDto } from '../../common/types/pagination';

export class ListMerchantStoresDto extends PaginationQueryDto {
  @IsOptional()
  @IsString()
  name?: string;
}
