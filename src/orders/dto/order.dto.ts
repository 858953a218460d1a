import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsEmail,
  IsIn,
  IsISO31661Alpha2,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Min,
  ValidateNested,
} from 'class-validator';
import { PaginationQueryDto } from '../../common/types/pagination';
import { ChargeType } from '../../payments/processors/payment-processor';
import { ORDER_STATUSES, OrderStatus } from '../entities/order.entity';

export class OrderAddressDto {
  @IsString()
  @IsNotEmpty()
  firstName!: string;

  @IsString()
  @IsNotEmpty()
  lastName!: string;

  @IsOptional()
  @IsString()
  company?: string;

  @IsString()
  @IsNotEmpty()
  address!: string;

  @IsString()
  @IsNotEmpty()
  city!: string;

  @IsString()
  @Length(1, 20)
  postalCode!: string;

  @IsISO31661Alpha2()
  country!: string;

  @IsOptional()
  @IsString()
  zone?: string;

  @IsOptional()
  @IsString()
  phone?: string;
}

export class CustomerDto {
  @IsEmail()
  email!: string;

  @IsString()
  @IsNotEmpty()
  firstName!: string;

  @IsString()
  @IsNotEmpty()
  lastName!: string;
}

const CHARGE_TYPES: ChargeType[] = ['AUTHORIZE', 'AUTHORIZECAPTURE'];

export class CheckoutDto {
  @IsString()
  @IsNotEmpty()
  cartCode!: string;

  @ValidateNested()
  @Type(() => CustomerDto)
  customer!: CustomerDto;

  @ValidateNested()
  @Type(() => OrderAddressDto)
  billing!: OrderAddressDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => OrderAddressDto)
  delivery?: OrderAddressDto;

  @IsString()
  @IsNotEmpty()
  paymentModule!: string;

  /** Token from the payment gateway's client library, e.g. a Stripe payment method id. */
  @IsOptional()
  @IsString()
  paymentToken?: string;

  @IsOptional()
  @IsIn(CHARGE_TYPES)
  chargeType?: ChargeType;

  @IsOptional()
  @IsString()
  shippingOptionCode?: string;

  @IsOptional()
  @IsString()
  comments?: string;
}

export class UpdateOrderStatusDto {
  @IsIn(ORDER_STATUSES)
  status!: OrderStatus;

  @IsOptional()
  @IsString()
  comment?: string;

  @IsOptional()
  @IsBoolean()
  customerNotified?: boolean;
}

export class RefundOrderDto {
  /** Defaults to everything not yet refunded. */
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  amount?: number;
}

export class ListOrdersDto extends PaginationQueryDto {
  @IsOptional()
  @IsIn(ORDER_STATUSES)
  status?: OrderStatus;

  @IsOptional()
  @IsString()
  email?: string;
}
