import { IsBoolean, IsIn, IsObject, IsOptional } from 'class-validator';
import { PAYMENT_ENVIRONMENTS, PaymentEnvironment } from '../entities/payment-configuration.entity';

export class SavePaymentConfigurationDto {
  @IsOptional()
  @IsBoolean()
  active?: boolean;

  @IsOptional()
  @IsBoolean()
  defaultSelected?: boolean;

  @IsOptional()
  @IsIn(PAYMENT_ENVIRONMENTS)
  environment?: PaymentEnvironment;

  /** Masked values (`****1234`) keep the stored key. */
  @IsObject()
  keys!: Record<string, string>;

  @IsOptional()
  @IsObject()
  options?: Record<string, string>;
}
