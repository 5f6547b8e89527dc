import {
  IsArray,
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';

const CURRENCY_PATTERN = /^[A-Za-z]{3}$/;
const CURRENCY_MESSAGE = 'currency must be a valid 3-letter ISO 4217 code';

export class CustomerAddressDto {
  @ApiPropertyOptional({ example: 'Lagos' })
  @IsOptional()
  @IsString()
  city?: string;

  @ApiPropertyOptional({ example: 'NG' })
  @IsOptional()
  @IsString()
  country?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  address?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  zipCode?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;
}

export class CustomerDto {
  @ApiPropertyOptional({ example: 'cust_123' })
  @IsOptional()
  @IsString()
  id?: string;

  @ApiProperty({ example: 'Ada' })
  @IsNotEmpty()
  @IsString()
  name!: string;

  @ApiPropertyOptional({ example: 'Lovelace' })
  @IsOptional()
  @IsString()
  surname?: string;

  @ApiProperty({ example: 'ada@example.com' })
  @IsEmail()
  email!: string;

  @ApiPropertyOptional({ example: '+2348000000000' })
  @IsOptional()
  @IsString()
  phoneNumber?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  ipAddress?: string;

  @ApiPropertyOptional({ type: CustomerAddressDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => CustomerAddressDto)
  address?: CustomerAddressDto;
}

export class CardInfoDto {
  @ApiProperty({ example: 'Ada Lovelace' })
  @IsNotEmpty()
  @IsString()
  cardHolderName!: string;

  @ApiProperty({ example: '4111111111111111' })
  @Matches(/^\d{12,19}$/, { message: 'cardNumber must be 12 to 19 digits' })
  cardNumber!: string;

  @ApiProperty({ example: '12' })
  @Matches(/^(0?[1-9]|1[0-2])$/, { message: 'expireMonth must be 1-12' })
  expireMonth!: string;

  @ApiProperty({ example: '2030' })
  @Matches(/^\d{2}(\d{2})?$/, { message: 'expireYear must be 2 or 4 digits' })
  expireYear!: string;

  @ApiProperty({ example: '123' })
  @Matches(/^\d{3,4}$/, { message: 'cvv must be 3 or 4 digits' })
  cvv!: string;
}

export class PaymentItemDto {
  @ApiProperty({ example: 'sku_1' })
  @IsNotEmpty()
  @IsString()
  id!: string;

  @ApiProperty({ example: 'Subscription' })
  @IsNotEmpty()
  @IsString()
  name!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  category?: string;

  @ApiProperty({ example: 100 })
  @IsNumber()
  @Min(0)
  price!: number;

  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  quantity?: number;
}

/**
 * DTO for creating a payment
 */
export class CreatePaymentDto {
  @ApiPropertyOptional({ description: 'Caller-side payment id', example: 'pay_123' })
  @IsOptional()
  @IsString()
  id?: string;

  @ApiPropertyOptional({ description: 'Reference passed to the processor', example: 'order_123' })
  @IsOptional()
  @IsString()
  referenceId?: string;

  @ApiProperty({ description: 'Amount in major units', example: 150.0 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  @ApiProperty({ description: 'ISO 4217 currency code', example: 'NGN' })
  @Matches(CURRENCY_PATTERN, { message: CURRENCY_MESSAGE })
  currency!: string;

  @ApiProperty({ type: CustomerDto })
  @ValidateNested()
  @Type(() => CustomerDto)
  customer!: CustomerDto;

  @ApiPropertyOptional({ type: CardInfoDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => CardInfoDto)
  cardInfo?: CardInfoDto;

  @ApiPropertyOptional({ type: [PaymentItemDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PaymentItemDto)
  items?: PaymentItemDto[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({
    description: 'Where the customer returns after 3D Secure; required when use3D is set',
    example: 'https://merchant.example.com/return',
  })
  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  callbackUrl?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  successUrl?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  errorUrl?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  use3D?: boolean;

  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(36)
  installmentCount?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  paymentChannel?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  paymentGroup?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  conversationId?: string;

  @ApiPropertyOptional({ example: 'en' })
  @IsOptional()
  @IsString()
  locale?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  clientUserAgent?: string;

  @ApiPropertyOptional({ example: { orderId: 'order_456' } })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, string>;
}

export class CancelPaymentDto {
  @ApiPropertyOptional({ example: 'Customer request' })
  @IsOptional()
  @IsString()
  reason?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ example: 'NGN' })
  @IsOptional()
  @Matches(CURRENCY_PATTERN, { message: CURRENCY_MESSAGE })
  currency?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  conversationId?: string;
}

export class RefundPaymentDto {
  @ApiProperty({ example: 'order_123' })
  @IsNotEmpty()
  @IsString()
  paymentId!: string;

  @ApiPropertyOptional({ description: 'Omit for a full refund', example: 50 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  refundAmount?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  reason?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ example: 'NGN' })
  @IsOptional()
  @Matches(CURRENCY_PATTERN, { message: CURRENCY_MESSAGE })
  currency?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  conversationId?: string;
}

export class InstallmentInquiryDto {
  @ApiProperty({ example: 1000 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  @ApiProperty({ example: 'NGN' })
  @Matches(CURRENCY_PATTERN, { message: CURRENCY_MESSAGE })
  currency!: string;

  @ApiPropertyOptional({ description: 'First 6-8 card digits', example: '411111' })
  @IsOptional()
  @Matches(/^\d{6,8}$/, { message: 'binNumber must be 6 to 8 digits' })
  binNumber?: string;
}

export class CommissionInquiryDto {
  @ApiProperty({ example: 1000 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  @ApiProperty({ example: 'NGN' })
  @Matches(CURRENCY_PATTERN, { message: CURRENCY_MESSAGE })
  currency!: string;

  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  installmentCount?: number;
}

export class PaymentStatusQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  conversationId?: string;
}

export const ENVIRONMENT_VALUES = ['sandbox', 'production'] as const;

export class EnvironmentQueryDto {
  @ApiPropertyOptional({ enum: ENVIRONMENT_VALUES, default: 'sandbox' })
  @IsOptional()
  @IsIn(ENVIRONMENT_VALUES)
  environment?: string;
}
