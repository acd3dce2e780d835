// Import validation decorators
import { IsBoolean, IsInt, IsOptional, IsString, MaxLength, Min, MinLength } from 'class-validator';

/**
 * CreateDeliveryAddressDto - Request body for POST /delivery-addresses
 * Components follow geocoder naming (administrative_area_level_1 = state/province, ...).
 */
export class CreateDeliveryAddressDto {
  @IsInt()
  @Min(1)
  userId!: number;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  administrativeAreaLevel1?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  administrativeAreaLevel2?: string;

  @IsString()
  @MinLength(1, { message: 'Country must not be empty' })
  @MaxLength(255)
  country!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  locality?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  political?: string;

  @IsString()
  @MinLength(1, { message: 'Postal code must not be empty' })
  @MaxLength(32)
  postalCode!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  route?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  streetNumber?: string;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  address?: string;

  @IsOptional()
  @IsBoolean()
  isPriority?: boolean;
}
