// Import validation decorators
import { IsBoolean, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

/**
 * UpdateDeliveryAddressDto - Request body for PUT /delivery-addresses/:id
 * All fields are optional; the owning user cannot be changed.
 */
export class UpdateDeliveryAddressDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  administrativeAreaLevel1?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  administrativeAreaLevel2?: string;

  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'Country must not be empty' })
  @MaxLength(255)
  country?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  locality?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  political?: string;

  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'Postal code must not be empty' })
  @MaxLength(32)
  postalCode?: string;

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
