// Import validation decorators
import { IsBoolean, IsEnum, IsISO8601, IsOptional, IsString, IsUrl, Matches, MaxLength, MinLength } from 'class-validator';
// Import Gender enum and shared phone format
import { Gender } from '../user.entity';
import { PHONE_PATTERN } from './create-user.dto';

/**
 * UpdateUserDto - Request body for PUT /users/:id
 * All fields are optional - only provided fields are updated.
 */
export class UpdateUserDto {
  @IsOptional()
  @Matches(PHONE_PATTERN, { message: 'Incorrect phone format' })
  phone?: string;

  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'First name must not be empty' })
  @MaxLength(128)
  firstName?: string;

  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'Last name must not be empty' })
  @MaxLength(128)
  lastName?: string;

  @IsOptional()
  @IsString()
  @MinLength(1, { message: 'Middle name must not be empty' })
  @MaxLength(128)
  middleName?: string;

  @IsOptional()
  @IsEnum(Gender)
  gender?: Gender;

  @IsOptional()
  @IsISO8601({ strict: true })
  birthdate?: string;

  @IsOptional()
  @IsUrl()
  @MaxLength(512)
  avatar?: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;

  @IsOptional()
  @IsBoolean()
  emailVerified?: boolean;
}
