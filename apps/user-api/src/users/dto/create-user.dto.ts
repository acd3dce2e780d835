// Import validation decorators
import { IsEmail, IsEnum, IsISO8601, IsOptional, IsString, Matches, MaxLength, MinLength } from 'class-validator';
// Import Gender enum
import { Gender } from '../user.entity';

// "+" optional, then at least 7 digits
export const PHONE_PATTERN = /^\+?\d{7}\d*$/;

/**
 * CreateUserDto - Request body for POST /users (registration)
 * The new user receives the default `user` role.
 */
export class CreateUserDto {
  @IsEmail()
  @MaxLength(255)
  email!: string;

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

  /** Calendar date, YYYY-MM-DD */
  @IsOptional()
  @IsISO8601({ strict: true })
  birthdate?: string;
}
