// Import transformer to turn query strings into numbers
import { Type } from 'class-transformer';
// Import validation decorators
import { IsBoolean, IsInt, IsOptional, IsString, Max, MaxLength, Min, MinLength } from 'class-validator';

/**
 * SearchUsersQuery - Paging of POST /users/search
 */
export class SearchUsersQuery {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  from: number = 1;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  skip: number = 0;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  count: number = 20;
}

/**
 * SearchUsersDto - Request body for POST /users/search
 * Every given term must match; text terms match anywhere in the field.
 */
export class SearchUsersDto {
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  email?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(32)
  phone?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(128)
  firstName?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(128)
  lastName?: string;

  @IsOptional()
  @IsBoolean()
  isBlocked?: boolean;
}

/**
 * FuzzyEmailQuery - Query string of GET /users/search/email
 */
export class FuzzyEmailQuery {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  term!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  count: number = 20;
}
