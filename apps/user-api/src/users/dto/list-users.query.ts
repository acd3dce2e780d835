// Import transformer to turn query strings into numbers
import { Type } from 'class-transformer';
// Import validation decorators
import { IsInt, IsOptional, Max, Min } from 'class-validator';

/**
 * ListUsersQuery - Query string of GET /users
 * Returns active users with id >= from, ordered by id.
 */
export class ListUsersQuery {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  from: number = 1;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  count: number = 20;
}
