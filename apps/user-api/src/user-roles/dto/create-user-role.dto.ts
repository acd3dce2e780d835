// Import validation decorators
import { IsEnum, IsInt, Min } from 'class-validator';
// Import role names known to the permission catalog
import { Role } from '../../authorization/authorization.types';

/**
 * CreateUserRoleDto - Request body for POST /user-roles
 */
export class CreateUserRoleDto {
  @IsInt()
  @Min(1)
  userId!: number;

  /** One of the catalog roles: superuser, user */
  @IsEnum(Role)
  name!: Role;
}
