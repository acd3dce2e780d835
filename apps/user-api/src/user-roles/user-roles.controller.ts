// Import NestJS controller decorators
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseEnumPipe,
  ParseIntPipe,
  Post,
  UseGuards
} from '@nestjs/common';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiBody, ApiTags } from '@nestjs/swagger';
// Import principal resolution and ACL context guards
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { AclContextGuard } from '../authorization/acl-context.guard';
import { CurrentAccess } from '../authorization/current-access.decorator';
import type { AccessContext } from '../authorization/access-context';
import { Role } from '../authorization/authorization.types';
// Import DTOs
import { CreateUserRoleDto } from './dto/create-user-role.dto';
// Import role assignment service
import { UserRolesService } from './user-roles.service';

/**
 * UserRolesController - Role assignments
 * Routes: /users/:id/roles, /user-roles
 */
@ApiTags('user-roles')
@ApiBearerAuth('bearer')
@Controller()
@UseGuards(JwtAuthGuard, AclContextGuard)
export class UserRolesController {
  constructor(private readonly userRoles: UserRolesService) {}

  /** GET /users/:id/roles - Role names of a user */
  @Get('users/:id/roles')
  getRoles(@Param('id', ParseIntPipe) userId: number, @CurrentAccess() access: AccessContext) {
    return this.userRoles.getRoles(access, userId);
  }

  @Delete('users/:id/roles')
  deleteByUserId(@Param('id', ParseIntPipe) userId: number, @CurrentAccess() access: AccessContext) {
    return this.userRoles.deleteByUserId(access, userId);
  }

  @Delete('users/:id/roles/:name')
  deleteUserRole(
    @Param('id', ParseIntPipe) userId: number,
    @Param('name', new ParseEnumPipe(Role)) name: Role,
    @CurrentAccess() access: AccessContext
  ) {
    return this.userRoles.deleteUserRole(access, userId, name);
  }

  @Post('user-roles')
  @ApiBody({
    type: CreateUserRoleDto,
    examples: { grant: { summary: 'Grant superuser', value: { userId: 42, name: 'superuser' } } }
  })
  create(@Body() dto: CreateUserRoleDto, @CurrentAccess() access: AccessContext) {
    return this.userRoles.create(access, { userId: dto.userId, name: dto.name });
  }

  /** POST /user-roles/cache/clear - Administrative reset of the roles cache */
  @Post('user-roles/cache/clear')
  @HttpCode(200)
  async clearCache(@CurrentAccess() access: AccessContext) {
    await this.userRoles.clearCache(access);
    return { ok: true };
  }

  @Delete('user-roles/:id')
  deleteById(@Param('id', ParseIntPipe) id: number, @CurrentAccess() access: AccessContext) {
    return this.userRoles.deleteById(access, id);
  }
}
