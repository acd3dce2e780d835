// Import NestJS controller decorators
import { Body, Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Post, Put, Query, UseGuards } from '@nestjs/common';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiBody, ApiTags } from '@nestjs/swagger';
// Import principal resolution and ACL context guards
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { AclContextGuard } from '../authorization/acl-context.guard';
import { CurrentAccess } from '../authorization/current-access.decorator';
import type { AccessContext } from '../authorization/access-context';
// Import DTOs
import { CountUsersQuery } from './dto/count-users.query';
import { CreateUserDto } from './dto/create-user.dto';
import { ListUsersQuery } from './dto/list-users.query';
import { FuzzyEmailQuery, SearchUsersDto, SearchUsersQuery } from './dto/search-users.dto';
import { UpdateUserDto } from './dto/update-user.dto';
// Import users service
import { UsersService } from './users.service';

/**
 * UsersController - REST API for user accounts
 * Routes: /users
 *
 * Every route resolves the principal (JwtAuthGuard) and its ACL engine (AclContextGuard);
 * the decision itself is taken per operation in the repositories.
 */
@ApiTags('users')
@ApiBearerAuth('bearer')
@Controller('users')
@UseGuards(JwtAuthGuard, AclContextGuard)
export class UsersController {
  constructor(private readonly users: UsersService) {}

  /**
   * GET /users/me - The caller's own record
   * Declared before /users/:id (as are count and search) so the segment is not parsed as an id.
   */
  @Get('me')
  me(@CurrentAccess() access: AccessContext) {
    return this.users.me(access);
  }

  @Get('count')
  count(@Query() query: CountUsersQuery, @CurrentAccess() access: AccessContext) {
    return this.users.count(access, query.onlyActive);
  }

  @Get('search/email')
  fuzzySearchByEmail(@Query() query: FuzzyEmailQuery, @CurrentAccess() access: AccessContext) {
    return this.users.fuzzySearchByEmail(access, query.term, query.count);
  }

  @Post('search')
  @HttpCode(200)
  @ApiBody({
    type: SearchUsersDto,
    examples: {
      byName: { summary: 'Unblocked users named Jane', value: { firstName: 'Jane', isBlocked: false } }
    }
  })
  search(@Query() query: SearchUsersQuery, @Body() terms: SearchUsersDto, @CurrentAccess() access: AccessContext) {
    return this.users.search(access, query.from, query.skip, query.count, terms);
  }

  @Get()
  list(@Query() query: ListUsersQuery, @CurrentAccess() access: AccessContext) {
    return this.users.list(access, query.from, query.count);
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number, @CurrentAccess() access: AccessContext) {
    return this.users.getById(access, id);
  }

  /**
   * POST /users - Register a user (no token required)
   */
  @Post()
  @ApiBody({
    type: CreateUserDto,
    examples: {
      basic: {
        summary: 'Register user',
        value: { email: 'jane@example.com', firstName: 'Jane', lastName: 'Doe', gender: 'female' }
      }
    }
  })
  create(@Body() dto: CreateUserDto) {
    return this.users.create(dto);
  }

  @Put(':id')
  @ApiBody({
    type: UpdateUserDto,
    examples: {
      update: { summary: 'Update profile', value: { phone: '+15550001111', middleName: 'Q' } }
    }
  })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateUserDto, @CurrentAccess() access: AccessContext) {
    return this.users.update(access, id, dto);
  }

  @Post(':id/deactivate')
  @HttpCode(200)
  deactivate(@Param('id', ParseIntPipe) id: number, @CurrentAccess() access: AccessContext) {
    return this.users.deactivate(access, id);
  }

  @Post(':id/block')
  @HttpCode(200)
  block(@Param('id', ParseIntPipe) id: number, @CurrentAccess() access: AccessContext) {
    return this.users.setBlockStatus(access, id, true);
  }

  @Post(':id/unblock')
  @HttpCode(200)
  unblock(@Param('id', ParseIntPipe) id: number, @CurrentAccess() access: AccessContext) {
    return this.users.setBlockStatus(access, id, false);
  }

  @Delete(':id')
  delete(@Param('id', ParseIntPipe) id: number, @CurrentAccess() access: AccessContext) {
    return this.users.delete(access, id);
  }
}
