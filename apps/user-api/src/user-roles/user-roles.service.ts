import { Injectable } from '@nestjs/common';
import { systemAccess, type AccessContext } from '../authorization/access-context';
import { Action, Resource, Role, type UserId } from '../authorization/authorization.types';
import { enforce } from '../authorization/enforce';
import { RolesCache } from '../authorization/roles-cache';
import { ownedBy } from '../authorization/scope-capability';
import type { SqlExecutor } from '../database/database.service';
import { JsonLogger } from '../logging/json-logger.service';
import type { NewUserRole, UserRole } from './user-role.entity';
import { UserRolesRepository } from './user-roles.repository';

/**
 * UserRolesService - Role assignment use cases.
 * Every successful create/delete drops the affected user's roles cache entry,
 * so the next authorization decision for that user sees the change.
 */
@Injectable()
export class UserRolesService {
  private readonly logger: JsonLogger;

  constructor(
    private readonly repository: UserRolesRepository,
    private readonly rolesCache: RolesCache,
    logger: JsonLogger
  ) {
    this.logger = logger.child(UserRolesService.name);
  }

  /** Role names of a user, answered from the roles cache */
  async getRoles(access: AccessContext, userId: UserId): Promise<Role[]> {
    await enforce(access, Resource.USER_ROLES, Action.READ, [ownedBy(userId)]);
    return this.rolesCache.get(userId);
  }

  async create(access: AccessContext, payload: NewUserRole, executor?: SqlExecutor): Promise<UserRole> {
    const role = await this.repository.create(access, payload, executor);
    this.rolesCache.remove(role.userId);
    this.logger.log('User role assigned', { userId: role.userId, role: role.name, actingUserId: access.actingUserId });
    return role;
  }

  /** Assign the default `user` role to a freshly registered user, inside the registration transaction */
  createDefault(userId: UserId, executor: SqlExecutor): Promise<UserRole> {
    return this.create(systemAccess(), { userId, name: Role.USER }, executor);
  }

  async deleteById(access: AccessContext, id: number): Promise<UserRole> {
    const role = await this.repository.deleteById(access, id);
    this.rolesCache.remove(role.userId);
    this.logger.log('User role removed', { userId: role.userId, role: role.name, actingUserId: access.actingUserId });
    return role;
  }

  async deleteByUserId(access: AccessContext, userId: UserId): Promise<UserRole[]> {
    const roles = await this.repository.deleteByUserId(access, userId);
    this.rolesCache.remove(userId);
    this.logger.log('User roles removed', { userId, count: roles.length, actingUserId: access.actingUserId });
    return roles;
  }

  async deleteUserRole(access: AccessContext, userId: UserId, name: Role): Promise<UserRole> {
    const role = await this.repository.deleteUserRole(access, userId, name);
    this.rolesCache.remove(userId);
    this.logger.log('User role removed', { userId, role: name, actingUserId: access.actingUserId });
    return role;
  }

  /** Drop every cached role list. Needs (user_roles, delete) at any scope. */
  async clearCache(access: AccessContext): Promise<void> {
    await enforce(access, Resource.USER_ROLES, Action.DELETE);
    this.rolesCache.clear();
    this.logger.warn('Roles cache cleared', { actingUserId: access.actingUserId });
  }
}
