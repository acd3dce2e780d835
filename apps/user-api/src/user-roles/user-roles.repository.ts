import { Injectable } from '@nestjs/common';
import type { ResultSetHeader } from 'mysql2/promise';
import { systemAccess, type AccessContext } from '../authorization/access-context';
import { Action, Resource, type Role, type UserId } from '../authorization/authorization.types';
import { enforce } from '../authorization/enforce';
import type { RoleStore } from '../authorization/roles-cache';
import { DatabaseService, type SqlExecutor } from '../database/database.service';
import { RepositoryError } from '../database/repository.errors';
import { UserRole, type NewUserRole, type UserRoleRow } from './user-role.entity';

/**
 * UserRolesRepository - Role assignments in `user_roles`.
 *
 * Also the RoleStore behind the roles cache: `listRolesForUser` reads under the
 * System engine, since the ACL cannot ask itself for the roles it needs to decide.
 * Cache invalidation is the caller's job (UserRolesService).
 */
@Injectable()
export class UserRolesRepository implements RoleStore {
  constructor(private readonly db: DatabaseService) {}

  async listRolesForUser(userId: UserId): Promise<Role[]> {
    const assignments = await this.listForUser(systemAccess(), userId);
    return assignments.map((assignment) => assignment.name);
  }

  async listForUser(access: AccessContext, userId: UserId): Promise<UserRole[]> {
    const rows = await this.db.sql<UserRoleRow[]>`SELECT * FROM user_roles WHERE user_id = ${userId} ORDER BY id`;
    const roles = rows.map((row) => UserRole.fromRow(row));
    await enforce(access, Resource.USER_ROLES, Action.READ, roles);
    return roles;
  }

  /**
   * Insert, then check the new assignment; a denial rolls the insert back.
   * Joins the caller's transaction when given `executor`.
   */
  async create(access: AccessContext, payload: NewUserRole, executor?: SqlExecutor): Promise<UserRole> {
    if (!executor) {
      return this.db.transaction((tx) => this.create(access, payload, tx));
    }

    const result = await executor.sql<ResultSetHeader>`
      INSERT INTO user_roles (user_id, name) VALUES (${payload.userId}, ${payload.name})`;
    const rows = await executor.sql<UserRoleRow[]>`SELECT * FROM user_roles WHERE id = ${result.insertId}`;
    if (!rows[0]) throw RepositoryError.notFound(`User role ${result.insertId} not found after insert`);

    const role = UserRole.fromRow(rows[0]);
    await enforce(access, Resource.USER_ROLES, Action.CREATE, [role]);
    return role;
  }

  async deleteById(access: AccessContext, id: number): Promise<UserRole> {
    const rows = await this.db.sql<UserRoleRow[]>`SELECT * FROM user_roles WHERE id = ${id}`;
    if (!rows[0]) throw RepositoryError.notFound(`User role ${id} not found`);

    const role = UserRole.fromRow(rows[0]);
    await enforce(access, Resource.USER_ROLES, Action.DELETE, [role]);
    await this.db.sql`DELETE FROM user_roles WHERE id = ${id}`;
    return role;
  }

  /** Remove every assignment of a user; resolves to the removed rows (possibly none) */
  async deleteByUserId(access: AccessContext, userId: UserId): Promise<UserRole[]> {
    const rows = await this.db.sql<UserRoleRow[]>`SELECT * FROM user_roles WHERE user_id = ${userId}`;
    const roles = rows.map((row) => UserRole.fromRow(row));

    await enforce(access, Resource.USER_ROLES, Action.DELETE, roles);
    if (roles.length > 0) {
      await this.db.sql`DELETE FROM user_roles WHERE user_id = ${userId}`;
    }
    return roles;
  }

  async deleteUserRole(access: AccessContext, userId: UserId, name: Role): Promise<UserRole> {
    const rows = await this.db.sql<UserRoleRow[]>`
      SELECT * FROM user_roles WHERE user_id = ${userId} AND name = ${name}`;
    if (!rows[0]) throw RepositoryError.notFound(`Role ${name} of user ${userId} not found`);

    const role = UserRole.fromRow(rows[0]);
    await enforce(access, Resource.USER_ROLES, Action.DELETE, [role]);
    await this.db.sql`DELETE FROM user_roles WHERE id = ${role.id}`;
    return role;
  }
}
