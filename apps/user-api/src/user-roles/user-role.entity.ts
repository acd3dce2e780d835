import type { RowDataPacket } from 'mysql2/promise';
import { isRole, type Role, type Scope, type UserId } from '../authorization/authorization.types';
import { isOwnedScope, type ScopeCapability } from '../authorization/scope-capability';
import { RepositoryError } from '../database/repository.errors';

/** Raw `user_roles` row */
export interface UserRoleRow extends RowDataPacket {
  id: number;
  user_id: number;
  name: string;
  created_at: Date;
}

/**
 * UserRole - One role assignment. Owned by the user it is assigned to.
 */
export class UserRole implements ScopeCapability {
  constructor(
    readonly id: number,
    readonly userId: UserId,
    readonly name: Role,
    readonly createdAt: Date
  ) {}

  /**
   * @throws RepositoryError (unknown) for role names the catalog does not know;
   * a role lookup never silently drops an assignment
   */
  static fromRow(row: UserRoleRow): UserRole {
    if (!isRole(row.name)) {
      throw new RepositoryError('unknown', `Unknown role name in user_roles ${row.id}: ${row.name}`);
    }
    return new UserRole(row.id, row.user_id, row.name, row.created_at);
  }

  isInScope(scope: Scope, actingUserId: UserId): boolean {
    return isOwnedScope(scope, this.userId, actingUserId);
  }
}

export interface NewUserRole {
  userId: UserId;
  name: Role;
}
