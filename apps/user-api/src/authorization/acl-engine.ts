import { Action, type Permission, type Resource, type Role, type UserId } from './authorization.types';
import { toAclError } from './authorization.errors';
import type { PermissionCatalog } from './permission-catalog';
import type { RolesCache } from './roles-cache';
import type { ScopeCapability } from './scope-capability';

/**
 * AclEngine - Answers "may this user perform `action` on `resource`" for a set of
 * candidate resource instances. Rejects only when the answer cannot be computed.
 */
export interface AclEngine {
  readonly kind: 'application' | 'system' | 'unauthorized';
  can(
    resource: Resource,
    action: Action,
    actingUserId: UserId,
    candidates: readonly ScopeCapability[]
  ): Promise<boolean>;
}

/**
 * True when a catalog permission covers the requested resource and action.
 * A permission on Action.ALL covers every concrete action.
 */
export function permissionCovers(permission: Permission, resource: Resource, action: Action): boolean {
  return permission.resource === resource && (permission.action === action || permission.action === Action.ALL);
}

/**
 * ApplicationAcl - Role-based engine backed by the roles cache and the permission catalog.
 *
 * Steps:
 * 1. Resolve the acting user's roles (store failures become AclConnectionError / AclUnknownError)
 * 2. Collect the catalog permissions of those roles
 * 3. Keep permissions covering (resource, action)
 * 4. Keep permissions whose scope holds for every candidate (no candidates: all survivors)
 * 5. Allow when at least one permission survives
 *
 * Permissions are never merged across roles: one of them has to clear every candidate alone.
 */
export class ApplicationAcl implements AclEngine {
  readonly kind = 'application' as const;

  constructor(
    private readonly catalog: PermissionCatalog,
    private readonly rolesCache: RolesCache
  ) {}

  async can(
    resource: Resource,
    action: Action,
    actingUserId: UserId,
    candidates: readonly ScopeCapability[]
  ): Promise<boolean> {
    let roles: Role[];
    try {
      roles = await this.rolesCache.get(actingUserId);
    } catch (error: unknown) {
      throw toAclError(error);
    }

    return roles
      .flatMap((role) => this.catalog.permissionsFor(role))
      .filter((permission) => permissionCovers(permission, resource, action))
      .some((permission) => candidates.every((candidate) => candidate.isInScope(permission.scope, actingUserId)));
  }
}

/**
 * SystemAcl - Allows everything. For server-internal work with no real principal.
 */
export class SystemAcl implements AclEngine {
  readonly kind = 'system' as const;

  async can(): Promise<boolean> {
    return true;
  }
}

/**
 * UnauthorizedAcl - Denies everything. Used when the request carries no authenticated principal.
 */
export class UnauthorizedAcl implements AclEngine {
  readonly kind = 'unauthorized' as const;

  async can(): Promise<boolean> {
    return false;
  }
}

export const SYSTEM_ACL: AclEngine = new SystemAcl();
export const UNAUTHORIZED_ACL: AclEngine = new UnauthorizedAcl();
