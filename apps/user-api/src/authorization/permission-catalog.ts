import { Action, Resource, Role, Scope, type Permission } from './authorization.types';

/**
 * Build a frozen permission. Omitted action and scope default to ALL.
 *
 * Examples:
 *   permission(Resource.USERS)                            => users:all:all
 *   permission(Resource.USERS, Action.READ)               => users:read:all
 *   permission(Resource.USERS, Action.ALL, Scope.OWNED)   => users:all:owned
 */
export function permission(resource: Resource, action: Action = Action.ALL, scope: Scope = Scope.ALL): Permission {
  return Object.freeze({ resource, action, scope });
}

const NO_PERMISSIONS: readonly Permission[] = Object.freeze([]);

/**
 * PermissionCatalog - Write-once mapping from role to the permissions it grants.
 * Instances come from PermissionCatalogBuilder and are never mutated afterwards,
 * so one catalog is shared by every request without synchronization.
 */
export class PermissionCatalog {
  private readonly grants: ReadonlyMap<Role, readonly Permission[]>;

  constructor(grants: ReadonlyMap<Role, readonly Permission[]>) {
    const frozen = new Map<Role, readonly Permission[]>();
    for (const [role, permissions] of grants) {
      frozen.set(role, Object.freeze([...permissions]));
    }
    this.grants = frozen;
  }

  /**
   * Permissions granted to a role; empty for roles without explicit grants
   */
  permissionsFor(role: Role): readonly Permission[] {
    return this.grants.get(role) ?? NO_PERMISSIONS;
  }

  /** Roles that have at least one grant */
  roles(): Role[] {
    return Array.from(this.grants.keys());
  }
}

/**
 * PermissionCatalogBuilder - Registers (role, resource, action, scope) tuples.
 * There is no removal: the catalog only grows until build() is called.
 */
export class PermissionCatalogBuilder {
  private readonly grants = new Map<Role, Permission[]>();

  grant(role: Role, resource: Resource, action: Action = Action.ALL, scope: Scope = Scope.ALL): this {
    const permissions = this.grants.get(role) ?? [];
    permissions.push(permission(resource, action, scope));
    this.grants.set(role, permissions);
    return this;
  }

  build(): PermissionCatalog {
    return new PermissionCatalog(this.grants);
  }
}

/**
 * Grants of the user-management backend.
 *
 * superuser: everything on every resource
 * user:      read any user profile, anything on their own profile,
 *            read their own role assignments, manage their own delivery addresses
 */
export function buildDefaultCatalog(): PermissionCatalog {
  return new PermissionCatalogBuilder()
    .grant(Role.SUPERUSER, Resource.USERS)
    .grant(Role.SUPERUSER, Resource.USER_ROLES)
    .grant(Role.SUPERUSER, Resource.USER_DELIVERY_ADDRESSES)
    .grant(Role.USER, Resource.USERS, Action.READ)
    .grant(Role.USER, Resource.USERS, Action.ALL, Scope.OWNED)
    .grant(Role.USER, Resource.USER_ROLES, Action.READ, Scope.OWNED)
    .grant(Role.USER, Resource.USER_DELIVERY_ADDRESSES, Action.ALL, Scope.OWNED)
    .build();
}
