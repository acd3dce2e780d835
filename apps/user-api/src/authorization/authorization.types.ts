/**
 * Role - Named bundle of grants assignable to a user.
 * Stored as the lowercase value in `user_roles.name`.
 */
export enum Role {
  SUPERUSER = 'superuser',
  USER = 'user'
}

/**
 * Resource - Protected entity kinds known to the ACL
 */
export enum Resource {
  USERS = 'users',
  USER_ROLES = 'user_roles',
  USER_DELIVERY_ADDRESSES = 'user_delivery_addresses'
}

/**
 * Action - Operation categories performable on a resource.
 * A permission granting ALL matches every requested action.
 */
export enum Action {
  ALL = 'all',
  INDEX = 'index',
  READ = 'read',
  CREATE = 'create',
  UPDATE = 'update',
  DELETE = 'delete',
  BLOCK = 'block'
}

/**
 * Scope - Restricts a permission to every instance (ALL) or only to
 * instances owned by the acting user (OWNED).
 */
export enum Scope {
  ALL = 'all',
  OWNED = 'owned'
}

/** Numeric user identifier (users.id) */
export type UserId = number;

/**
 * Reserved id for contexts without a real principal (system work, anonymous requests).
 * Stored users start at 1.
 */
export const NO_PRINCIPAL_ID: UserId = 0;

/**
 * Permission - Immutable (resource, action, scope) grant
 */
export interface Permission {
  readonly resource: Resource;
  readonly action: Action;
  readonly scope: Scope;
}

// Immutable list of all roles for iteration and validation
export const ROLES: readonly Role[] = [Role.SUPERUSER, Role.USER] as const;

/**
 * Type guard used when reading role names from storage or request bodies
 * @param value - Raw role name
 */
export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}
