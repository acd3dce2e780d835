import { Scope, type UserId } from './authorization.types';

/**
 * ScopeCapability - Implemented by every entity type the ACL can scope-check.
 * Each entity answers for itself; there is no shared base class.
 */
export interface ScopeCapability {
  isInScope(scope: Scope, actingUserId: UserId): boolean;
}

/**
 * Shared ownership rule for entities that carry an owning user id.
 * Missing ownership never satisfies OWNED.
 */
export function isOwnedScope(scope: Scope, ownerId: UserId | null | undefined, actingUserId: UserId): boolean {
  switch (scope) {
    case Scope.ALL:
      return true;
    case Scope.OWNED:
      return ownerId !== null && ownerId !== undefined && ownerId === actingUserId;
  }
}

/**
 * Capability standing for "something owned by `ownerId`" when no row is at hand,
 * e.g. a roles lookup answered from the cache.
 */
export function ownedBy(ownerId: UserId): ScopeCapability {
  return { isInScope: (scope, actingUserId) => isOwnedScope(scope, ownerId, actingUserId) };
}
