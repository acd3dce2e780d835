import { NO_PRINCIPAL_ID, type UserId } from './authorization.types';
import { SYSTEM_ACL, UNAUTHORIZED_ACL, type AclEngine } from './acl-engine';

/**
 * AccessContext - The engine selected for one request plus the id it evaluates for.
 * Passed explicitly to every guarded repository operation.
 */
export interface AccessContext {
  readonly engine: AclEngine;
  readonly actingUserId: UserId;
}

/** Context for server-internal operations (registration, role store lookups) */
export function systemAccess(): AccessContext {
  return { engine: SYSTEM_ACL, actingUserId: NO_PRINCIPAL_ID };
}

/** Context for requests without an authenticated principal */
export function anonymousAccess(): AccessContext {
  return { engine: UNAUTHORIZED_ACL, actingUserId: NO_PRINCIPAL_ID };
}
