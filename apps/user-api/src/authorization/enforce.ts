import type { Action, Resource } from './authorization.types';
import { AuthorizationDeniedError } from './authorization.errors';
import type { AccessContext } from './access-context';
import type { ScopeCapability } from './scope-capability';

/**
 * enforce - The single call site repositories use before returning data (reads)
 * or after performing a write whose ownership was unknown beforehand (creates).
 *
 * Resolves when the engine allows; rejects with AuthorizationDeniedError on deny.
 * Engine errors propagate unchanged, so a failed role lookup never turns into an allow.
 *
 * @param access - Engine and acting user of the current request
 * @param candidates - Instances involved; empty when there is nothing to scope-check
 */
export async function enforce(
  access: AccessContext,
  resource: Resource,
  action: Action,
  candidates: readonly ScopeCapability[] = []
): Promise<void> {
  const allowed = await access.engine.can(resource, action, access.actingUserId, candidates);
  if (!allowed) throw new AuthorizationDeniedError(resource, action);
}
