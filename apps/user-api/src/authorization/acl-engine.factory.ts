import { Injectable } from '@nestjs/common';
import type { AuthenticatedUser } from '../auth/interfaces/authenticated-user';
import { anonymousAccess, type AccessContext } from './access-context';
import { ApplicationAcl } from './acl-engine';

/**
 * AclEngineFactory - Picks the engine for a request's principal.
 * Authenticated users get the role-based engine; anonymous requests are denied everything.
 */
@Injectable()
export class AclEngineFactory {
  constructor(private readonly applicationAcl: ApplicationAcl) {}

  forPrincipal(user: AuthenticatedUser | undefined): AccessContext {
    if (!user) return anonymousAccess();
    return { engine: this.applicationAcl, actingUserId: user.userId };
  }
}
