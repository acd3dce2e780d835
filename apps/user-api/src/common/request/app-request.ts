import type { Request } from 'express';
import type { AuthenticatedUser } from '../../auth/interfaces/authenticated-user';
import type { AccessContext } from '../../authorization/access-context';

/**
 * AppRequest - Express request with the fields our middleware and guards attach
 */
export interface AppRequest extends Request {
  /** Correlation ID generated per request. */
  requestId?: string;

  /**
   * Populated by `JwtAuthGuard` when a valid bearer token was sent.
   * Undefined means anonymous.
   */
  user?: AuthenticatedUser;

  /** ACL engine selected for this request by `AclContextGuard`. */
  access?: AccessContext;
}
