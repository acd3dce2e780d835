// Import the user id type shared with the ACL
import type { UserId } from '../../authorization/authorization.types';
// Import verified token payload interface
import type { AccessTokenPayload } from './access-token-payload';

/**
 * AuthenticatedUser interface - Principal resolved from a verified bearer token
 * Attached to the request by JwtAuthGuard
 */
export interface AuthenticatedUser {
  /** Numeric user id taken from the `sub` claim */
  userId: UserId;

  /** Complete verified JWT payload */
  claims: AccessTokenPayload;
}
