// Import jose library's standard JWT payload interface
import type { JWTPayload } from 'jose';

/**
 * AccessTokenPayload - Claims of the access tokens accepted by this API.
 * Tokens are issued elsewhere; `sub` carries the numeric user id as a string.
 */
export interface AccessTokenPayload extends JWTPayload {
  readonly sub: string;
  readonly email?: string;
}
