import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errors, jwtVerify, type JWTPayload } from 'jose';
import type { AccessTokenPayload } from './interfaces/access-token-payload';
import type { AuthenticatedUser } from './interfaces/authenticated-user';

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Parse the `sub` claim into a positive integer user id
 * @returns The user id, or null when the claim is not a positive integer
 */
export function parseUserId(sub: unknown): number | null {
  if (!isNonEmptyString(sub) || !/^[1-9]\d*$/.test(sub.trim())) return null;
  const id = Number(sub.trim());
  return Number.isSafeInteger(id) ? id : null;
}

function toAccessTokenPayload(payload: JWTPayload, sub: string): AccessTokenPayload {
  const email = isNonEmptyString(payload.email) ? payload.email : undefined;
  return { ...payload, sub, email };
}

/**
 * JwtStrategy - Verifies HS256 bearer tokens signed with JWT_SECRET.
 * Signature, exp/nbf and (when configured) issuer are checked by jose.
 */
@Injectable()
export class JwtStrategy {
  private readonly secret: Uint8Array;
  private readonly issuer?: string;

  constructor(private readonly config: ConfigService) {
    const secret = this.config.get<string>('JWT_SECRET');
    if (!isNonEmptyString(secret)) {
      // Fail fast at startup for server misconfiguration
      throw new Error('Missing JWT configuration: JWT_SECRET');
    }
    this.secret = new TextEncoder().encode(secret);

    const issuer = this.config.get<string>('JWT_ISSUER');
    this.issuer = isNonEmptyString(issuer) ? issuer : undefined;
  }

  /**
   * Verify a raw JWT string (without "Bearer " prefix)
   * @throws UnauthorizedException for any invalid, expired or malformed token
   */
  async verifyJwt(token: string): Promise<AuthenticatedUser> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.secret, {
        algorithms: ['HS256'],
        ...(this.issuer ? { issuer: this.issuer } : {})
      }));
    } catch (err: unknown) {
      if (err instanceof errors.JOSEError) throw new UnauthorizedException('Unauthorized');
      throw err;
    }

    const userId = parseUserId(payload.sub);
    if (userId === null || !isNonEmptyString(payload.sub)) {
      throw new UnauthorizedException('Unauthorized');
    }

    return { userId, claims: toAccessTokenPayload(payload, payload.sub) };
  }
}
