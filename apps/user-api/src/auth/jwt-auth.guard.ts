// Import NestJS guards and exceptions for route protection
import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
// Import the request shape carrying the resolved principal
import type { AppRequest } from '../common/request/app-request';
// Import bearer token verification strategy
import { JwtStrategy } from './jwt.strategy';

/**
 * Extract the Bearer token from the Authorization header
 * @returns The token, or undefined when no Authorization header was sent
 * @throws UnauthorizedException if the header is present but malformed
 */
export function extractBearerToken(req: AppRequest): string | undefined {
  const header = req.header('authorization');
  if (header === undefined) return undefined;

  const [scheme, value] = header.split(' ');
  if (!scheme || !value) throw new UnauthorizedException('Unauthorized');
  if (scheme.toLowerCase() !== 'bearer') throw new UnauthorizedException('Unauthorized');

  const token = value.trim();
  if (token.length === 0) throw new UnauthorizedException('Unauthorized');
  return token;
}

/**
 * JwtAuthGuard - Resolves the principal of a request.
 *
 * No Authorization header: the request continues as anonymous and the ACL
 * decides (anonymous requests get the Unauthorized engine).
 * A header that is present must carry a valid token, otherwise 401.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly strategy: JwtStrategy) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AppRequest>();
    const token = extractBearerToken(request);
    if (token === undefined) return true;

    request.user = await this.strategy.verifyJwt(token);
    return true;
  }
}
