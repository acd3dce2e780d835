import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { AppRequest } from '../common/request/app-request';
import type { AccessContext } from './access-context';

/**
 * Read the AccessContext attached by AclContextGuard
 * @throws Error when the guard did not run (route wiring mistake)
 */
export function accessFromContext(ctx: ExecutionContext): AccessContext {
  const request = ctx.switchToHttp().getRequest<AppRequest>();
  if (!request.access) {
    throw new Error('AccessContext missing; apply AclContextGuard to this route');
  }
  return request.access;
}

/**
 * @CurrentAccess() - Controller parameter carrying the request's AccessContext
 */
export const CurrentAccess = createParamDecorator((_data: unknown, ctx: ExecutionContext) => accessFromContext(ctx));
