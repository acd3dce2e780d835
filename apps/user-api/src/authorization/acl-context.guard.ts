// Import NestJS guard interfaces
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
// Import the request shape carrying principal and access context
import type { AppRequest } from '../common/request/app-request';
// Import engine selection
import { AclEngineFactory } from './acl-engine.factory';

/**
 * AclContextGuard - Attaches the request's AccessContext.
 * Must run AFTER JwtAuthGuard so `request.user` is already resolved.
 * Never rejects: the decision is made per operation by `enforce`.
 *
 * Usage: @UseGuards(JwtAuthGuard, AclContextGuard)
 */
@Injectable()
export class AclContextGuard implements CanActivate {
  constructor(private readonly engines: AclEngineFactory) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AppRequest>();
    request.access = this.engines.forPrincipal(request.user);
    return true;
  }
}
