// Import Global and Module decorators
import { Global, Module } from '@nestjs/common';
// Import bearer token verification strategy
import { JwtStrategy } from './jwt.strategy';
// Import principal-resolving guard
import { JwtAuthGuard } from './jwt-auth.guard';

/**
 * AuthModule - Global principal resolution (token verification only; issuance lives elsewhere)
 */
@Global()
@Module({
  providers: [JwtStrategy, JwtAuthGuard],
  exports: [JwtStrategy, JwtAuthGuard]
})
export class AuthModule {}
