// Import Module decorator
import { Module } from '@nestjs/common';
import { UserRolesController } from './user-roles.controller';
import { UserRolesService } from './user-roles.service';

/**
 * UserRolesModule - Role assignment endpoints.
 * UserRolesRepository and RolesCache come from the global AuthorizationModule.
 */
@Module({
  controllers: [UserRolesController],
  providers: [UserRolesService],
  exports: [UserRolesService]
})
export class UserRolesModule {}
