// Import Module decorator
import { Module } from '@nestjs/common';
// Import role assignment module (default role on registration)
import { UserRolesModule } from '../user-roles/user-roles.module';
import { UsersController } from './users.controller';
import { UsersRepository } from './users.repository';
import { UsersService } from './users.service';

/**
 * UsersModule - User accounts (registration, profile, deactivation)
 */
@Module({
  imports: [UserRolesModule],
  controllers: [UsersController],
  providers: [UsersRepository, UsersService],
  exports: [UsersService]
})
export class UsersModule {}
