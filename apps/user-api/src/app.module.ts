// Import NestJS Module decorator to define the root module
import { Module } from '@nestjs/common';
// Import ConfigModule to manage environment variables and configuration
import { ConfigModule } from '@nestjs/config';
// Import environment variable validation function
import { validateEnv } from './config/env.validation';
// Import JSON logging and mysql2 database modules (global)
import { LoggingModule } from './logging/logging.module';
import { DatabaseModule } from './database/database.module';
// Import principal resolution and ACL modules (global)
import { AuthModule } from './auth/auth.module';
import { AuthorizationModule } from './authorization/authorization.module';
// Import feature modules
import { UsersModule } from './users/users.module';
import { UserRolesModule } from './user-roles/user-roles.module';
import { DeliveryAddressesModule } from './delivery-addresses/delivery-addresses.module';
import { HealthModule } from './health/health.module';

/**
 * AppModule - Root module of the application
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '.env.local'],
      validate: validateEnv
    }),
    LoggingModule,
    DatabaseModule,
    AuthModule,
    AuthorizationModule,
    UsersModule,
    UserRolesModule,
    DeliveryAddressesModule,
    HealthModule
  ]
})
export class AppModule {}
