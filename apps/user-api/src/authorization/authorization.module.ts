// Import Global and Module decorators
import { Global, Module } from '@nestjs/common';
// Import logger for cache diagnostics
import { JsonLogger } from '../logging/json-logger.service';
// Import the role store implementation
import { UserRolesRepository } from '../user-roles/user-roles.repository';
// Import ACL building blocks
import { ApplicationAcl } from './acl-engine';
import { AclEngineFactory } from './acl-engine.factory';
import { AclContextGuard } from './acl-context.guard';
import { PermissionCatalog, buildDefaultCatalog } from './permission-catalog';
import { RolesCache } from './roles-cache';

/**
 * AuthorizationModule - Process-wide ACL components.
 * One catalog, one roles cache and one application engine shared by every request.
 */
@Global()
@Module({
  providers: [
    UserRolesRepository,
    { provide: PermissionCatalog, useFactory: buildDefaultCatalog },
    {
      provide: RolesCache,
      inject: [UserRolesRepository, JsonLogger],
      useFactory: (store: UserRolesRepository, logger: JsonLogger) => {
        const log = logger.child('RolesCache');
        return new RolesCache(store, {
          onMiss: (userId) => log.debug('Roles cache miss', { userId }),
          onInvalidate: (userId) => log.debug('Roles cache invalidated', { userId })
        });
      }
    },
    {
      provide: ApplicationAcl,
      inject: [PermissionCatalog, RolesCache],
      useFactory: (catalog: PermissionCatalog, rolesCache: RolesCache) => new ApplicationAcl(catalog, rolesCache)
    },
    AclEngineFactory,
    AclContextGuard
  ],
  exports: [UserRolesRepository, PermissionCatalog, RolesCache, ApplicationAcl, AclEngineFactory, AclContextGuard]
})
export class AuthorizationModule {}
