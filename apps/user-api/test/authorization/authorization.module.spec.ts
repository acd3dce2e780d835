import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { ApplicationAcl } from '../../src/authorization/acl-engine';
import { AclEngineFactory } from '../../src/authorization/acl-engine.factory';
import { AclUnknownError } from '../../src/authorization/authorization.errors';
import { Action, Resource, Role } from '../../src/authorization/authorization.types';
import { AuthorizationModule } from '../../src/authorization/authorization.module';
import { PermissionCatalog } from '../../src/authorization/permission-catalog';
import { RolesCache } from '../../src/authorization/roles-cache';
import { ownedBy } from '../../src/authorization/scope-capability';
import { DatabaseModule } from '../../src/database/database.module';
import { DatabaseService } from '../../src/database/database.service';
import { LoggingModule } from '../../src/logging/logging.module';
import { FakeDatabase } from '../support/fake-database';
import { userRoleRow } from '../support/rows';

async function compile(db: FakeDatabase) {
  const moduleRef = await Test.createTestingModule({
    imports: [ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }), LoggingModule, DatabaseModule, AuthorizationModule]
  })
    .overrideProvider(DatabaseService)
    .useValue(db.asService())
    .compile();
  return moduleRef;
}

describe('AuthorizationModule', () => {
  it('wires one catalog, cache and engine for the whole process', async () => {
    const moduleRef = await compile(new FakeDatabase());

    const acl = moduleRef.get(ApplicationAcl);
    const factory = moduleRef.get(AclEngineFactory);

    expect(moduleRef.get(PermissionCatalog).permissionsFor(Role.SUPERUSER)).toHaveLength(3);
    expect(factory.forPrincipal({ userId: 1, claims: { sub: '1' } }).engine).toBe(acl);
    expect(moduleRef.get(RolesCache)).toBe(moduleRef.get(RolesCache));
  });

  it('decides from roles stored in user_roles and caches them', async () => {
    const db = new FakeDatabase().on(/^SELECT \* FROM user_roles WHERE user_id = \?/, ({ params }) =>
      params[0] === 5 ? [userRoleRow(1, 5, 'user')] : []
    );
    const moduleRef = await compile(db);
    const acl = moduleRef.get(ApplicationAcl);

    await expect(acl.can(Resource.USERS, Action.UPDATE, 5, [ownedBy(5)])).resolves.toBe(true);
    await expect(acl.can(Resource.USERS, Action.UPDATE, 5, [ownedBy(6)])).resolves.toBe(false);
    await expect(acl.can(Resource.USERS, Action.READ, 7, [])).resolves.toBe(false);

    expect(db.queries.filter((query) => query.params[0] === 5)).toHaveLength(1);
    expect(moduleRef.get(RolesCache).has(5)).toBe(true);
  });

  it('fails closed on a role name it does not know', async () => {
    const db = new FakeDatabase().on(/^SELECT \* FROM user_roles WHERE user_id = \?/, () => [
      userRoleRow(1, 5, 'user'),
      userRoleRow(2, 5, 'admin')
    ]);
    const moduleRef = await compile(db);
    const acl = moduleRef.get(ApplicationAcl);

    const verdict = acl.can(Resource.USERS, Action.READ, 5, []);

    await expect(verdict).rejects.toBeInstanceOf(AclUnknownError);
    await expect(verdict).rejects.toThrow('Role resolution failed: Unknown role name in user_roles 2: admin');
    expect(moduleRef.get(RolesCache).has(5)).toBe(false);
  });
});
