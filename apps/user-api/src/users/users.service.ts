import { ConflictException, Injectable, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { systemAccess, type AccessContext } from '../authorization/access-context';
import { NO_PRINCIPAL_ID, type UserId } from '../authorization/authorization.types';
import { RolesCache } from '../authorization/roles-cache';
import { DatabaseService } from '../database/database.service';
import { JsonLogger } from '../logging/json-logger.service';
import { UserRolesService } from '../user-roles/user-roles.service';
import type { NewUser, UpdateUser, User, UserSearchTerms } from './user.entity';
import { UsersRepository } from './users.repository';

@Injectable()
export class UsersService {
  private readonly logger: JsonLogger;

  constructor(
    private readonly db: DatabaseService,
    private readonly users: UsersRepository,
    private readonly userRoles: UserRolesService,
    private readonly rolesCache: RolesCache,
    logger: JsonLogger
  ) {
    this.logger = logger.child(UsersService.name);
  }

  /**
   * Register a user. Runs under the System engine (there is no principal yet).
   * The email check, the user row and the default `user` role share one transaction,
   * so a failed role insert leaves no user behind.
   * @throws ConflictException when the email is taken
   */
  async create(payload: NewUser): Promise<User> {
    const access = systemAccess();
    const user = await this.db.transaction(async (tx) => {
      if (await this.users.emailExists(access, payload.email, tx)) {
        throw new ConflictException('Email already registered');
      }
      const created = await this.users.create(access, payload, tx);
      await this.userRoles.createDefault(created.id, tx);
      return created;
    });

    this.logger.log('User registered', { userId: user.id });
    return user;
  }

  async getById(access: AccessContext, id: UserId): Promise<User> {
    const user = await this.users.find(access, id);
    if (!user) throw new NotFoundException('Not Found');
    return user;
  }

  /** The acting user's own record */
  me(access: AccessContext): Promise<User> {
    if (access.actingUserId === NO_PRINCIPAL_ID) throw new UnauthorizedException('Unauthorized');
    return this.getById(access, access.actingUserId);
  }

  list(access: AccessContext, from: number, count: number): Promise<User[]> {
    return this.users.list(access, from, count);
  }

  count(access: AccessContext, onlyActive: boolean): Promise<number> {
    return this.users.count(access, onlyActive);
  }

  search(access: AccessContext, from: number, skip: number, count: number, terms: UserSearchTerms): Promise<User[]> {
    return this.users.search(access, from, skip, count, terms);
  }

  fuzzySearchByEmail(access: AccessContext, term: string, count: number): Promise<User[]> {
    return this.users.fuzzySearchByEmail(access, term, count);
  }

  update(access: AccessContext, id: UserId, payload: UpdateUser): Promise<User> {
    return this.users.update(access, id, payload);
  }

  async deactivate(access: AccessContext, id: UserId): Promise<User> {
    const user = await this.users.deactivate(access, id);
    this.logger.log('User deactivated', { userId: id, actingUserId: access.actingUserId });
    return user;
  }

  async setBlockStatus(access: AccessContext, id: UserId, isBlocked: boolean): Promise<User> {
    const user = await this.users.setBlockStatus(access, id, isBlocked);
    this.logger.log(isBlocked ? 'User blocked' : 'User unblocked', { userId: id, actingUserId: access.actingUserId });
    return user;
  }

  /** Role rows go with the user (cascade), so its cache entry is dropped too */
  async delete(access: AccessContext, id: UserId): Promise<User> {
    const user = await this.users.delete(access, id);
    this.rolesCache.remove(id);
    this.logger.log('User deleted', { userId: id, actingUserId: access.actingUserId });
    return user;
  }
}
