import { Injectable } from '@nestjs/common';
import type { ResultSetHeader } from 'mysql2/promise';
import type { AccessContext } from '../authorization/access-context';
import { Action, Resource, type UserId } from '../authorization/authorization.types';
import { enforce } from '../authorization/enforce';
import { DatabaseService, type SqlExecutor } from '../database/database.service';
import { RepositoryError } from '../database/repository.errors';
import { User, type NewUser, type UpdateUser, type UserRow, type UserSearchTerms } from './user.entity';

const UPDATABLE_COLUMNS = [
  'phone',
  'first_name',
  'last_name',
  'middle_name',
  'gender',
  'birthdate',
  'avatar',
  'is_active',
  'email_verified'
] as const;

/** Map an update payload to `users` columns; undefined entries are skipped by updateByKey */
export function toUserColumns(payload: UpdateUser): Record<string, unknown> {
  return {
    phone: payload.phone,
    first_name: payload.firstName,
    last_name: payload.lastName,
    middle_name: payload.middleName,
    gender: payload.gender,
    birthdate: payload.birthdate,
    avatar: payload.avatar,
    is_active: payload.isActive,
    email_verified: payload.emailVerified
  };
}

/** `LIKE` pattern matching `term` anywhere; wildcards in the term match literally */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, '\\$&')}%`;
}

function optionalPattern(term: string | undefined): string | null {
  return term === undefined ? null : containsPattern(term);
}

/**
 * UsersRepository - CRUD over `users`, every operation checked against the caller's ACL engine.
 */
@Injectable()
export class UsersRepository {
  constructor(private readonly db: DatabaseService) {}

  async find(access: AccessContext, id: UserId): Promise<User | null> {
    const user = await this.fetch(this.db, id);
    if (user) await enforce(access, Resource.USERS, Action.READ, [user]);
    return user;
  }

  async findByEmail(access: AccessContext, email: string): Promise<User | null> {
    const rows = await this.db.sql<UserRow[]>`SELECT * FROM users WHERE email = ${email} LIMIT 1`;
    const user = rows[0] ? User.fromRow(rows[0]) : null;
    if (user) await enforce(access, Resource.USERS, Action.READ, [user]);
    return user;
  }

  /** Existence check; reveals no row, so nothing is scope-checked */
  async emailExists(access: AccessContext, email: string, executor: SqlExecutor = this.db): Promise<boolean> {
    const rows = await executor.sql<Array<{ found: number }>>`SELECT EXISTS(SELECT 1 FROM users WHERE email = ${email}) AS found`;
    await enforce(access, Resource.USERS, Action.READ);
    return Boolean(rows[0]?.found);
  }

  async count(access: AccessContext, onlyActive: boolean): Promise<number> {
    const rows = onlyActive
      ? await this.db.sql<Array<{ total: number }>>`SELECT COUNT(*) AS total FROM users WHERE is_active = TRUE`
      : await this.db.sql<Array<{ total: number }>>`SELECT COUNT(*) AS total FROM users`;
    await enforce(access, Resource.USERS, Action.READ);
    return Number(rows[0]?.total ?? 0);
  }

  /**
   * Active users with id >= `from`, ordered by id, at most `count`.
   * Denied as a whole if any returned user is out of the caller's scope.
   */
  async list(access: AccessContext, from: number, count: number): Promise<User[]> {
    const rows = await this.db.sql<UserRow[]>`
      SELECT * FROM users WHERE is_active = TRUE AND id >= ${from} ORDER BY id LIMIT ${count}`;
    const users = rows.map((row) => User.fromRow(row));
    await enforce(access, Resource.USERS, Action.READ, users);
    return users;
  }

  /**
   * Active users with id >= `from` matching every given term, `skip` rows skipped, at most `count`.
   * Text terms match anywhere in the column.
   */
  async search(access: AccessContext, from: number, skip: number, count: number, terms: UserSearchTerms): Promise<User[]> {
    const email = optionalPattern(terms.email);
    const phone = optionalPattern(terms.phone);
    const firstName = optionalPattern(terms.firstName);
    const lastName = optionalPattern(terms.lastName);
    const isBlocked = terms.isBlocked ?? null;

    const rows = await this.db.sql<UserRow[]>`
      SELECT * FROM users
      WHERE is_active = TRUE AND id >= ${from}
        AND (${email} IS NULL OR email LIKE ${email})
        AND (${phone} IS NULL OR phone LIKE ${phone})
        AND (${firstName} IS NULL OR first_name LIKE ${firstName})
        AND (${lastName} IS NULL OR last_name LIKE ${lastName})
        AND (${isBlocked} IS NULL OR is_blocked = ${isBlocked})
      ORDER BY id LIMIT ${count} OFFSET ${skip}`;
    const users = rows.map((row) => User.fromRow(row));
    await enforce(access, Resource.USERS, Action.READ, users);
    return users;
  }

  /** Users whose email contains `term`, ordered by id, at most `count` */
  async fuzzySearchByEmail(access: AccessContext, term: string, count: number): Promise<User[]> {
    const rows = await this.db.sql<UserRow[]>`
      SELECT * FROM users WHERE email LIKE ${containsPattern(term)} ORDER BY id LIMIT ${count}`;
    const users = rows.map((row) => User.fromRow(row));
    await enforce(access, Resource.USERS, Action.READ, users);
    return users;
  }

  /**
   * Insert, then check the new row; a denial rolls the insert back.
   * Runs on `executor` when the caller already holds a transaction, otherwise opens one.
   */
  async create(access: AccessContext, payload: NewUser, executor?: SqlExecutor): Promise<User> {
    if (!executor) {
      return this.db.transaction((tx) => this.create(access, payload, tx));
    }

    const result = await executor.sql<ResultSetHeader>`
      INSERT INTO users (email, phone, first_name, last_name, middle_name, gender, birthdate)
      VALUES (${payload.email}, ${payload.phone ?? null}, ${payload.firstName ?? null}, ${payload.lastName ?? null},
              ${payload.middleName ?? null}, ${payload.gender ?? 'undefined'}, ${payload.birthdate ?? null})`;
    const user = await this.fetchExisting(executor, result.insertId);
    await enforce(access, Resource.USERS, Action.CREATE, [user]);
    return user;
  }

  async update(access: AccessContext, id: UserId, payload: UpdateUser): Promise<User> {
    const current = await this.fetchExisting(this.db, id);
    await enforce(access, Resource.USERS, Action.UPDATE, [current]);

    const columns = toUserColumns(payload);
    await this.db.updateByKey('users', 'id', id, columns, UPDATABLE_COLUMNS);
    return this.fetchExisting(this.db, id);
  }

  async deactivate(access: AccessContext, id: UserId): Promise<User> {
    const current = await this.fetchExisting(this.db, id);
    await enforce(access, Resource.USERS, Action.BLOCK, [current]);

    await this.db.sql`UPDATE users SET is_active = FALSE WHERE id = ${id}`;
    return this.fetchExisting(this.db, id);
  }

  async setBlockStatus(access: AccessContext, id: UserId, isBlocked: boolean): Promise<User> {
    const current = await this.fetchExisting(this.db, id);
    await enforce(access, Resource.USERS, Action.BLOCK, [current]);

    await this.db.sql`UPDATE users SET is_blocked = ${isBlocked} WHERE id = ${id}`;
    return this.fetchExisting(this.db, id);
  }

  /** Deletes the user; roles and addresses go with it (ON DELETE CASCADE) */
  async delete(access: AccessContext, id: UserId): Promise<User> {
    const current = await this.fetchExisting(this.db, id);
    await enforce(access, Resource.USERS, Action.DELETE, [current]);

    await this.db.sql`DELETE FROM users WHERE id = ${id}`;
    return current;
  }

  private async fetch(executor: SqlExecutor, id: UserId): Promise<User | null> {
    const rows = await executor.sql<UserRow[]>`SELECT * FROM users WHERE id = ${id}`;
    return rows[0] ? User.fromRow(rows[0]) : null;
  }

  private async fetchExisting(executor: SqlExecutor, id: UserId): Promise<User> {
    const user = await this.fetch(executor, id);
    if (!user) throw RepositoryError.notFound(`User ${id} not found`);
    return user;
  }
}
