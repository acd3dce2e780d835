import { Injectable } from '@nestjs/common';
import type { ResultSetHeader } from 'mysql2/promise';
import type { AccessContext } from '../authorization/access-context';
import { Action, Resource, type UserId } from '../authorization/authorization.types';
import { enforce } from '../authorization/enforce';
import { DatabaseService, type SqlExecutor } from '../database/database.service';
import { RepositoryError } from '../database/repository.errors';
import {
  UserDeliveryAddress,
  type NewUserDeliveryAddress,
  type UpdateUserDeliveryAddress,
  type UserDeliveryAddressRow
} from './user-delivery-address.entity';

const UPDATABLE_COLUMNS = [
  'administrative_area_level_1',
  'administrative_area_level_2',
  'country',
  'locality',
  'political',
  'postal_code',
  'route',
  'street_number',
  'address',
  'is_priority'
] as const;

export function toAddressColumns(payload: UpdateUserDeliveryAddress): Record<string, unknown> {
  return {
    administrative_area_level_1: payload.administrativeAreaLevel1,
    administrative_area_level_2: payload.administrativeAreaLevel2,
    country: payload.country,
    locality: payload.locality,
    political: payload.political,
    postal_code: payload.postalCode,
    route: payload.route,
    street_number: payload.streetNumber,
    address: payload.address,
    is_priority: payload.isPriority
  };
}

/**
 * UserDeliveryAddressesRepository - Delivery addresses of users.
 * Creating an address identical to an existing one returns the existing row.
 * Marking an address as priority clears the flag on the user's other addresses.
 */
@Injectable()
export class UserDeliveryAddressesRepository {
  constructor(private readonly db: DatabaseService) {}

  /** Newest first */
  async listForUser(access: AccessContext, userId: UserId): Promise<UserDeliveryAddress[]> {
    const rows = await this.db.sql<UserDeliveryAddressRow[]>`
      SELECT * FROM user_delivery_addresses WHERE user_id = ${userId} ORDER BY id DESC`;
    const addresses = rows.map((row) => UserDeliveryAddress.fromRow(row));
    await enforce(access, Resource.USER_DELIVERY_ADDRESSES, Action.READ, addresses);
    return addresses;
  }

  async create(access: AccessContext, payload: NewUserDeliveryAddress): Promise<UserDeliveryAddress> {
    return this.db.transaction(async (tx) => {
      const existing = await this.findIdentical(tx, payload);
      if (existing) {
        await enforce(access, Resource.USER_DELIVERY_ADDRESSES, Action.CREATE, [existing]);
        return existing;
      }

      const result = await tx.sql<ResultSetHeader>`
        INSERT INTO user_delivery_addresses
          (user_id, administrative_area_level_1, administrative_area_level_2, country, locality,
           political, postal_code, route, street_number, address, is_priority)
        VALUES (${payload.userId}, ${payload.administrativeAreaLevel1}, ${payload.administrativeAreaLevel2},
                ${payload.country}, ${payload.locality}, ${payload.political}, ${payload.postalCode},
                ${payload.route}, ${payload.streetNumber}, ${payload.address}, ${payload.isPriority})`;
      const created = await this.fetchExisting(tx, result.insertId);
      await enforce(access, Resource.USER_DELIVERY_ADDRESSES, Action.CREATE, [created]);

      if (created.isPriority) await this.clearOtherPriorities(tx, created);
      return created;
    });
  }

  async update(access: AccessContext, id: number, payload: UpdateUserDeliveryAddress): Promise<UserDeliveryAddress> {
    const current = await this.fetchExisting(this.db, id);
    await enforce(access, Resource.USER_DELIVERY_ADDRESSES, Action.UPDATE, [current]);

    return this.db.transaction(async (tx) => {
      await tx.updateByKey('user_delivery_addresses', 'id', id, toAddressColumns(payload), UPDATABLE_COLUMNS);
      const updated = await this.fetchExisting(tx, id);
      if (payload.isPriority === true) await this.clearOtherPriorities(tx, updated);
      return updated;
    });
  }

  async delete(access: AccessContext, id: number): Promise<UserDeliveryAddress> {
    const current = await this.fetchExisting(this.db, id);
    await enforce(access, Resource.USER_DELIVERY_ADDRESSES, Action.DELETE, [current]);

    await this.db.sql`DELETE FROM user_delivery_addresses WHERE id = ${id}`;
    return current;
  }

  // `<=>` is MySQL's NULL-safe equality: a missing component only matches a missing component
  private async findIdentical(tx: SqlExecutor, payload: NewUserDeliveryAddress): Promise<UserDeliveryAddress | null> {
    const rows = await tx.sql<UserDeliveryAddressRow[]>`
      SELECT * FROM user_delivery_addresses
      WHERE user_id = ${payload.userId}
        AND country = ${payload.country}
        AND postal_code = ${payload.postalCode}
        AND administrative_area_level_1 <=> ${payload.administrativeAreaLevel1}
        AND administrative_area_level_2 <=> ${payload.administrativeAreaLevel2}
        AND locality <=> ${payload.locality}
        AND political <=> ${payload.political}
        AND route <=> ${payload.route}
        AND street_number <=> ${payload.streetNumber}
        AND address <=> ${payload.address}
      LIMIT 1`;
    return rows[0] ? UserDeliveryAddress.fromRow(rows[0]) : null;
  }

  private async clearOtherPriorities(tx: SqlExecutor, address: UserDeliveryAddress): Promise<void> {
    await tx.sql`
      UPDATE user_delivery_addresses SET is_priority = FALSE WHERE user_id = ${address.userId} AND id <> ${address.id}`;
  }

  private async fetchExisting(executor: SqlExecutor, id: number): Promise<UserDeliveryAddress> {
    const rows = await executor.sql<UserDeliveryAddressRow[]>`SELECT * FROM user_delivery_addresses WHERE id = ${id}`;
    if (!rows[0]) throw RepositoryError.notFound(`Delivery address ${id} not found`);
    return UserDeliveryAddress.fromRow(rows[0]);
  }
}
