import type { RowDataPacket } from 'mysql2/promise';
import type { Scope, UserId } from '../authorization/authorization.types';
import { isOwnedScope, type ScopeCapability } from '../authorization/scope-capability';

/** Raw `user_delivery_addresses` row */
export interface UserDeliveryAddressRow extends RowDataPacket {
  id: number;
  user_id: number;
  administrative_area_level_1: string | null;
  administrative_area_level_2: string | null;
  country: string;
  locality: string | null;
  political: string | null;
  postal_code: string;
  route: string | null;
  street_number: string | null;
  address: string | null;
  is_priority: number;
}

/** Address components shared by the entity and the create payload */
export interface AddressFields {
  administrativeAreaLevel1: string | null;
  administrativeAreaLevel2: string | null;
  country: string;
  locality: string | null;
  political: string | null;
  postalCode: string;
  route: string | null;
  streetNumber: string | null;
  address: string | null;
}

/**
 * UserDeliveryAddress - Shipping address of a user; at most one per user is the priority address.
 */
export class UserDeliveryAddress implements AddressFields, ScopeCapability {
  readonly administrativeAreaLevel1: string | null;
  readonly administrativeAreaLevel2: string | null;
  readonly country: string;
  readonly locality: string | null;
  readonly political: string | null;
  readonly postalCode: string;
  readonly route: string | null;
  readonly streetNumber: string | null;
  readonly address: string | null;

  constructor(
    readonly id: number,
    readonly userId: UserId,
    fields: AddressFields,
    readonly isPriority: boolean
  ) {
    this.administrativeAreaLevel1 = fields.administrativeAreaLevel1;
    this.administrativeAreaLevel2 = fields.administrativeAreaLevel2;
    this.country = fields.country;
    this.locality = fields.locality;
    this.political = fields.political;
    this.postalCode = fields.postalCode;
    this.route = fields.route;
    this.streetNumber = fields.streetNumber;
    this.address = fields.address;
  }

  static fromRow(row: UserDeliveryAddressRow): UserDeliveryAddress {
    return new UserDeliveryAddress(
      row.id,
      row.user_id,
      {
        administrativeAreaLevel1: row.administrative_area_level_1,
        administrativeAreaLevel2: row.administrative_area_level_2,
        country: row.country,
        locality: row.locality,
        political: row.political,
        postalCode: row.postal_code,
        route: row.route,
        streetNumber: row.street_number,
        address: row.address
      },
      Boolean(row.is_priority)
    );
  }

  isInScope(scope: Scope, actingUserId: UserId): boolean {
    return isOwnedScope(scope, this.userId, actingUserId);
  }
}

export interface NewUserDeliveryAddress extends AddressFields {
  userId: UserId;
  isPriority: boolean;
}

export type UpdateUserDeliveryAddress = Partial<AddressFields> & { isPriority?: boolean };
