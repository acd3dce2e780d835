import type { RowDataPacket } from 'mysql2/promise';
import type { Scope, UserId } from '../authorization/authorization.types';
import { isOwnedScope, type ScopeCapability } from '../authorization/scope-capability';

export enum Gender {
  MALE = 'male',
  FEMALE = 'female',
  UNDEFINED = 'undefined'
}

const GENDERS: readonly Gender[] = [Gender.MALE, Gender.FEMALE, Gender.UNDEFINED];

function toGender(value: string | null): Gender {
  return GENDERS.find((gender) => gender === value) ?? Gender.UNDEFINED;
}

/** Raw `users` row as returned by mysql2 */
export interface UserRow extends RowDataPacket {
  id: number;
  email: string;
  email_verified: number;
  phone: string | null;
  phone_verified: number;
  is_active: number;
  is_blocked: number;
  first_name: string | null;
  last_name: string | null;
  middle_name: string | null;
  gender: string | null;
  birthdate: string | null;
  avatar: string | null;
  last_login_at: Date;
  created_at: Date;
  updated_at: Date;
}

export interface UserProps {
  id: UserId;
  email: string;
  emailVerified: boolean;
  phone: string | null;
  phoneVerified: boolean;
  isActive: boolean;
  isBlocked: boolean;
  firstName: string | null;
  lastName: string | null;
  middleName: string | null;
  gender: Gender;
  birthdate: string | null;
  avatar: string | null;
  lastLoginAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * User - Account record. A user owns itself: OWNED scope holds only for the acting user's own row.
 */
export class User implements UserProps, ScopeCapability {
  readonly id: UserId;
  readonly email: string;
  readonly emailVerified: boolean;
  readonly phone: string | null;
  readonly phoneVerified: boolean;
  readonly isActive: boolean;
  readonly isBlocked: boolean;
  readonly firstName: string | null;
  readonly lastName: string | null;
  readonly middleName: string | null;
  readonly gender: Gender;
  readonly birthdate: string | null;
  readonly avatar: string | null;
  readonly lastLoginAt: Date;
  readonly createdAt: Date;
  readonly updatedAt: Date;

  constructor(props: UserProps) {
    this.id = props.id;
    this.email = props.email;
    this.emailVerified = props.emailVerified;
    this.phone = props.phone;
    this.phoneVerified = props.phoneVerified;
    this.isActive = props.isActive;
    this.isBlocked = props.isBlocked;
    this.firstName = props.firstName;
    this.lastName = props.lastName;
    this.middleName = props.middleName;
    this.gender = props.gender;
    this.birthdate = props.birthdate;
    this.avatar = props.avatar;
    this.lastLoginAt = props.lastLoginAt;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
  }

  static fromRow(row: UserRow): User {
    return new User({
      id: row.id,
      email: row.email,
      emailVerified: Boolean(row.email_verified),
      phone: row.phone,
      phoneVerified: Boolean(row.phone_verified),
      isActive: Boolean(row.is_active),
      isBlocked: Boolean(row.is_blocked),
      firstName: row.first_name,
      lastName: row.last_name,
      middleName: row.middle_name,
      gender: toGender(row.gender),
      birthdate: row.birthdate,
      avatar: row.avatar,
      lastLoginAt: row.last_login_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    });
  }

  isInScope(scope: Scope, actingUserId: UserId): boolean {
    return isOwnedScope(scope, this.id, actingUserId);
  }
}

/** Fields accepted when registering a user */
export interface NewUser {
  email: string;
  phone?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  middleName?: string | null;
  gender?: Gender;
  birthdate?: string | null;
}

/** Partial profile update; undefined fields are left unchanged */
export interface UpdateUser {
  phone?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  middleName?: string | null;
  gender?: Gender;
  birthdate?: string | null;
  avatar?: string | null;
  isActive?: boolean;
  emailVerified?: boolean;
}

/** Filters of a user search; absent terms match everything */
export interface UserSearchTerms {
  email?: string;
  phone?: string;
  firstName?: string;
  lastName?: string;
  isBlocked?: boolean;
}
