import { AuthorizationDeniedError } from '../../src/authorization/authorization.errors';
import type { NewUserDeliveryAddress } from '../../src/delivery-addresses/user-delivery-address.entity';
import { UserDeliveryAddressesRepository } from '../../src/delivery-addresses/user-delivery-addresses.repository';
import { asSuperuser, asUser } from '../support/access';
import { FakeDatabase } from '../support/fake-database';
import { addressRow } from '../support/rows';

const SELECT_BY_ID = /^SELECT \* FROM user_delivery_addresses WHERE id = \?$/;
const SELECT_IDENTICAL = /^SELECT \* FROM user_delivery_addresses WHERE user_id = \? AND country/;
const CLEAR_PRIORITY = 'UPDATE user_delivery_addresses SET is_priority = FALSE WHERE user_id = ? AND id <> ?';

function newAddress(overrides: Partial<NewUserDeliveryAddress> = {}): NewUserDeliveryAddress {
  return {
    userId: 5,
    administrativeAreaLevel1: null,
    administrativeAreaLevel2: null,
    country: 'NL',
    locality: 'Amsterdam',
    political: null,
    postalCode: '1011AB',
    route: null,
    streetNumber: null,
    address: null,
    isPriority: false,
    ...overrides
  };
}

describe('UserDeliveryAddressesRepository', () => {
  describe('listForUser', () => {
    it('orders newest first and maps rows', async () => {
      const db = new FakeDatabase().on(/^SELECT \* FROM user_delivery_addresses WHERE user_id = \? ORDER BY/, () => [
        addressRow(3, 5, { is_priority: 1 }),
        addressRow(1, 5)
      ]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      const addresses = await repo.listForUser(asUser(5), 5);

      expect(db.queries[0].sql).toBe('SELECT * FROM user_delivery_addresses WHERE user_id = ? ORDER BY id DESC');
      expect(addresses.map((address) => [address.id, address.isPriority])).toEqual([
        [3, true],
        [1, false]
      ]);
    });

    it("denies reading another user's addresses", async () => {
      const db = new FakeDatabase().on(/^SELECT \* FROM user_delivery_addresses WHERE user_id/, () => [addressRow(1, 5)]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      await expect(repo.listForUser(asUser(6), 5)).rejects.toBeInstanceOf(AuthorizationDeniedError);
    });
  });

  describe('create', () => {
    it('returns the identical existing address without inserting', async () => {
      const db = new FakeDatabase().on(SELECT_IDENTICAL, () => [addressRow(4, 5)]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      const address = await repo.create(asUser(5), newAddress());

      expect(address.id).toBe(4);
      expect(db.statements('INSERT')).toEqual([]);
      expect(db.queries[0].params).toEqual([5, 'NL', '1011AB', null, null, 'Amsterdam', null, null, null, null]);
    });

    it('inserts a new address and clears other priorities when it is the priority one', async () => {
      const db = new FakeDatabase()
        .on(/^INSERT INTO user_delivery_addresses/, () => ({ insertId: 8 }))
        .on(SELECT_BY_ID, () => [addressRow(8, 5, { is_priority: 1 })]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      const address = await repo.create(asUser(5), newAddress({ isPriority: true }));

      expect(address.isPriority).toBe(true);
      expect(db.statements('UPDATE')).toEqual([{ sql: CLEAR_PRIORITY, params: [5, 8] }]);
      expect(db.committed).toBe(1);
    });

    it('leaves other addresses alone for a non-priority address', async () => {
      const db = new FakeDatabase()
        .on(/^INSERT INTO user_delivery_addresses/, () => ({ insertId: 8 }))
        .on(SELECT_BY_ID, () => [addressRow(8, 5)]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      await repo.create(asUser(5), newAddress());

      expect(db.statements('UPDATE')).toEqual([]);
    });

    it('rolls back an address created for somebody else', async () => {
      const db = new FakeDatabase()
        .on(/^INSERT INTO user_delivery_addresses/, () => ({ insertId: 8 }))
        .on(SELECT_BY_ID, () => [addressRow(8, 7, { is_priority: 1 })]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      await expect(repo.create(asUser(5), newAddress({ userId: 7, isPriority: true }))).rejects.toBeInstanceOf(
        AuthorizationDeniedError
      );
      expect(db.rolledBack).toBe(1);
      expect(db.statements('UPDATE')).toEqual([]);
    });
  });

  describe('update', () => {
    it('updates an owned address and moves the priority flag to it', async () => {
      const db = new FakeDatabase().on(SELECT_BY_ID, () => [addressRow(3, 5, { is_priority: 1 })]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      await repo.update(asUser(5), 3, { postalCode: '1012CD', isPriority: true });

      expect(db.statements('UPDATE')).toEqual([
        {
          sql: 'UPDATE `user_delivery_addresses` SET `postal_code` = ?, `is_priority` = ? WHERE `id` = ?',
          params: ['1012CD', true, 3]
        },
        { sql: CLEAR_PRIORITY, params: [5, 3] }
      ]);
    });

    it("refuses to touch another user's address", async () => {
      const db = new FakeDatabase().on(SELECT_BY_ID, () => [addressRow(3, 5)]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      await expect(repo.update(asUser(6), 3, { country: 'BE' })).rejects.toBeInstanceOf(AuthorizationDeniedError);
      expect(db.statements('UPDATE')).toEqual([]);
    });
  });

  describe('delete', () => {
    it('deletes as superuser', async () => {
      const db = new FakeDatabase().on(SELECT_BY_ID, () => [addressRow(3, 5)]);
      const repo = new UserDeliveryAddressesRepository(db.asService());

      await expect(repo.delete(asSuperuser(1), 3)).resolves.toMatchObject({ id: 3, userId: 5 });
      expect(db.statements('DELETE')).toEqual([{ sql: 'DELETE FROM user_delivery_addresses WHERE id = ?', params: [3] }]);
    });

    it('reports a missing address as not_found', async () => {
      const repo = new UserDeliveryAddressesRepository(new FakeDatabase().asService());
      await expect(repo.delete(asSuperuser(1), 3)).rejects.toMatchObject({
        kind: 'not_found',
        message: 'Delivery address 3 not found'
      });
    });
  });
});
