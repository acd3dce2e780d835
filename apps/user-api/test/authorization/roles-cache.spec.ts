import { Role, type UserId } from '../../src/authorization/authorization.types';
import { RolesCache, type RoleStore } from '../../src/authorization/roles-cache';
import { StubRoleStore } from '../support/stub-role-store';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('RolesCache', () => {
  it('hits the store once per user until invalidated', async () => {
    const store = new StubRoleStore(new Map([[1, [Role.USER]]]));
    const cache = new RolesCache(store);

    await expect(cache.get(1)).resolves.toEqual([Role.USER]);
    await expect(cache.get(1)).resolves.toEqual([Role.USER]);

    expect(store.callsFor(1)).toBe(1);
    expect(cache.has(1)).toBe(true);
  });

  it('caches an empty role list', async () => {
    const store = new StubRoleStore();
    const cache = new RolesCache(store);

    await cache.get(7);
    await cache.get(7);

    expect(store.callsFor(7)).toBe(1);
  });

  it('goes back to the store exactly once after remove()', async () => {
    const store = new StubRoleStore(new Map([[1, [Role.USER]]]));
    const cache = new RolesCache(store);
    await cache.get(1);

    store.set(1, [Role.USER, Role.SUPERUSER]);
    cache.remove(1);

    await expect(cache.get(1)).resolves.toEqual([Role.USER, Role.SUPERUSER]);
    await cache.get(1);
    expect(store.callsFor(1)).toBe(2);
  });

  it('remove() only affects the given user', async () => {
    const store = new StubRoleStore(new Map([[1, [Role.USER]], [2, [Role.SUPERUSER]]]));
    const cache = new RolesCache(store);
    await cache.get(1);
    await cache.get(2);

    cache.remove(1);

    expect(cache.has(1)).toBe(false);
    expect(cache.has(2)).toBe(true);
  });

  it('clear() empties every entry', async () => {
    const store = new StubRoleStore(new Map([[1, [Role.USER]], [2, [Role.SUPERUSER]]]));
    const cache = new RolesCache(store);
    await cache.get(1);
    await cache.get(2);

    cache.clear();

    expect(cache.size).toBe(0);
    await cache.get(2);
    expect(store.callsFor(2)).toBe(2);
  });

  it('does not cache a failed lookup', async () => {
    const store = new StubRoleStore(new Map([[1, [Role.USER]]]));
    store.fail = new Error('connection refused');
    const cache = new RolesCache(store);

    await expect(cache.get(1)).rejects.toThrow('connection refused');
    expect(cache.has(1)).toBe(false);

    store.fail = undefined;
    await expect(cache.get(1)).resolves.toEqual([Role.USER]);
    expect(store.callsFor(1)).toBe(2);
  });

  it('hands out copies that cannot alter the cached entry', async () => {
    const cache = new RolesCache(new StubRoleStore(new Map([[1, [Role.USER]]])));

    const first = await cache.get(1);
    first.push(Role.SUPERUSER);

    await expect(cache.get(1)).resolves.toEqual([Role.USER]);
  });

  it('drops the answer of a lookup that was in flight during remove()', async () => {
    const pending = deferred<Role[]>();
    const store: RoleStore = { listRolesForUser: jest.fn(() => pending.promise) };
    const cache = new RolesCache(store);

    const inFlight = cache.get(3);
    cache.remove(3);
    pending.resolve([Role.SUPERUSER]);

    await expect(inFlight).resolves.toEqual([Role.SUPERUSER]);
    expect(cache.has(3)).toBe(false);
  });

  it('drops the answer of a lookup that was in flight during clear()', async () => {
    const pending = deferred<Role[]>();
    const store: RoleStore = { listRolesForUser: jest.fn(() => pending.promise) };
    const cache = new RolesCache(store);

    const inFlight = cache.get(3);
    cache.clear();
    pending.resolve([Role.USER]);
    await inFlight;

    expect(cache.has(3)).toBe(false);
  });

  it('keeps serving a lookup that started after remove() interrupted an earlier one', async () => {
    const first = deferred<Role[]>();
    const second = deferred<Role[]>();
    const store: RoleStore = {
      listRolesForUser: jest.fn().mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise)
    };
    const cache = new RolesCache(store);

    const stale = cache.get(3);
    cache.remove(3);
    const fresh = cache.get(3);
    second.resolve([Role.SUPERUSER]);
    await fresh;
    first.resolve([Role.USER]);
    await stale;

    await expect(cache.get(3)).resolves.toEqual([Role.SUPERUSER]);
    expect(store.listRolesForUser).toHaveBeenCalledTimes(2);
  });

  it('tracks only users with a lookup in flight', async () => {
    const pending = deferred<Role[]>();
    const store: RoleStore = { listRolesForUser: jest.fn(() => pending.promise) };
    const cache = new RolesCache(store);

    const inFlight = cache.get(3);
    expect(cache.pendingLookups).toBe(1);
    pending.resolve([Role.USER]);
    await inFlight;
    expect(cache.pendingLookups).toBe(0);

    for (let userId = 10; userId < 20; userId++) {
      cache.remove(userId);
    }
    expect(cache.pendingLookups).toBe(0);
  });

  it('stops tracking a user whose lookup failed', async () => {
    const store = new StubRoleStore();
    store.fail = new Error('connection refused');
    const cache = new RolesCache(store);

    await expect(cache.get(1)).rejects.toThrow('connection refused');
    expect(cache.pendingLookups).toBe(0);
  });

  it('reports misses and invalidations to the observer', async () => {
    const misses: UserId[] = [];
    const invalidations: Array<UserId | 'all'> = [];
    const cache = new RolesCache(new StubRoleStore(), {
      onMiss: (userId) => misses.push(userId),
      onInvalidate: (userId) => invalidations.push(userId)
    });

    await cache.get(4);
    await cache.get(4);
    cache.remove(4);
    cache.clear();

    expect(misses).toEqual([4]);
    expect(invalidations).toEqual([4, 'all']);
  });
});
