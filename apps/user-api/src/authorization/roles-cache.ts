import type { Role, UserId } from './authorization.types';

/**
 * RoleStore - Source of truth for the roles a user holds.
 * Must reject (never resolve to an empty list) when the lookup fails.
 */
export interface RoleStore {
  listRolesForUser(userId: UserId): Promise<Role[]>;
}

/**
 * Optional hooks for cache diagnostics
 */
export interface RolesCacheObserver {
  onMiss?(userId: UserId): void;
  onInvalidate?(userId: UserId | 'all'): void;
}

/** Store lookups for one user that are still awaiting an answer */
interface PendingLookups {
  count: number;
  invalidated: boolean;
}

/**
 * RolesCache - Per-process cache of resolved user roles in front of the RoleStore.
 *
 * Map reads and writes are synchronous, so the event loop already gives them
 * mutual exclusion; the store call is awaited outside of any map access and its
 * answer is written back afterwards. Concurrent misses for the same user may both
 * hit the store and both write the same answer.
 *
 * remove()/clear() mark the lookups in flight at that moment as invalidated. Their
 * answers are not written back, so a later get() goes to the store again instead of
 * reading pre-mutation roles. Only users with a lookup in flight are tracked.
 */
export class RolesCache {
  private readonly entries = new Map<UserId, readonly Role[]>();
  private readonly pending = new Map<UserId, PendingLookups>();

  constructor(
    private readonly store: RoleStore,
    private readonly observer: RolesCacheObserver = {}
  ) {}

  /**
   * Cached roles for a user, fetched from the store on a miss.
   * Store failures propagate and leave the entry absent.
   */
  async get(userId: UserId): Promise<Role[]> {
    const cached = this.entries.get(userId);
    if (cached) return [...cached];

    this.observer.onMiss?.(userId);
    const lookups = this.track(userId);

    let roles: Role[];
    try {
      roles = await this.store.listRolesForUser(userId);
    } finally {
      this.untrack(userId, lookups);
    }

    if (!lookups.invalidated) {
      this.entries.set(userId, Object.freeze([...roles]));
    }
    return [...roles];
  }

  /**
   * Drop one user's entry. Call after a role assignment of that user was
   * successfully created or deleted.
   */
  remove(userId: UserId): void {
    this.entries.delete(userId);
    const lookups = this.pending.get(userId);
    if (lookups) {
      lookups.invalidated = true;
      this.pending.delete(userId);
    }
    this.observer.onInvalidate?.(userId);
  }

  /** Drop every entry (administrative reset) */
  clear(): void {
    this.entries.clear();
    for (const lookups of this.pending.values()) {
      lookups.invalidated = true;
    }
    this.pending.clear();
    this.observer.onInvalidate?.('all');
  }

  has(userId: UserId): boolean {
    return this.entries.has(userId);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Users with a store lookup in flight */
  get pendingLookups(): number {
    return this.pending.size;
  }

  private track(userId: UserId): PendingLookups {
    const lookups = this.pending.get(userId) ?? { count: 0, invalidated: false };
    lookups.count += 1;
    this.pending.set(userId, lookups);
    return lookups;
  }

  private untrack(userId: UserId, lookups: PendingLookups): void {
    lookups.count -= 1;
    if (lookups.count === 0 && this.pending.get(userId) === lookups) {
      this.pending.delete(userId);
    }
  }
}
