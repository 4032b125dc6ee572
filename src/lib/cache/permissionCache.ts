/**
 * Permission Cache
 *
 * In-process, time-bounded cache shared by every resolver call. Entries are
 * immutable once written; invalidation removes them. There is no size bound:
 * the key space is limited to roles, users and catalog permissions.
 */

import type { PermissionDefinition } from "../permissions/permissionCatalog.js";

// =============================================================================
// TTL Cache
// =============================================================================

type CacheEntry<V> = {
  value: V;
  createdAt: number;
  expiresAt: number;
};

export type Clock = () => number;

/**
 * Map-backed cache with a TTL per entry. Expired entries are removed lazily
 * on read, or eagerly through prune().
 */
export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private now: Clock;

  constructor(now: Clock = Date.now) {
    this.now = now;
  }

  /**
   * Get a value. Returns undefined if absent or expired.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: V, ttlMs: number): void {
    const createdAt = this.now();
    this.entries.set(key, { value, createdAt, expiresAt: createdAt + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Remove every expired entry and return how many were dropped
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

// =============================================================================
// Resolver cache
// =============================================================================

/**
 * Permission set of a role. `degraded` marks the fail-closed empty set
 * written when the grant store could not be read.
 */
export interface RolePermissionsEntry {
  permissions: readonly PermissionDefinition[];
  degraded: boolean;
}

/**
 * Result of a point check. Role checks keep the permission set they were
 * derived from and are only served while that set is still the cached one.
 */
export interface PermissionCheckEntry {
  allowed: boolean;
  source?: RolePermissionsEntry;
}

export interface PermissionCacheStats {
  rolePermissions: number;
  permissionChecks: number;
  userRoles: number;
}

export class PermissionCache {
  readonly rolePermissions: TtlCache<RolePermissionsEntry>;
  readonly permissionChecks: TtlCache<PermissionCheckEntry>;
  /** user id -> role id; null for users without a role */
  readonly userRoles: TtlCache<number | null>;

  constructor(options: { now?: Clock } = {}) {
    const now = options.now ?? Date.now;
    this.rolePermissions = new TtlCache(now);
    this.permissionChecks = new TtlCache(now);
    this.userRoles = new TtlCache(now);
  }

  clear(): void {
    this.rolePermissions.clear();
    this.permissionChecks.clear();
    this.userRoles.clear();
  }

  prune(): number {
    return this.rolePermissions.prune() + this.permissionChecks.prune() + this.userRoles.prune();
  }

  stats(): PermissionCacheStats {
    return {
      rolePermissions: this.rolePermissions.size,
      permissionChecks: this.permissionChecks.size,
      userRoles: this.userRoles.size,
    };
  }
}

// =============================================================================
// Keys
// =============================================================================

export function rolePermissionsKey(roleId: number): string {
  return `role_permissions:${roleId}`;
}

// Tuples are JSON-encoded: resource and action may contain any character
export function roleCheckKey(roleId: number, resource: string, action: string): string {
  return JSON.stringify(["permission_check", "role", roleId, resource, action]);
}

export function userCheckKey(userId: number, resource: string, action: string): string {
  return JSON.stringify(["permission_check", "user", userId, resource, action]);
}

export function userRoleKey(userId: number): string {
  return `user:${userId}`;
}
