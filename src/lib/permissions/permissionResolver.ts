/**
 * Permission Resolver
 *
 * Derives the effective permission set of a role or user and answers point
 * queries ("may X do action on resource"). Results are cached with a fixed
 * TTL. Any failure of the grant store or the user directory resolves to
 * "no permission": the empty result is cached for a short TTL so an outage
 * costs at most one retry interval before access is re-evaluated.
 *
 * Staleness: invalidateRole() drops the role's permission set, which also
 * retires the role-level point checks derived from it. A load that was in
 * flight when the role was invalidated is returned to its caller but not
 * cached. Per-user check results are not tracked back to roles and expire by
 * TTL.
 */

import type { Actor, ActorClaims } from "../auth/actor.js";
import { resolveActor } from "../auth/actor.js";
import {
  PermissionCache,
  rolePermissionsKey,
  roleCheckKey,
  userCheckKey,
  userRoleKey,
  type PermissionCheckEntry,
  type RolePermissionsEntry,
} from "../cache/permissionCache.js";
import { NotFoundError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { GrantStore, RoleGrant } from "../grants/grantStore.js";
import type { UserDirectory } from "../users/userDirectory.js";
import type { PermissionCatalog, PermissionDefinition } from "./permissionCatalog.js";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_CACHE_TTL_MS = 15 * 60 * 1000;
export const DEFAULT_FAILURE_TTL_MS = 60 * 1000;

export interface PermissionResolverOptions {
  catalog: PermissionCatalog;
  grants: GrantStore;
  users: UserDirectory;
  cache: PermissionCache;
  /** TTL of successfully computed entries (default 15 minutes) */
  ttlMs?: number;
  /** TTL of fail-closed entries (default 1 minute) */
  failureTtlMs?: number;
  /** Skip grants whose names are not registered instead of synthesizing them */
  strict?: boolean;
  logger?: Logger;
}

interface CheckOutcome {
  allowed: boolean;
  degraded: boolean;
}

const EMPTY_PERMISSIONS: readonly PermissionDefinition[] = Object.freeze([]);

// ============================================================================
// Permission Resolver Class
// ============================================================================

export class PermissionResolver {
  private readonly catalog: PermissionCatalog;
  private readonly grants: GrantStore;
  private readonly users: UserDirectory;
  private readonly cache: PermissionCache;
  private readonly ttlMs: number;
  private readonly failureTtlMs: number;
  private readonly strict: boolean;
  private readonly logger?: Logger;
  private readonly unsubscribe: () => void;
  /** Bumped on invalidation; loads started under an older value are not cached */
  private readonly roleGenerations = new Map<number, number>();
  private epoch = 0;

  constructor(options: PermissionResolverOptions) {
    this.catalog = options.catalog;
    this.grants = options.grants;
    this.users = options.users;
    this.cache = options.cache;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.failureTtlMs = options.failureTtlMs ?? DEFAULT_FAILURE_TTL_MS;
    this.strict = options.strict ?? false;
    this.logger = options.logger;

    // Grant mutations drop the role's cached permission set
    this.unsubscribe = this.grants.onChange((roleId) => this.invalidateRole(roleId));
  }

  /**
   * Effective permission set of a role. Never rejects.
   */
  async rolePermissions(roleId: number): Promise<readonly PermissionDefinition[]> {
    const entry = await this.loadRolePermissions(roleId);
    return entry.permissions;
  }

  /**
   * Whether a role holds (resource, action). Both are compared
   * case-insensitively. Never rejects.
   */
  async roleHasPermission(roleId: number, resource: string, action: string): Promise<boolean> {
    const check = normalizeCheck(resource, action);
    if (!check) return false;

    const outcome = await this.evaluateRole(roleId, check.resource, check.action);
    return outcome.allowed;
  }

  /**
   * Whether a user, through its role, holds (resource, action).
   * Users without a role, and unknown users, are denied. Never rejects.
   */
  async userHasPermission(userId: number, resource: string, action: string): Promise<boolean> {
    const check = normalizeCheck(resource, action);
    if (!check) return false;

    const key = userCheckKey(userId, check.resource, check.action);
    const cached = this.cache.permissionChecks.get(key);
    if (cached) return cached.allowed;

    let roleId: number | null;
    try {
      roleId = await this.lookupUserRole(userId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.cache.permissionChecks.set(key, { allowed: false }, this.ttlMs);
        return false;
      }
      this.logger?.warn({ err: error, userId }, "User lookup failed; denying permission check");
      this.cache.permissionChecks.set(key, { allowed: false }, this.failureTtlMs);
      return false;
    }

    if (roleId === null) {
      this.cache.permissionChecks.set(key, { allowed: false }, this.ttlMs);
      return false;
    }

    const outcome = await this.evaluateRole(roleId, check.resource, check.action);
    this.cache.permissionChecks.set(
      key,
      { allowed: outcome.allowed },
      outcome.degraded ? this.failureTtlMs : this.ttlMs
    );
    return outcome.allowed;
  }

  /**
   * Check using request claims: a role id in the claims is used directly,
   * otherwise the subject is looked up as a user.
   */
  async claimsHavePermission(claims: ActorClaims, resource: string, action: string): Promise<boolean> {
    const actor = resolveActor(claims);
    if (!actor) return false;
    return this.actorHasPermission(actor, resource, action);
  }

  async actorHasPermission(actor: Actor, resource: string, action: string): Promise<boolean> {
    switch (actor.kind) {
      case "role":
        return this.roleHasPermission(actor.roleId, resource, action);
      case "user":
        return this.userHasPermission(actor.userId, resource, action);
    }
  }

  /**
   * Effective permission set of a user; empty when the user has no role,
   * does not exist, or cannot be looked up. Never rejects.
   */
  async userPermissions(userId: number): Promise<readonly PermissionDefinition[]> {
    let roleId: number | null;
    try {
      roleId = await this.lookupUserRole(userId);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        this.logger?.warn({ err: error, userId }, "User lookup failed; returning no permissions");
      }
      return EMPTY_PERMISSIONS;
    }
    return roleId === null ? EMPTY_PERMISSIONS : this.rolePermissions(roleId);
  }

  /**
   * Drop the cached permission set of a role
   */
  invalidateRole(roleId: number): void {
    this.roleGenerations.set(roleId, (this.roleGenerations.get(roleId) ?? 0) + 1);
    if (this.cache.rolePermissions.delete(rolePermissionsKey(roleId))) {
      this.logger?.debug({ roleId }, "Invalidated role permissions");
    }
  }

  /**
   * Drop every cached entry. Best effort; correctness never depends on it.
   */
  invalidateAll(): void {
    this.epoch++;
    this.cache.clear();
  }

  /**
   * Stop listening to grant changes
   */
  dispose(): void {
    this.unsubscribe();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async evaluateRole(roleId: number, resource: string, action: string): Promise<CheckOutcome> {
    const key = roleCheckKey(roleId, resource, action);
    const cached = this.cache.permissionChecks.get(key);
    if (cached && this.isCurrent(roleId, cached)) {
      return { allowed: cached.allowed, degraded: cached.source?.degraded ?? false };
    }

    const source = await this.loadRolePermissions(roleId);
    const allowed = source.permissions.some(
      (p) => p.resource.toLowerCase() === resource && p.action.toLowerCase() === action
    );

    this.cache.permissionChecks.set(
      key,
      { allowed, source },
      source.degraded ? this.failureTtlMs : this.ttlMs
    );
    return { allowed, degraded: source.degraded };
  }

  /**
   * A role check is current while the permission set it was computed from is
   * still the cached one.
   */
  private isCurrent(roleId: number, entry: PermissionCheckEntry): boolean {
    return (
      entry.source !== undefined &&
      this.cache.rolePermissions.get(rolePermissionsKey(roleId)) === entry.source
    );
  }

  private async loadRolePermissions(roleId: number): Promise<RolePermissionsEntry> {
    const key = rolePermissionsKey(roleId);
    const cached = this.cache.rolePermissions.get(key);
    if (cached) return cached;

    const generation = this.roleGeneration(roleId);
    let grants: RoleGrant[];
    try {
      grants = await this.grants.listByRole(roleId);
    } catch (error) {
      this.logger?.warn({ err: error, roleId }, "Grant store unavailable; denying role permissions until retry");
      const entry: RolePermissionsEntry = { permissions: EMPTY_PERMISSIONS, degraded: true };
      if (this.roleGeneration(roleId) === generation) {
        this.cache.rolePermissions.set(key, entry, this.failureTtlMs);
      }
      return entry;
    }

    const entry: RolePermissionsEntry = {
      permissions: Object.freeze(this.toDefinitions(roleId, grants)),
      degraded: false,
    };
    if (this.roleGeneration(roleId) === generation) {
      this.cache.rolePermissions.set(key, entry, this.ttlMs);
    } else {
      this.logger?.debug({ roleId }, "Role invalidated during load; not caching permissions");
    }
    return entry;
  }

  private roleGeneration(roleId: number): number {
    return this.epoch + (this.roleGenerations.get(roleId) ?? 0);
  }

  /**
   * Map grant names through the catalog. Malformed names are skipped;
   * unregistered names are synthesized (or skipped in strict mode) and
   * reported.
   */
  private toDefinitions(roleId: number, grants: RoleGrant[]): PermissionDefinition[] {
    const definitions: PermissionDefinition[] = [];
    const seen = new Set<string>();

    for (const grant of grants) {
      const name = grant.permissionName;
      if (seen.has(name)) continue;
      seen.add(name);

      try {
        const definition = this.catalog.fromName(name, { strict: this.strict });
        if (!this.catalog.isValid(name)) {
          this.logger?.warn(
            { roleId, permissionName: name },
            "Role grant references a permission missing from the catalog"
          );
        }
        definitions.push(definition);
      } catch (error) {
        this.logger?.warn(
          { err: error, roleId, permissionName: name },
          "Skipping role grant with unusable permission name"
        );
      }
    }

    return definitions;
  }

  private async lookupUserRole(userId: number): Promise<number | null> {
    const key = userRoleKey(userId);
    const cached = this.cache.userRoles.get(key);
    if (cached !== undefined) return cached;

    const user = await this.users.lookupUser(userId);
    this.cache.userRoles.set(key, user.roleId, this.ttlMs);
    return user.roleId;
  }
}

/**
 * Lowercase the checked resource/action; null if either is empty. Whitespace
 * is kept, so padded input matches no grant.
 */
function normalizeCheck(resource: string, action: string): { resource: string; action: string } | null {
  const normalizedResource = resource.toLowerCase();
  const normalizedAction = action.toLowerCase();
  if (!normalizedResource || !normalizedAction) return null;
  return { resource: normalizedResource, action: normalizedAction };
}
