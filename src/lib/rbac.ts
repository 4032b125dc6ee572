/**
 * RBAC composition root
 *
 * Wires the catalog, stores, cache, resolver, template registry, role admin
 * and gate into one object. The server and the CLI share it through getRbac().
 */

import { config } from "./config.js";
import { AuthorizationGate } from "./auth/authorizationGate.js";
import { PermissionCache } from "./cache/permissionCache.js";
import type { Logger } from "./core/logger.js";
import { SqliteGrantStore, type GrantStore } from "./grants/grantStore.js";
import { getPermissionCatalog, type PermissionCatalog } from "./permissions/permissionCatalog.js";
import { PermissionResolver } from "./permissions/permissionResolver.js";
import { RoleAdmin } from "./roles/roleAdmin.js";
import { SqliteRoleStore, type RoleStore } from "./roles/roleStore.js";
import { RoleTemplateRegistry } from "./roles/roleTemplates.js";
import { SqliteUserDirectory, type UserDirectory } from "./users/userDirectory.js";

export interface RbacOptions {
  catalog?: PermissionCatalog;
  roles?: RoleStore;
  grants?: GrantStore;
  users?: UserDirectory;
  cache?: PermissionCache;
  ttlMs?: number;
  failureTtlMs?: number;
  strict?: boolean;
  logger?: Logger;
}

export interface Rbac {
  catalog: PermissionCatalog;
  roles: RoleStore;
  grants: GrantStore;
  users: UserDirectory;
  cache: PermissionCache;
  resolver: PermissionResolver;
  templates: RoleTemplateRegistry;
  admin: RoleAdmin;
  gate: AuthorizationGate;
}

/**
 * Build an engine. Anything not supplied falls back to the SQLite stores and
 * the values in config.
 */
export function createRbac(options: RbacOptions = {}): Rbac {
  const catalog = options.catalog ?? getPermissionCatalog();
  const roles = options.roles ?? new SqliteRoleStore();
  const grants = options.grants ?? new SqliteGrantStore();
  const users = options.users ?? new SqliteUserDirectory();
  const cache = options.cache ?? new PermissionCache();
  const logger = options.logger;

  const resolver = new PermissionResolver({
    catalog,
    grants,
    users,
    cache,
    ttlMs: options.ttlMs ?? config.cacheTtlMs,
    failureTtlMs: options.failureTtlMs ?? config.failureTtlMs,
    strict: options.strict ?? config.strictPermissions,
    logger,
  });

  return {
    catalog,
    roles,
    grants,
    users,
    cache,
    resolver,
    templates: new RoleTemplateRegistry({ catalog, roles, grants, logger }),
    admin: new RoleAdmin({ catalog, roles, grants, resolver, logger }),
    gate: new AuthorizationGate({ resolver, logger }),
  };
}

// ============================================================================
// Singleton Instance
// ============================================================================

let rbacInstance: Rbac | null = null;

export function getRbac(options?: RbacOptions): Rbac {
  if (!rbacInstance) {
    rbacInstance = createRbac(options);
  }
  return rbacInstance;
}

export function resetRbac(): void {
  rbacInstance?.resolver.dispose();
  rbacInstance = null;
}

export type { Actor, ActorClaims } from "./auth/actor.js";
export type { PermissionDefinition } from "./permissions/permissionCatalog.js";
export type { Role } from "./roles/roleStore.js";
export type { RoleTemplate } from "./roles/roleTemplates.js";
