/**
 * Role Admin
 *
 * Administrative operations over roles and their grants. Unlike the
 * resolver, everything here validates its input and propagates errors to the
 * caller.
 */

import { InvalidPermissionSetError, NotFoundError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { GrantStore } from '../grants/grantStore.js';
import type {
  PermissionCatalog,
  PermissionDefinition,
} from '../permissions/permissionCatalog.js';
import type { PermissionResolver } from '../permissions/permissionResolver.js';
import type { Role, RoleStore } from './roleStore.js';

export interface RoleWithPermissions extends Role {
  permissions: readonly PermissionDefinition[];
}

export interface RoleAdminOptions {
  catalog: PermissionCatalog;
  roles: RoleStore;
  grants: GrantStore;
  resolver: PermissionResolver;
  logger?: Logger;
}

export class RoleAdmin {
  private readonly catalog: PermissionCatalog;
  private readonly roles: RoleStore;
  private readonly grants: GrantStore;
  private readonly resolver: PermissionResolver;
  private readonly logger?: Logger;

  constructor(options: RoleAdminOptions) {
    this.catalog = options.catalog;
    this.roles = options.roles;
    this.grants = options.grants;
    this.resolver = options.resolver;
    this.logger = options.logger;
  }

  async listRoles(): Promise<Role[]> {
    return this.roles.list();
  }

  async getRole(roleId: number): Promise<Role> {
    const role = await this.roles.get(roleId);
    if (!role) {
      throw new NotFoundError('role', roleId);
    }
    return role;
  }

  async getRoleByName(name: string): Promise<Role> {
    const role = await this.roles.getByName(name);
    if (!role) {
      throw new NotFoundError('role', name);
    }
    return role;
  }

  /**
   * Role plus its effective permissions as the resolver sees them
   */
  async getRoleWithPermissions(roleId: number): Promise<RoleWithPermissions> {
    const role = await this.getRole(roleId);
    const permissions = await this.resolver.rolePermissions(role.id);
    return { ...role, permissions };
  }

  /**
   * Grant one registered permission. Resolves false if it was already granted.
   */
  async assignPermission(roleId: number, permissionName: string): Promise<boolean> {
    await this.getRole(roleId);
    this.assertRegistered([permissionName]);

    const added = await this.grants.add(roleId, permissionName);
    this.logger?.info({ roleId, permissionName, added }, 'Assigned permission to role');
    return added;
  }

  /**
   * Grant several registered permissions. Resolves the number newly granted.
   */
  async assignPermissions(roleId: number, permissionNames: readonly string[]): Promise<number> {
    await this.getRole(roleId);
    this.assertRegistered(permissionNames);

    const written = await this.grants.addMany(roleId, permissionNames);
    this.logger?.info({ roleId, written }, 'Assigned permissions to role');
    return written;
  }

  /**
   * Remove a grant. Names are not checked against the catalog so stale
   * grants can still be cleaned up.
   */
  async revokePermission(roleId: number, permissionName: string): Promise<boolean> {
    await this.getRole(roleId);

    const removed = await this.grants.remove(roleId, permissionName);
    this.logger?.info({ roleId, permissionName, removed }, 'Revoked permission from role');
    return removed;
  }

  /**
   * Replace every grant of the role. All names are validated before anything
   * is written.
   */
  async replacePermissions(roleId: number, permissionNames: readonly string[]): Promise<number> {
    await this.getRole(roleId);
    this.assertRegistered(permissionNames);

    const written = await this.grants.replaceAll(roleId, permissionNames);
    this.logger?.info({ roleId, written }, 'Replaced role permissions');
    return written;
  }

  private assertRegistered(permissionNames: readonly string[]): void {
    const validation = this.catalog.validateNames(permissionNames);
    if (!validation.valid) {
      throw new InvalidPermissionSetError(validation.invalidNames);
    }
  }
}
