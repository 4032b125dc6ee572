/**
 * Role Admin Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RoleAdmin } from './roleAdmin.js';
import { SqliteRoleStore } from './roleStore.js';
import { SqliteGrantStore } from '../grants/grantStore.js';
import { PermissionResolver } from '../permissions/permissionResolver.js';
import { getPermissionCatalog } from '../permissions/permissionCatalog.js';
import { PermissionCache } from '../cache/permissionCache.js';
import { SqliteUserDirectory } from '../users/userDirectory.js';
import { initDatabase, closeDatabase } from '../core/db.js';
import { NotFoundError } from '../core/errors.js';

describe('RoleAdmin', () => {
  let roles: SqliteRoleStore;
  let grants: SqliteGrantStore;
  let resolver: PermissionResolver;
  let admin: RoleAdmin;
  let roleId: number;

  beforeEach(async () => {
    process.env.PERMGATE_DB_PATH = ':memory:';
    initDatabase();
    roles = new SqliteRoleStore();
    grants = new SqliteGrantStore();
    resolver = new PermissionResolver({
      catalog: getPermissionCatalog(),
      grants,
      users: new SqliteUserDirectory(),
      cache: new PermissionCache(),
    });
    admin = new RoleAdmin({ catalog: getPermissionCatalog(), roles, grants, resolver });
    roleId = (await roles.create('Editor', 'Edits games')).id;
  });

  afterEach(() => {
    resolver.dispose();
    closeDatabase();
    delete process.env.PERMGATE_DB_PATH;
  });

  async function grantedNames(): Promise<string[]> {
    return (await grants.listByRole(roleId)).map((g) => g.permissionName);
  }

  describe('lookups', () => {
    it('should list roles by name', async () => {
      await roles.create('Auditor', '');

      expect((await admin.listRoles()).map((r) => r.name)).toEqual(['Auditor', 'Editor']);
    });

    it('should get a role by id', async () => {
      expect(await admin.getRole(roleId)).toEqual({ id: roleId, name: 'Editor', description: 'Edits games' });
    });

    it('should get a role by name ignoring case', async () => {
      expect((await admin.getRoleByName('EDITOR')).id).toBe(roleId);
    });

    it('should reject unknown roles', async () => {
      await expect(admin.getRole(999)).rejects.toBeInstanceOf(NotFoundError);
      await expect(admin.getRoleByName('Nobody')).rejects.toMatchObject({
        code: 'not_found',
        entity: 'role',
        entityId: 'Nobody',
      });
    });

    it('should include effective permissions', async () => {
      await grants.add(roleId, 'games.update');

      const role = await admin.getRoleWithPermissions(roleId);

      expect(role.name).toBe('Editor');
      expect(role.permissions.map((p) => p.name)).toEqual(['games.update']);
    });
  });

  describe('assignPermission', () => {
    it('should grant a registered permission once', async () => {
      expect(await admin.assignPermission(roleId, 'games.update')).toBe(true);
      expect(await admin.assignPermission(roleId, 'games.update')).toBe(false);
      expect(await grantedNames()).toEqual(['games.update']);
    });

    it('should reject unregistered names', async () => {
      await expect(admin.assignPermission(roleId, 'games.fly')).rejects.toMatchObject({
        code: 'invalid_permission_set',
        invalidNames: ['games.fly'],
      });
      expect(await grantedNames()).toEqual([]);
    });

    it('should reject unknown roles', async () => {
      await expect(admin.assignPermission(999, 'games.read')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should be reflected by the resolver immediately', async () => {
      expect(await resolver.roleHasPermission(roleId, 'games', 'update')).toBe(false);

      await admin.assignPermission(roleId, 'games.update');

      expect(await resolver.roleHasPermission(roleId, 'games', 'update')).toBe(true);
    });
  });

  describe('assignPermissions', () => {
    it('should report the number of new grants', async () => {
      await admin.assignPermission(roleId, 'games.read');

      expect(await admin.assignPermissions(roleId, ['games.read', 'games.update'])).toBe(1);
    });

    it('should write nothing if any name is invalid', async () => {
      await expect(
        admin.assignPermissions(roleId, ['games.read', 'bogus!!name'])
      ).rejects.toMatchObject({ invalidNames: ['bogus!!name'] });
      expect(await grantedNames()).toEqual([]);
    });
  });

  describe('revokePermission', () => {
    it('should remove the grant and update the resolver', async () => {
      await admin.assignPermission(roleId, 'games.read');
      expect(await resolver.roleHasPermission(roleId, 'games', 'read')).toBe(true);

      expect(await admin.revokePermission(roleId, 'games.read')).toBe(true);

      expect(await resolver.roleHasPermission(roleId, 'games', 'read')).toBe(false);
    });

    it('should remove grants that are no longer in the catalog', async () => {
      await grants.add(roleId, 'games.archive');

      expect(await admin.revokePermission(roleId, 'games.archive')).toBe(true);
      expect(await grantedNames()).toEqual([]);
    });
  });

  describe('replacePermissions', () => {
    it('should replace every grant', async () => {
      await admin.assignPermissions(roleId, ['games.read', 'games.update']);

      expect(await admin.replacePermissions(roleId, ['orders.read', 'orders.read'])).toBe(1);
      expect(await grantedNames()).toEqual(['orders.read']);
    });

    it('should keep existing grants when validation fails', async () => {
      await admin.assignPermission(roleId, 'games.read');

      await expect(admin.replacePermissions(roleId, ['orders.fly'])).rejects.toMatchObject({
        code: 'invalid_permission_set',
      });
      expect(await grantedNames()).toEqual(['games.read']);
    });
  });
});
