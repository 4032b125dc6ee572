/**
 * Role Template Registry
 *
 * Named bundles of catalog permissions used to create roles in one step.
 * The shipped templates live in catalog.json next to the permissions they
 * reference and are checked against the catalog when the registry is built.
 */

import { InvalidPermissionSetError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { GrantStore } from '../grants/grantStore.js';
import {
  loadCatalogFile,
  type PermissionCatalog,
  type PermissionDefinition,
  type RoleTemplateSpec,
} from '../permissions/permissionCatalog.js';
import type { Role, RoleStore } from './roleStore.js';

// ============================================================================
// Types
// ============================================================================

export interface RoleTemplate {
  readonly name: string;
  readonly description: string;
  readonly permissions: readonly PermissionDefinition[];
}

export interface SeedResult {
  created: Role[];
  /** Template names whose role already existed */
  skipped: string[];
}

export interface RoleTemplateRegistryOptions {
  catalog: PermissionCatalog;
  roles: RoleStore;
  grants: GrantStore;
  /** Defaults to the templates shipped in catalog.json */
  templates?: readonly RoleTemplateSpec[];
  logger?: Logger;
}

// ============================================================================
// Role Template Registry Class
// ============================================================================

export class RoleTemplateRegistry {
  private readonly catalog: PermissionCatalog;
  private readonly roles: RoleStore;
  private readonly grants: GrantStore;
  private readonly templates: readonly RoleTemplate[];
  private readonly logger?: Logger;

  constructor(options: RoleTemplateRegistryOptions) {
    this.catalog = options.catalog;
    this.roles = options.roles;
    this.grants = options.grants;
    this.logger = options.logger;

    const specs = options.templates ?? loadCatalogFile().templates;
    this.templates = Object.freeze(specs.map((spec) => this.buildTemplate(spec)));
  }

  allTemplates(): readonly RoleTemplate[] {
    return this.templates;
  }

  /**
   * Case-insensitive template lookup
   */
  getTemplate(name: string): RoleTemplate | undefined {
    const wanted = name.toLowerCase();
    return this.templates.find((t) => t.name.toLowerCase() === wanted);
  }

  /**
   * Create a role and grant it every permission of the template.
   * If granting fails the role stays, with whatever grants were written.
   */
  async createRoleFromTemplate(template: RoleTemplate): Promise<Role> {
    const role = await this.roles.create(template.name, template.description);
    const granted = await this.grants.addMany(
      role.id,
      template.permissions.map((p) => p.name)
    );

    this.logger?.info(
      { roleId: role.id, roleName: role.name, granted },
      'Created role from template'
    );
    return role;
  }

  /**
   * Create a role from an ad-hoc permission list. Every name must be
   * registered; otherwise no role is created.
   */
  async createCustomRole(
    name: string,
    description: string,
    permissionNames: readonly string[]
  ): Promise<Role> {
    const validation = this.catalog.validateNames(permissionNames);
    if (!validation.valid) {
      throw new InvalidPermissionSetError(validation.invalidNames);
    }

    const permissions: PermissionDefinition[] = [];
    for (const permissionName of new Set(permissionNames)) {
      permissions.push(this.catalog.fromName(permissionName, { strict: true }));
    }

    return this.createRoleFromTemplate({ name, description, permissions });
  }

  /**
   * Create a role for every template whose name is not taken yet
   */
  async seedRoles(): Promise<SeedResult> {
    const result: SeedResult = { created: [], skipped: [] };

    for (const template of this.templates) {
      const existing = await this.roles.getByName(template.name);
      if (existing) {
        result.skipped.push(template.name);
        continue;
      }
      result.created.push(await this.createRoleFromTemplate(template));
    }

    if (result.created.length > 0) {
      this.logger?.info(
        { created: result.created.map((r) => r.name), skipped: result.skipped },
        'Seeded template roles'
      );
    }
    return result;
  }

  /**
   * Startup hook: fail fast on an empty catalog, then seed template roles
   */
  async initialize(): Promise<SeedResult> {
    if (this.catalog.size === 0) {
      throw new Error('Permission catalog is empty');
    }
    return this.seedRoles();
  }

  private buildTemplate(spec: RoleTemplateSpec): RoleTemplate {
    const validation = this.catalog.validateNames(spec.permissions);
    if (!validation.valid) {
      throw new Error(
        `Template '${spec.name}' references unknown permissions: ${validation.invalidNames.join(', ')}`
      );
    }

    return Object.freeze({
      name: spec.name,
      description: spec.description,
      permissions: Object.freeze(
        Array.from(new Set(spec.permissions), (name) => this.catalog.fromName(name, { strict: true }))
      ),
    });
  }
}
