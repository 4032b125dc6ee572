/**
 * Permission Catalog
 *
 * Immutable registry of every valid (resource, action) permission. The
 * definitions ship with the program in catalog.json and only change through a
 * redeploy; grants stored in the database refer to them by canonical name
 * ("resource.action").
 */

import { z } from "zod";
import catalogData from "./catalog.json" with { type: "json" };
import { InvalidPermissionNameFormatError, UnknownPermissionError } from "../core/errors.js";

// ============================================================================
// Types
// ============================================================================

export interface PermissionDefinition {
  readonly resource: string;
  readonly action: string;
  readonly name: string;
  readonly description: string;
}

/**
 * Lowercase token used for resources and actions
 */
const TOKEN_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

export const PermissionDefinitionSchema = z
  .object({
    resource: z.string().regex(TOKEN_PATTERN, "resource must be a lowercase token"),
    action: z.string().regex(TOKEN_PATTERN, "action must be a lowercase token"),
    name: z.string(),
    description: z.string().min(1),
  })
  .refine((p) => p.name === `${p.resource}.${p.action}`, {
    message: "name must equal resource.action",
    path: ["name"],
  });

export const RoleTemplateSpecSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  permissions: z.array(z.string()).min(1),
});

export type RoleTemplateSpec = z.infer<typeof RoleTemplateSpecSchema>;

export const CatalogFileSchema = z.object({
  version: z.number().int().positive(),
  permissions: z.array(PermissionDefinitionSchema).min(1),
  templates: z.array(RoleTemplateSpecSchema),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export interface FromNameOptions {
  /** Reject well-formed names that are not registered instead of synthesizing them */
  strict?: boolean;
}

export interface NameValidationResult {
  valid: boolean;
  invalidNames: string[];
}

// ============================================================================
// Name parsing
// ============================================================================

/**
 * Split "resource.action" into its two segments.
 * Anything other than exactly two non-empty segments is malformed.
 */
export function parsePermissionName(name: string): { resource: string; action: string } {
  const parts = name.split(".");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new InvalidPermissionNameFormatError(name);
  }
  return { resource: parts[0], action: parts[1] };
}

export function formatPermissionName(resource: string, action: string): string {
  return `${resource}.${action}`;
}

// ============================================================================
// Permission Catalog Class
// ============================================================================

export class PermissionCatalog {
  private readonly definitions: readonly PermissionDefinition[];
  private readonly index: ReadonlyMap<string, PermissionDefinition>;

  constructor(definitions: Iterable<PermissionDefinition>) {
    const list: PermissionDefinition[] = [];
    const index = new Map<string, PermissionDefinition>();

    for (const definition of definitions) {
      const parsed = PermissionDefinitionSchema.parse(definition);
      if (index.has(parsed.name)) {
        throw new Error(`Duplicate permission in catalog: ${parsed.name}`);
      }
      const frozen: PermissionDefinition = Object.freeze({ ...parsed });
      list.push(frozen);
      index.set(frozen.name, frozen);
    }

    this.definitions = Object.freeze(list);
    this.index = index;
  }

  get size(): number {
    return this.definitions.length;
  }

  /**
   * All registered permissions in catalog order
   */
  allPermissions(): readonly PermissionDefinition[] {
    return this.definitions;
  }

  /**
   * Permissions grouped by resource, resources in order of first appearance
   */
  byResource(): Record<string, PermissionDefinition[]> {
    const groups: Record<string, PermissionDefinition[]> = {};
    for (const definition of this.definitions) {
      (groups[definition.resource] ??= []).push(definition);
    }
    return groups;
  }

  resources(): string[] {
    return Object.keys(this.byResource());
  }

  /**
   * Exact, case-sensitive membership test
   */
  isValid(name: string): boolean {
    return this.index.has(name);
  }

  get(name: string): PermissionDefinition | undefined {
    return this.index.get(name);
  }

  /**
   * Resolve a permission name to a definition.
   *
   * Registered names return the catalog entry. Well-formed names that are not
   * registered (renamed or retired permissions still present in grants) are
   * synthesized so they stay displayable, unless `strict` is set.
   */
  fromName(name: string, options: FromNameOptions = {}): PermissionDefinition {
    const registered = this.index.get(name);
    if (registered) return registered;

    const { resource, action } = parsePermissionName(name);
    if (options.strict) {
      throw new UnknownPermissionError(name);
    }

    return Object.freeze({
      resource,
      action,
      name,
      description: `Permission for ${action} action on ${resource} resource`,
    });
  }

  /**
   * Check a list of names against the catalog. Unknown names are reported
   * once each, in input order.
   */
  validateNames(names: readonly string[]): NameValidationResult {
    const invalidNames: string[] = [];
    for (const name of names) {
      if (!this.index.has(name) && !invalidNames.includes(name)) {
        invalidNames.push(name);
      }
    }
    return { valid: invalidNames.length === 0, invalidNames };
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let catalogFile: CatalogFile | null = null;
let catalogInstance: PermissionCatalog | null = null;

/**
 * Parse and validate the bundled catalog file
 */
export function loadCatalogFile(): CatalogFile {
  if (!catalogFile) {
    catalogFile = CatalogFileSchema.parse(catalogData);
  }
  return catalogFile;
}

/**
 * Get the catalog built from the bundled definitions
 */
export function getPermissionCatalog(): PermissionCatalog {
  if (!catalogInstance) {
    catalogInstance = new PermissionCatalog(loadCatalogFile().permissions);
  }
  return catalogInstance;
}
