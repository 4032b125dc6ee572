/**
 * permgate HTTP surface
 *
 * Administrative API over the permission catalog, role grants and templates.
 * Every /api route except /api/me/permissions is guarded by a catalog
 * permission checked through the authorization gate.
 */

import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";
import { v7 as uuidv7 } from "uuid";
import { config } from "../lib/config.js";
import { initDatabase, getDatabaseStats } from "../lib/core/db.js";
import { isRbacError, InvalidPermissionSetError, type RbacErrorCode } from "../lib/core/errors.js";
import { resolveActor, type ActorClaims } from "../lib/auth/actor.js";
import {
  claimsFromHeaders,
  TokenAuthError,
  type TokenVerificationOptions,
} from "../lib/auth/tokenClaims.js";
import { getRbac, type Rbac } from "../lib/rbac.js";
import { formatPermissionName } from "../lib/permissions/permissionCatalog.js";
import type { RoleTemplate } from "../lib/roles/roleTemplates.js";

declare module "fastify" {
  interface FastifyRequest {
    requestId: string;
    claims: ActorClaims | null;
  }
}

export interface BuildAppOptions {
  /** Defaults to the shared engine from getRbac() */
  rbac?: Rbac;
  logger?: boolean;
  /** Create template roles when the server becomes ready */
  seedRoles?: boolean;
  /** Defaults to the PERMGATE_JWT_* settings */
  tokenOptions?: TokenVerificationOptions;
}

const STATUS_BY_CODE: Record<RbacErrorCode, number> = {
  unknown_permission: 400,
  invalid_permission_name_format: 400,
  invalid_permission_set: 400,
  not_found: 404,
  role_exists: 409,
  backing_store_unavailable: 503,
};

const RoleParamsSchema = z.object({
  roleId: z.coerce.number().int().positive(),
});

const RoleIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const RolePermissionParamsSchema = RoleParamsSchema.extend({
  permissionName: z.string().min(1),
});

const UserParamsSchema = z.object({
  userId: z.coerce.number().int().positive(),
});

const PermissionListQuerySchema = z.object({
  resource: z.string().min(1).optional(),
});

const PermissionCheckQuerySchema = z.object({
  resource: z.string().trim().min(1),
  action: z.string().trim().min(1),
});

const ReplacePermissionsSchema = z.object({
  permissions: z.array(z.string()),
});

const CreateRoleSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(""),
  permissions: z.array(z.string()).min(1),
});

const CreateRoleFromTemplateSchema = z.object({
  template: z.string().min(1),
});

function templateView(template: RoleTemplate) {
  return {
    name: template.name,
    description: template.description,
    permissions: template.permissions.map((p) => p.name),
  };
}

export function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  // Initialize database
  try {
    initDatabase();
    app.log.info("Database initialized");
  } catch (err) {
    app.log.error({ err }, "Failed to initialize database");
  }

  const rbac = options.rbac ?? getRbac({ logger: app.log });
  const tokenOptions = options.tokenOptions;

  app.decorateRequest("requestId", "");
  app.decorateRequest("claims", null);

  // ============================================================================
  // Request ID Hook - every request gets an id for log correlation
  // ============================================================================
  app.addHook("onRequest", async (request, reply) => {
    const existing = request.headers["x-request-id"];
    request.requestId = typeof existing === "string" ? existing : uuidv7();
    reply.header("x-request-id", request.requestId);
  });

  // ============================================================================
  // Startup and cache maintenance
  // ============================================================================
  let pruneTimer: NodeJS.Timeout | undefined;

  app.addHook("onReady", async () => {
    if (options.seedRoles ?? config.seedRolesOnStartup) {
      await rbac.templates.initialize();
    }
    pruneTimer = setInterval(() => {
      const removed = rbac.cache.prune();
      if (removed > 0) {
        app.log.debug({ removed }, "Pruned expired permission cache entries");
      }
    }, config.cacheTtlMs);
    pruneTimer.unref();
  });

  app.addHook("onClose", async () => {
    clearInterval(pruneTimer);
  });

  // ============================================================================
  // Error mapping
  // ============================================================================
  app.setErrorHandler((error, request, reply) => {
    if (isRbacError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        request.log.error({ err: error }, "Backing store unavailable");
      }
      return reply.status(status).send({
        error: error.message,
        code: error.code,
        ...(error instanceof InvalidPermissionSetError ? { invalid_names: error.invalidNames } : {}),
      });
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error }, "Request failed");
      return reply.status(status).send({ error: "Internal server error" });
    }
    return reply.status(status).send({ error: error.message });
  });

  // ============================================================================
  // Authentication and authorization
  // ============================================================================
  async function authenticate(request: FastifyRequest, reply: FastifyReply) {
    try {
      const verified = await claimsFromHeaders(request.headers, tokenOptions);
      request.claims = verified.claims;
    } catch (error) {
      if (error instanceof TokenAuthError) {
        const status = error.code === "config_error" ? 500 : 401;
        return reply.status(status).send({ error: error.message, code: error.code });
      }
      throw error;
    }
  }

  function requirePermission(resource: string, action: string) {
    return async (request: FastifyRequest, reply: FastifyReply) => {
      await authenticate(request, reply);
      if (reply.sent || !request.claims) return reply;

      const allowed = await rbac.gate.authorizeClaims(request.claims, resource, action);
      if (!allowed) {
        const required = formatPermissionName(resource, action);
        request.log.info({ subject: request.claims.subject, permission: required }, "Permission denied");
        return reply.status(403).send({ error: "Permission denied", required });
      }
    };
  }

  // ============================================================================
  // Health
  // ============================================================================
  app.get("/health", async (_request, reply) => {
    try {
      const stats = getDatabaseStats();
      return reply.send({
        status: "ok",
        database: {
          path: stats.path,
          size_bytes: stats.sizeBytes,
          tables: stats.tables,
        },
        catalog: { permissions: rbac.catalog.size },
        cache: rbac.cache.stats(),
      });
    } catch (err) {
      app.log.error({ err }, "Health check failed");
      return reply.status(503).send({ status: "degraded" });
    }
  });

  // ============================================================================
  // Current caller
  // ============================================================================
  app.get("/api/me/permissions", { preHandler: authenticate }, async (request, reply) => {
    const claims = request.claims;
    const actor = claims ? resolveActor(claims) : null;

    const permissions = actor
      ? actor.kind === "role"
        ? await rbac.resolver.rolePermissions(actor.roleId)
        : await rbac.resolver.userPermissions(actor.userId)
      : [];

    return reply.send({
      subject: claims?.subject ?? null,
      role_id: actor?.kind === "role" ? actor.roleId : null,
      user_id: actor?.kind === "user" ? actor.userId : null,
      count: permissions.length,
      data: permissions,
    });
  });

  // ============================================================================
  // Catalog
  // ============================================================================
  app.get(
    "/api/permissions",
    { preHandler: requirePermission("permissions", "read") },
    async (request, reply) => {
      const parsed = PermissionListQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid query", details: parsed.error.flatten() });
      }

      const { resource } = parsed.data;
      const permissions = resource
        ? rbac.catalog.byResource()[resource] ?? []
        : rbac.catalog.allPermissions();
      return reply.send({ count: permissions.length, data: permissions });
    }
  );

  app.get(
    "/api/permissions/by-resource",
    { preHandler: requirePermission("permissions", "read") },
    async (_request, reply) => {
      return reply.send({ data: rbac.catalog.byResource() });
    }
  );

  app.get(
    "/api/permissions/templates",
    { preHandler: requirePermission("permissions", "read") },
    async (_request, reply) => {
      const templates = rbac.templates.allTemplates().map(templateView);
      return reply.send({ count: templates.length, data: templates });
    }
  );

  // ============================================================================
  // Role grants
  // ============================================================================
  app.get(
    "/api/permissions/role/:roleId",
    { preHandler: requirePermission("roles", "read") },
    async (request, reply) => {
      const parsed = RoleParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid role id", details: parsed.error.flatten() });
      }

      const { roleId } = parsed.data;
      const permissions = await rbac.resolver.rolePermissions(roleId);
      return reply.send({ role_id: roleId, count: permissions.length, data: permissions });
    }
  );

  app.get(
    "/api/permissions/role/:roleId/details",
    { preHandler: requirePermission("roles", "read") },
    async (request, reply) => {
      const parsed = RoleParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid role id", details: parsed.error.flatten() });
      }

      const role = await rbac.admin.getRoleWithPermissions(parsed.data.roleId);
      return reply.send({ data: role });
    }
  );

  app.post(
    "/api/permissions/role/:roleId/permission/:permissionName",
    { preHandler: requirePermission("permissions", "manage") },
    async (request, reply) => {
      const parsed = RolePermissionParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid parameters", details: parsed.error.flatten() });
      }

      const { roleId, permissionName } = parsed.data;
      const added = await rbac.admin.assignPermission(roleId, permissionName);
      return reply.send({
        message: added ? "Permission added to role" : "Permission already granted",
        role_id: roleId,
        permission_name: permissionName,
        added,
      });
    }
  );

  app.delete(
    "/api/permissions/role/:roleId/permission/:permissionName",
    { preHandler: requirePermission("permissions", "manage") },
    async (request, reply) => {
      const parsed = RolePermissionParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid parameters", details: parsed.error.flatten() });
      }

      const { roleId, permissionName } = parsed.data;
      const removed = await rbac.admin.revokePermission(roleId, permissionName);
      return reply.send({
        message: removed ? "Permission removed from role" : "Permission was not granted",
        role_id: roleId,
        permission_name: permissionName,
        removed,
      });
    }
  );

  app.put(
    "/api/permissions/role/:roleId",
    { preHandler: requirePermission("permissions", "manage") },
    async (request, reply) => {
      const params = RoleParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: "Invalid role id", details: params.error.flatten() });
      }
      const body = ReplacePermissionsSchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: "Invalid payload", details: body.error.flatten() });
      }

      const { roleId } = params.data;
      const written = await rbac.admin.replacePermissions(roleId, body.data.permissions);
      return reply.send({ role_id: roleId, count: written });
    }
  );

  // ============================================================================
  // User checks
  // ============================================================================
  app.get(
    "/api/permissions/user/:userId",
    { preHandler: requirePermission("users", "read") },
    async (request, reply) => {
      const parsed = UserParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid user id", details: parsed.error.flatten() });
      }

      const { userId } = parsed.data;
      const permissions = await rbac.resolver.userPermissions(userId);
      return reply.send({ user_id: userId, count: permissions.length, data: permissions });
    }
  );

  app.get(
    "/api/permissions/user/:userId/check",
    { preHandler: requirePermission("users", "read") },
    async (request, reply) => {
      const params = UserParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: "Invalid user id", details: params.error.flatten() });
      }
      const query = PermissionCheckQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.status(400).send({
          error: "Resource and action parameters are required",
          details: query.error.flatten(),
        });
      }

      const { userId } = params.data;
      const { resource, action } = query.data;
      const hasPermission = await rbac.resolver.userHasPermission(userId, resource, action);
      return reply.send({ user_id: userId, resource, action, has_permission: hasPermission });
    }
  );

  app.post(
    "/api/permissions/cache/clear",
    { preHandler: requirePermission("roles", "admin") },
    async (request, reply) => {
      rbac.resolver.invalidateAll();
      request.log.info({ subject: request.claims?.subject }, "Permission cache cleared");
      return reply.send({ message: "Permission cache cleared" });
    }
  );

  // ============================================================================
  // Roles
  // ============================================================================
  app.get("/api/roles", { preHandler: requirePermission("roles", "read") }, async (_request, reply) => {
    const roles = await rbac.admin.listRoles();
    return reply.send({ count: roles.length, data: roles });
  });

  app.get(
    "/api/roles/by-name/:name",
    { preHandler: requirePermission("roles", "read") },
    async (request, reply) => {
      const parsed = z.object({ name: z.string().min(1) }).safeParse(request.params);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid role name", details: parsed.error.flatten() });
      }

      const role = await rbac.admin.getRoleByName(parsed.data.name);
      return reply.send({ data: role });
    }
  );

  app.get("/api/roles/:id", { preHandler: requirePermission("roles", "read") }, async (request, reply) => {
    const parsed = RoleIdParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid role id", details: parsed.error.flatten() });
    }

    const role = await rbac.admin.getRole(parsed.data.id);
    return reply.send({ data: role });
  });

  app.post("/api/roles", { preHandler: requirePermission("roles", "create") }, async (request, reply) => {
    const parsed = CreateRoleSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid payload", details: parsed.error.flatten() });
    }

    const { name, description, permissions } = parsed.data;
    const role = await rbac.templates.createCustomRole(name, description, permissions);
    return reply.status(201).send({ data: role });
  });

  app.post(
    "/api/roles/from-template",
    { preHandler: requirePermission("roles", "create") },
    async (request, reply) => {
      const parsed = CreateRoleFromTemplateSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid payload", details: parsed.error.flatten() });
      }

      const template = rbac.templates.getTemplate(parsed.data.template);
      if (!template) {
        return reply.status(404).send({ error: `Template '${parsed.data.template}' not found` });
      }

      const role = await rbac.templates.createRoleFromTemplate(template);
      return reply.status(201).send({ data: role, template: templateView(template) });
    }
  );

  return app;
}
