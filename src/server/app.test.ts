import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SignJWT } from "jose";
import type { FastifyInstance } from "fastify";
import { buildApp } from "./app.js";
import { createRbac, type Rbac } from "../lib/rbac.js";
import { closeDatabase, getDatabase } from "../lib/core/db.js";
import type { TokenVerificationOptions } from "../lib/auth/tokenClaims.js";

const tokenOptions: TokenVerificationOptions = {
  secret: "test-secret",
  algorithm: "HS256",
  roleClaim: "role_id",
};

async function sign(payload: Record<string, unknown>): Promise<string> {
  return new SignJWT(payload)
    .setProtectedHeader({ alg: "HS256" })
    .setIssuedAt()
    .setExpirationTime("1h")
    .sign(new TextEncoder().encode("test-secret"));
}

describe("permgate server", () => {
  let rbac: Rbac;
  let app: FastifyInstance;
  let adminRoleId: number;
  let readerRoleId: number;
  let adminAuth: { authorization: string };
  let readerAuth: { authorization: string };

  beforeEach(async () => {
    process.env.PERMGATE_DB_PATH = ":memory:";
    rbac = createRbac();
    app = buildApp({ rbac, logger: false, seedRoles: false, tokenOptions });

    adminRoleId = (await rbac.roles.create("Operator", "Runs the permission service")).id;
    await rbac.grants.addMany(adminRoleId, [
      "permissions.read",
      "permissions.manage",
      "roles.read",
      "roles.create",
      "roles.admin",
      "users.read",
    ]);
    readerRoleId = (await rbac.roles.create("Reader", "")).id;
    await rbac.grants.add(readerRoleId, "games.read");

    adminAuth = { authorization: `Bearer ${await sign({ sub: "100", role_id: adminRoleId })}` };
    readerAuth = { authorization: `Bearer ${await sign({ sub: "101", role_id: readerRoleId })}` };
  });

  afterEach(async () => {
    await app.close();
    rbac.resolver.dispose();
    closeDatabase();
    delete process.env.PERMGATE_DB_PATH;
  });

  describe("GET /health", () => {
    it("reports database and catalog state", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe("ok");
      expect(body.database.tables.map((t: { name: string }) => t.name)).toEqual([
        "role_grants",
        "roles",
        "users",
      ]);
      expect(body.catalog).toEqual({ permissions: 42 });
    });

    it("echoes the request id", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/health",
        headers: { "x-request-id": "req-123" },
      });

      expect(response.headers["x-request-id"]).toBe("req-123");
    });
  });

  describe("authentication", () => {
    it("rejects requests without a token", async () => {
      const response = await app.inject({ method: "GET", url: "/api/permissions" });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: "Missing Authorization header", code: "missing_token" });
    });

    it("rejects tokens that fail verification", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/permissions",
        headers: { authorization: "Bearer not-a-jwt" },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().code).toBe("invalid_token");
    });

    it("denies roles without the required permission", async () => {
      const response = await app.inject({ method: "GET", url: "/api/permissions", headers: readerAuth });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({ error: "Permission denied", required: "permissions.read" });
    });

    it("resolves the role through the user directory when the token has no role", async () => {
      getDatabase()
        .prepare("INSERT INTO users (id, username, role_id) VALUES (?, ?, ?)")
        .run(5, "alice", adminRoleId);
      const headers = { authorization: `Bearer ${await sign({ sub: "5" })}` };

      const response = await app.inject({ method: "GET", url: "/api/permissions", headers });

      expect(response.statusCode).toBe(200);
    });
  });

  describe("GET /api/me/permissions", () => {
    it("lists the caller's permissions", async () => {
      const response = await app.inject({ method: "GET", url: "/api/me/permissions", headers: readerAuth });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        subject: "101",
        role_id: readerRoleId,
        user_id: null,
        count: 1,
        data: [{ name: "games.read", resource: "games", action: "read" }],
      });
    });
  });

  describe("catalog routes", () => {
    it("lists the catalog", async () => {
      const response = await app.inject({ method: "GET", url: "/api/permissions", headers: adminAuth });

      expect(response.statusCode).toBe(200);
      expect(response.json().count).toBe(42);
    });

    it("filters by resource", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/permissions?resource=cart",
        headers: adminAuth,
      });

      expect(response.json().data.map((p: { name: string }) => p.name)).toEqual([
        "cart.read",
        "cart.create",
        "cart.update",
        "cart.delete",
      ]);
    });

    it("lists templates", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/permissions/templates",
        headers: adminAuth,
      });

      const body = response.json();
      expect(body.count).toBe(5);
      expect(body.data[3]).toEqual({
        name: "Staff",
        description: "Basic staff operations",
        permissions: ["games.read", "gamekeys.read", "categories.read", "orders.read"],
      });
    });
  });

  describe("role grant routes", () => {
    it("grants a permission and serves it on the next read", async () => {
      const before = await app.inject({
        method: "GET",
        url: `/api/permissions/role/${readerRoleId}`,
        headers: adminAuth,
      });
      expect(before.json().count).toBe(1);

      const grant = await app.inject({
        method: "POST",
        url: `/api/permissions/role/${readerRoleId}/permission/orders.read`,
        headers: adminAuth,
      });
      expect(grant.statusCode).toBe(200);
      expect(grant.json()).toEqual({
        message: "Permission added to role",
        role_id: readerRoleId,
        permission_name: "orders.read",
        added: true,
      });

      const after = await app.inject({
        method: "GET",
        url: `/api/permissions/role/${readerRoleId}`,
        headers: adminAuth,
      });
      expect(after.json().data.map((p: { name: string }) => p.name)).toEqual(["games.read", "orders.read"]);
    });

    it("rejects unknown permission names", async () => {
      const response = await app.inject({
        method: "POST",
        url: `/api/permissions/role/${readerRoleId}/permission/games.fly`,
        headers: adminAuth,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        code: "invalid_permission_set",
        invalid_names: ["games.fly"],
      });
    });

    it("returns 404 for unknown roles", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/permissions/role/999/permission/games.read",
        headers: adminAuth,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: "Role 999 not found", code: "not_found" });
    });

    it("revokes a permission", async () => {
      const response = await app.inject({
        method: "DELETE",
        url: `/api/permissions/role/${readerRoleId}/permission/games.read`,
        headers: adminAuth,
      });

      expect(response.json().removed).toBe(true);
      const denied = await app.inject({ method: "GET", url: "/api/me/permissions", headers: readerAuth });
      expect(denied.json().count).toBe(0);
    });

    it("replaces every grant", async () => {
      const response = await app.inject({
        method: "PUT",
        url: `/api/permissions/role/${readerRoleId}`,
        headers: adminAuth,
        payload: { permissions: ["orders.read", "cart.read"] },
      });

      expect(response.json()).toEqual({ role_id: readerRoleId, count: 2 });
      const details = await app.inject({
        method: "GET",
        url: `/api/permissions/role/${readerRoleId}/details`,
        headers: adminAuth,
      });
      expect(details.json().data).toMatchObject({ id: readerRoleId, name: "Reader" });
      expect(details.json().data.permissions.map((p: { name: string }) => p.name)).toEqual([
        "orders.read",
        "cart.read",
      ]);
    });

    it("validates the replacement payload", async () => {
      const response = await app.inject({
        method: "PUT",
        url: `/api/permissions/role/${readerRoleId}`,
        headers: adminAuth,
        payload: { permissions: "games.read" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("Invalid payload");
    });

    it("rejects non-numeric role ids", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/permissions/role/abc",
        headers: adminAuth,
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe("user routes", () => {
    beforeEach(() => {
      getDatabase()
        .prepare("INSERT INTO users (id, username, role_id) VALUES (?, ?, ?)")
        .run(7, "bob", readerRoleId);
    });

    it("checks a user's permission", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/permissions/user/7/check?resource=games&action=read",
        headers: adminAuth,
      });

      expect(response.json()).toEqual({
        user_id: 7,
        resource: "games",
        action: "read",
        has_permission: true,
      });
    });

    it("requires resource and action", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/permissions/user/7/check?resource=games",
        headers: adminAuth,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("Resource and action parameters are required");
    });

    it("lists a user's permissions", async () => {
      const response = await app.inject({ method: "GET", url: "/api/permissions/user/7", headers: adminAuth });

      expect(response.json()).toMatchObject({ user_id: 7, count: 1 });
    });

    it("returns an empty set for unknown users", async () => {
      const response = await app.inject({ method: "GET", url: "/api/permissions/user/8", headers: adminAuth });

      expect(response.json()).toEqual({ user_id: 8, count: 0, data: [] });
    });
  });

  describe("POST /api/permissions/cache/clear", () => {
    it("clears the resolver cache", async () => {
      await rbac.resolver.rolePermissions(readerRoleId);

      const response = await app.inject({
        method: "POST",
        url: "/api/permissions/cache/clear",
        headers: adminAuth,
      });

      expect(response.statusCode).toBe(200);
      expect(rbac.cache.stats().rolePermissions).toBe(0);
    });
  });

  describe("role routes", () => {
    it("lists roles by name", async () => {
      const response = await app.inject({ method: "GET", url: "/api/roles", headers: adminAuth });

      expect(response.json().data.map((r: { name: string }) => r.name)).toEqual(["Operator", "Reader"]);
    });

    it("gets a role by id and by name", async () => {
      const byId = await app.inject({ method: "GET", url: `/api/roles/${readerRoleId}`, headers: adminAuth });
      const byName = await app.inject({ method: "GET", url: "/api/roles/by-name/reader", headers: adminAuth });

      expect(byId.json().data).toEqual({ id: readerRoleId, name: "Reader", description: "" });
      expect(byName.json().data.id).toBe(readerRoleId);
    });

    it("creates a custom role", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/roles",
        headers: adminAuth,
        payload: { name: "Auditor", permissions: ["reports.read"] },
      });

      expect(response.statusCode).toBe(201);
      const roleId = response.json().data.id;
      expect(await rbac.resolver.roleHasPermission(roleId, "reports", "read")).toBe(true);
    });

    it("creates no role when a permission name is invalid", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/roles",
        headers: adminAuth,
        payload: { name: "X", permissions: ["games.read", "bogus!!name"] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().invalid_names).toEqual(["bogus!!name"]);

      const lookup = await app.inject({ method: "GET", url: "/api/roles/by-name/X", headers: adminAuth });
      expect(lookup.statusCode).toBe(404);
    });

    it("creates a role from a template once", async () => {
      const first = await app.inject({
        method: "POST",
        url: "/api/roles/from-template",
        headers: adminAuth,
        payload: { template: "staff" },
      });
      const second = await app.inject({
        method: "POST",
        url: "/api/roles/from-template",
        headers: adminAuth,
        payload: { template: "Staff" },
      });

      expect(first.statusCode).toBe(201);
      expect(first.json().data.name).toBe("Staff");
      expect(second.statusCode).toBe(409);
      expect(second.json().code).toBe("role_exists");
    });

    it("returns 404 for unknown templates", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/roles/from-template",
        headers: adminAuth,
        payload: { template: "Auditor" },
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe("startup seeding", () => {
    it("creates template roles when the server becomes ready", async () => {
      await app.close();
      app = buildApp({ rbac, logger: false, seedRoles: true, tokenOptions });

      await app.ready();

      expect((await rbac.roles.list()).map((r) => r.name)).toEqual([
        "Admin",
        "Manager",
        "Operator",
        "Reader",
        "Staff",
        "Super Admin",
        "User",
      ]);
    });
  });
});
