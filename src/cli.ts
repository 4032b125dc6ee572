#!/usr/bin/env node
import { Command } from "commander";
import { spawn } from "node:child_process";
import { initDatabase, closeDatabase } from "./lib/core/db.js";
import { getRbac, resetRbac, type Rbac } from "./lib/rbac.js";

function parseId(value: string, label: string): number {
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new Error(`${label} must be a positive integer, got '${value}'`);
  }
  return id;
}

/**
 * Run a command against the local database and report failures on stderr
 */
function withRbac<A extends unknown[]>(
  fn: (rbac: Rbac, ...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      initDatabase();
      await fn(getRbac(), ...args);
    } catch (error) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    } finally {
      resetRbac();
      closeDatabase();
    }
  };
}

const program = new Command();

program.name("permgate").description("Role-based permission management").version("0.1.0");

program
  .command("permissions")
  .description("List the permission catalog")
  .option("-r, --resource <resource>", "Only list permissions of one resource")
  .action(
    withRbac(async (rbac, opts: { resource?: string }) => {
      const groups = rbac.catalog.byResource();
      const resources = opts.resource ? [opts.resource] : rbac.catalog.resources();
      for (const resource of resources) {
        const permissions = groups[resource] ?? [];
        if (permissions.length === 0) {
          console.log(`No permissions for resource '${resource}'`);
          continue;
        }
        console.log(`${resource}:`);
        permissions.forEach((p) => console.log(`  ${p.name.padEnd(24)} ${p.description}`));
      }
    })
  );

program
  .command("templates")
  .description("List role templates")
  .action(
    withRbac(async (rbac) => {
      for (const template of rbac.templates.allTemplates()) {
        console.log(`${template.name} - ${template.description}`);
        template.permissions.forEach((p) => console.log(`  ${p.name}`));
      }
    })
  );

program
  .command("seed")
  .description("Create a role for every template that does not exist yet")
  .action(
    withRbac(async (rbac) => {
      const { created, skipped } = await rbac.templates.seedRoles();
      created.forEach((role) => console.log(`Created ${role.name} (id ${role.id})`));
      skipped.forEach((name) => console.log(`Skipped ${name} (already exists)`));
    })
  );

program
  .command("check <userId> <resource> <action>")
  .description("Check whether a user may perform an action on a resource")
  .action(
    withRbac(async (rbac, userId: string, resource: string, action: string) => {
      const allowed = await rbac.resolver.userHasPermission(parseId(userId, "userId"), resource, action);
      console.log(`${allowed ? "ALLOW" : "DENY"} user ${userId} ${resource}.${action}`);
      if (!allowed) process.exitCode = 2;
    })
  );

program
  .command("grant <roleId> <permissions...>")
  .description("Grant catalog permissions to a role")
  .action(
    withRbac(async (rbac, roleId: string, permissions: string[]) => {
      const written = await rbac.admin.assignPermissions(parseId(roleId, "roleId"), permissions);
      console.log(`Granted ${written} new permission(s) to role ${roleId}`);
    })
  );

program
  .command("revoke <roleId> <permission>")
  .description("Revoke a permission from a role")
  .action(
    withRbac(async (rbac, roleId: string, permission: string) => {
      const removed = await rbac.admin.revokePermission(parseId(roleId, "roleId"), permission);
      console.log(removed ? `Revoked ${permission} from role ${roleId}` : `Role ${roleId} did not have ${permission}`);
    })
  );

program
  .command("serve")
  .description("Start the HTTP server")
  .action(() => {
    spawn("node", ["dist/server/index.js"], { stdio: "inherit" });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
