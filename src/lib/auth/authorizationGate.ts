/**
 * Authorization Gate
 *
 * Entry point for access decisions. Callers get a boolean and never an
 * exception: malformed input, unresolvable actors and resolver faults are
 * all denials.
 */

import type { Logger } from "../core/logger.js";
import type { PermissionResolver } from "../permissions/permissionResolver.js";
import { describeActor, resolveActor, type Actor, type ActorClaims } from "./actor.js";

export interface AuthorizationGateOptions {
  resolver: PermissionResolver;
  logger?: Logger;
}

export class AuthorizationGate {
  private readonly resolver: PermissionResolver;
  private readonly logger?: Logger;

  constructor(options: AuthorizationGateOptions) {
    this.resolver = options.resolver;
    this.logger = options.logger;
  }

  async authorize(actor: Actor, resource: string, action: string): Promise<boolean> {
    if (!isToken(resource) || !isToken(action)) {
      this.logger?.debug({ resource, action }, "Rejected malformed authorization request");
      return false;
    }

    let allowed: boolean;
    try {
      allowed = await this.resolver.actorHasPermission(actor, resource, action);
    } catch (error) {
      this.logger?.error(
        { err: error, actor: describeActor(actor), resource, action },
        "Authorization check failed; denying"
      );
      return false;
    }

    if (!allowed) {
      this.logger?.debug({ actor: describeActor(actor), resource, action }, "Permission denied");
    }
    return allowed;
  }

  /**
   * Resolve the actor from verified claims once, then authorize
   */
  async authorizeClaims(claims: ActorClaims, resource: string, action: string): Promise<boolean> {
    const actor = resolveActor(claims);
    if (!actor) {
      this.logger?.debug({ subject: claims.subject }, "Claims identify no actor");
      return false;
    }
    return this.authorize(actor, resource, action);
  }
}

function isToken(value: string): boolean {
  return value.trim().length > 0 && !value.includes(".");
}
