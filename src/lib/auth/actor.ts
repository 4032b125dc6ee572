/**
 * Actor references
 *
 * An inbound request is made on behalf of either a role (a role id carried in
 * a trusted token) or a user that must be looked up to find its role. The
 * choice is made once, here, from the request's claims.
 */

export type Actor =
  | { kind: "role"; roleId: number }
  | { kind: "user"; userId: number };

/**
 * Claims read from an already verified identity token
 */
export interface ActorClaims {
  /** Subject identifier (the user id) */
  subject: string;
  /** Trusted role id, when the token carries one */
  roleId?: number;
}

const NUMERIC_ID = /^[1-9][0-9]*$/;

/**
 * Parse a positive integer id from a claim value. Returns null for anything
 * else (non-numeric strings, fractions, unsafe integers).
 */
export function parseId(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === "string" && NUMERIC_ID.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Prefer the role id in the claims; fall back to the subject as a user id.
 * Returns null when neither identifies an actor.
 */
export function resolveActor(claims: ActorClaims): Actor | null {
  if (claims.roleId !== undefined) {
    const roleId = parseId(claims.roleId);
    if (roleId !== null) {
      return { kind: "role", roleId };
    }
  }

  const userId = parseId(claims.subject);
  if (userId !== null) {
    return { kind: "user", userId };
  }

  return null;
}

export function describeActor(actor: Actor): string {
  return actor.kind === "role" ? `role:${actor.roleId}` : `user:${actor.userId}`;
}
