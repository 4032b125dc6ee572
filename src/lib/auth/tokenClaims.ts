import { jwtVerify, type JWTPayload } from "jose";
import { config, requireEnv } from "../config.js";
import type { ActorClaims } from "./actor.js";
import { parseId } from "./actor.js";

export interface TokenVerificationOptions {
  secret: string;
  algorithm: string;
  /** Claim carrying a trusted role id; dot paths allowed */
  roleClaim: string;
  issuer?: string;
  audience?: string;
}

export interface VerifiedToken {
  claims: ActorClaims;
  raw: JWTPayload;
}

export class TokenAuthError extends Error {
  code: "missing_token" | "invalid_token" | "config_error" | "missing_claim";

  constructor(message: string, code: TokenAuthError["code"]) {
    super(message);
    this.name = "TokenAuthError";
    this.code = code;
  }
}

export function verificationOptionsFromConfig(): TokenVerificationOptions {
  return {
    secret: config.jwtSecret,
    algorithm: config.jwtAlgorithm,
    roleClaim: config.roleClaim,
    issuer: config.jwtIssuer || undefined,
    audience: config.jwtAudience || undefined,
  };
}

/**
 * Read a claim by name; "a.b" walks nested objects
 */
export function getClaim(payload: JWTPayload, claimName: string): unknown {
  if (!claimName) return undefined;
  let current: unknown = payload;
  for (const part of claimName.split(".")) {
    if (!current || typeof current !== "object") return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

/**
 * Build actor claims from a verified payload. The subject comes from `sub`,
 * or `user_id` when there is no `sub`. A role claim that is not a positive
 * integer is ignored.
 */
export function claimsFromPayload(payload: JWTPayload, roleClaim: string): ActorClaims {
  const userIdClaim = getClaim(payload, "user_id");
  const subject =
    payload.sub ||
    (typeof userIdClaim === "string" || typeof userIdClaim === "number" ? String(userIdClaim) : "");
  if (!subject) {
    throw new TokenAuthError("Missing subject claim in token", "missing_claim");
  }

  const roleId = parseId(getClaim(payload, roleClaim));
  return roleId === null ? { subject } : { subject, roleId };
}

export async function verifyAccessToken(
  token: string,
  options: TokenVerificationOptions = verificationOptionsFromConfig()
): Promise<VerifiedToken> {
  try {
    requireEnv("PERMGATE_JWT_SECRET", options.secret);
  } catch (error) {
    throw new TokenAuthError(error instanceof Error ? error.message : String(error), "config_error");
  }

  const secret = new TextEncoder().encode(options.secret);
  const { payload } = await jwtVerify(token, secret, {
    algorithms: [options.algorithm],
    issuer: options.issuer,
    audience: options.audience,
  });

  return { claims: claimsFromPayload(payload, options.roleClaim), raw: payload };
}

/**
 * Verify the bearer token of a request. Every failure surfaces as a
 * TokenAuthError.
 */
export async function claimsFromHeaders(
  headers: Record<string, string | string[] | undefined>,
  options?: TokenVerificationOptions
): Promise<VerifiedToken> {
  const header = headers["authorization"];
  if (!header || typeof header !== "string") {
    throw new TokenAuthError("Missing Authorization header", "missing_token");
  }
  const match = header.match(/^Bearer\s+(.+)$/i);
  if (!match) {
    throw new TokenAuthError("Invalid Authorization header", "missing_token");
  }
  try {
    return await verifyAccessToken(match[1], options);
  } catch (error) {
    if (error instanceof TokenAuthError) {
      throw error;
    }
    throw new TokenAuthError("Token verification failed", "invalid_token");
  }
}
