import dotenv from "dotenv";

dotenv.config();

const FIFTEEN_MINUTES_MS = 15 * 60 * 1000;
const ONE_MINUTE_MS = 60 * 1000;

function numberFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const config = {
  port: numberFromEnv(process.env.PERMGATE_PORT, 8080),
  host: process.env.PERMGATE_HOST || "0.0.0.0",

  // ===== Bearer token verification =====
  // Tokens are issued elsewhere; the server only verifies them and reads claims.
  jwtSecret: process.env.PERMGATE_JWT_SECRET || "",
  jwtAlgorithm: process.env.PERMGATE_JWT_ALGORITHM || "HS256",
  jwtIssuer: process.env.PERMGATE_JWT_ISSUER || "",
  jwtAudience: process.env.PERMGATE_JWT_AUDIENCE || "",
  // Claim carrying a trusted role id (dot paths allowed, e.g. "app.role_id")
  roleClaim: process.env.PERMGATE_ROLE_CLAIM || "role_id",

  // ===== Resolver cache =====
  cacheTtlMs: numberFromEnv(process.env.PERMGATE_CACHE_TTL_MS, FIFTEEN_MINUTES_MS),
  // Lifetime of fail-closed entries written when the backing store errors
  failureTtlMs: numberFromEnv(process.env.PERMGATE_FAILURE_TTL_MS, ONE_MINUTE_MS),

  // Skip (instead of synthesizing) grants whose names are not in the catalog
  strictPermissions: process.env.PERMGATE_STRICT_PERMISSIONS === "true",
  seedRolesOnStartup: process.env.PERMGATE_SEED_ROLES !== "false",
};

export function requireEnv(name: string, value: string) {
  if (!value) {
    throw new Error(`Missing env var: ${name}`);
  }
}
