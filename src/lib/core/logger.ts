import type { FastifyBaseLogger } from "fastify";

/**
 * Logger accepted by library modules. The server passes `app.log`;
 * tests and the CLI usually pass nothing.
 */
export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
