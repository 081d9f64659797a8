/**
 * API Module Exports
 *
 * Barrel exports for the Fastify HTTP layer.
 */

export { createServer, startServer, REQUEST_TIMEOUT_MS, KEEP_ALIVE_TIMEOUT_MS } from "./server";
export type { ServerOptions } from "./server";

export { registerRoutes, errorBody, ACCEPTED_NOTE, SERVICE_NAME } from "./routes";
export type { AcceptedBody, ErrorBody, HealthBody, RouteContext } from "./routes";
