/**
 * Fastify Server
 *
 * HTTP front of the job pipeline:
 * - /health and /submit routes
 * - CORS support for cross-origin requests
 * - Request bodies parsed as JSON whatever their content type
 * - Every 4xx/5xx answered with the `{ error, message }` envelope
 */

import Fastify, { FastifyError, FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { InvalidRequestError } from "../errors";
import type { LevelWithSilent } from "pino";
import type { Dispatcher } from "../queue/Dispatcher";
import { errorBody, registerRoutes } from "./routes";

/** Whole-request deadline */
export const REQUEST_TIMEOUT_MS = 10_000;
export const KEEP_ALIVE_TIMEOUT_MS = 60_000;

export interface ServerOptions {
  dispatcher: Dispatcher;
  /** Worker count reported by /health */
  workers: number;
  /** Rollout phase reported by /health (default: '1-skeleton') */
  phase?: string;
  /** Port to listen on (default: 8080) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Request log level; request logging is off when omitted */
  logLevel?: LevelWithSilent;
}

/**
 * Create and configure a Fastify server
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { dispatcher, workers, phase = "1-skeleton", logLevel } = options;

  const server: FastifyInstance = Fastify({
    logger: logLevel === undefined ? false : { name: "cruncher-http", level: logLevel },
    requestTimeout: REQUEST_TIMEOUT_MS,
    keepAliveTimeout: KEEP_ALIVE_TIMEOUT_MS,
  });

  await server.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  // One parser for every content type
  server.removeAllContentTypeParsers();
  server.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    try {
      done(null, JSON.parse(body.toString()));
    } catch (err) {
      done(new InvalidRequestError("Invalid JSON", { cause: err }), undefined);
    }
  });

  server.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "request failed");
      return reply.status(statusCode).send(errorBody(statusCode, "Internal server error"));
    }
    return reply.status(statusCode).send(errorBody(statusCode, error.message));
  });

  server.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(errorBody(404, `Route ${request.method} ${request.url} not found`));
  });

  await registerRoutes(server, { dispatcher, phase, workers });

  return server;
}

/**
 * Start the server and listen on the specified port
 */
export async function startServer(options: ServerOptions): Promise<FastifyInstance> {
  const { port = 8080, host = "0.0.0.0" } = options;

  const server = await createServer(options);

  try {
    await server.listen({ port, host });
    return server;
  } catch (err) {
    server.log.error(err);
    await server.close();
    throw err;
  }
}
