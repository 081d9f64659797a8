/**
 * HTTP Routes
 *
 * Endpoints:
 *   GET  /health   - Liveness with service, phase and worker count
 *   POST /submit   - Submit a job; 202 on hand-off, 400 on bad input,
 *                    503 when no worker is ready
 *
 * Any other method on /submit answers 405 with `Allow: POST`.
 */

import { STATUS_CODES } from "http";
import { formatISO } from "date-fns";
import { FastifyInstance } from "fastify";
import type { Dispatcher } from "../queue/Dispatcher";

export const SERVICE_NAME = "cruncher";

export const ACCEPTED_NOTE = "Job will be processed asynchronously; results are reported in the server log.";

export interface RouteContext {
  dispatcher: Dispatcher;
  /** Rollout phase reported by /health */
  phase: string;
  workers: number;
}

export interface ErrorBody {
  error: string;
  message: string;
}

export interface HealthBody {
  status: "healthy";
  service: string;
  phase: string;
  workers: number;
  time: string;
}

export interface AcceptedBody {
  status: "accepted";
  job_id: string;
  message: string;
  note: string;
}

export function errorBody(statusCode: number, message: string): ErrorBody {
  return { error: STATUS_CODES[statusCode] ?? "Error", message };
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Register all routes on the Fastify instance.
 */
export async function registerRoutes(server: FastifyInstance, ctx: RouteContext): Promise<void> {
  server.get("/health", async (): Promise<HealthBody> => {
    return {
      status: "healthy",
      service: SERVICE_NAME,
      phase: ctx.phase,
      workers: ctx.workers,
      time: formatISO(new Date()),
    };
  });

  server.post<{ Body: unknown }>("/submit", async (request, reply) => {
    if (!isJsonObject(request.body)) {
      return reply.status(400).send(errorBody(400, "Invalid JSON"));
    }

    const outcome = ctx.dispatcher.submit(request.body.type, request.body.payload);
    if (!outcome.accepted) {
      const { error } = outcome;
      return reply.status(error.statusCode).send(errorBody(error.statusCode, error.message));
    }

    const body: AcceptedBody = {
      status: "accepted",
      job_id: outcome.jobId,
      message: `Job ${outcome.jobId} queued for CPU-intensive processing`,
      note: ACCEPTED_NOTE,
    };
    return reply.status(202).send(body);
  });

  server.route({
    method: ["GET", "PUT", "PATCH", "DELETE"],
    url: "/submit",
    handler: async (_request, reply) => {
      return reply.status(405).header("Allow", "POST").send(errorBody(405, "Method not allowed"));
    },
  });
}
