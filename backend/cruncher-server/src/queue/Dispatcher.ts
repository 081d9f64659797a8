/**
 * Dispatcher
 *
 * The admission boundary. For each submission it:
 * 1. Validates the job type and its payload
 * 2. Builds a PENDING job
 * 3. Offers it on the handoff channel without blocking
 *
 * If no worker is parked on the channel the submission is rejected with
 * OverloadedError on the spot: back-pressure is an immediate 503, never a
 * backlog. A rejected submission leaves no job record anywhere.
 */

import { z } from "zod";
import { InvalidRequestError, OverloadedError } from "../errors";
import { DEFAULT_DATA_POINTS } from "../executors/reportGeneration";
import { createJob, isJobType, Job, JobRequest, JobType } from "../jobs/Job";
import type { Logger } from "../logger";
import type { EventBus } from "./EventBus";
import type { JobEvents } from "./events";
import type { HandoffChannel } from "./HandoffChannel";

const payloadObjectSchema = z.record(z.unknown(), {
  invalid_type_error: "Field 'payload' must be a JSON object",
});

/** Non-numeric values are dropped so the executor applies its default */
const lenientNumber = z.number().finite().optional().catch(undefined);

const passwordHashPayloadSchema = z.object({
  password: z.string({
    required_error: "Missing 'password' field in payload",
    invalid_type_error: "Field 'password' must be a string",
  }),
  cost: lenientNumber,
});

const reportGenerationPayloadSchema = z.object({
  data_points: lenientNumber,
});

/**
 * Validate a raw submission into a typed job request.
 *
 * @throws InvalidRequestError if the type is unknown or the payload is unusable
 */
export function parseJobRequest(type: unknown, payload: unknown): JobRequest {
  if (!isJobType(type)) {
    throw new InvalidRequestError("Invalid job type. Use 'password_hash' or 'report_generation'");
  }

  const fields = payloadObjectSchema.optional().safeParse(payload);
  if (!fields.success) {
    throw new InvalidRequestError(fields.error.issues[0].message);
  }
  const raw = fields.data ?? {};

  switch (type) {
    case "password_hash": {
      const parsed = passwordHashPayloadSchema.safeParse(raw);
      if (!parsed.success) {
        throw new InvalidRequestError(parsed.error.issues[0].message);
      }
      const { password, cost } = parsed.data;
      return {
        type,
        payload: cost === undefined ? { password } : { password, cost: Math.trunc(cost) },
      };
    }
    case "report_generation": {
      const { data_points } = reportGenerationPayloadSchema.parse(raw);
      return {
        type,
        payload: { data_points: data_points === undefined ? DEFAULT_DATA_POINTS : Math.floor(data_points) },
      };
    }
  }
}

export type SubmitOutcome =
  | { accepted: true; jobId: string; type: JobType }
  | { accepted: false; error: InvalidRequestError | OverloadedError };

export interface DispatcherOptions {
  eventBus: EventBus<JobEvents>;
  logger: Logger;
}

export interface DispatcherStats {
  accepted: number;
  /** Valid submissions turned away because no worker was ready */
  rejected: number;
  invalid: number;
}

export class Dispatcher {
  private readonly channel: HandoffChannel<Job>;
  private readonly eventBus: EventBus<JobEvents>;
  private readonly logger: Logger;

  private stats: DispatcherStats = { accepted: 0, rejected: 0, invalid: 0 };

  constructor(channel: HandoffChannel<Job>, options: DispatcherOptions) {
    this.channel = channel;
    this.eventBus = options.eventBus;
    this.logger = options.logger;
  }

  /**
   * Validate a submission and try to hand it to an idle worker.
   * Returns before the job runs; never waits for a worker.
   */
  submit(type: unknown, payload: unknown): SubmitOutcome {
    let request: JobRequest;
    try {
      request = parseJobRequest(type, payload);
    } catch (error) {
      if (!(error instanceof InvalidRequestError)) {
        throw error;
      }
      this.stats.invalid++;
      this.publish("job.rejected", { type: String(type), code: error.code, reason: error.message });
      return { accepted: false, error };
    }

    const job = createJob(request);

    if (!this.channel.offer(job)) {
      const error = new OverloadedError();
      this.stats.rejected++;
      this.publish("job.rejected", { type: request.type, code: error.code, reason: error.message });
      return { accepted: false, error };
    }

    // The worker owns the job from here on; only its id and type are kept
    this.stats.accepted++;
    this.publish("job.accepted", { jobId: job.id, type: job.type });
    return { accepted: true, jobId: job.id, type: job.type };
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  private publish<K extends "job.accepted" | "job.rejected">(eventType: K, payload: JobEvents[K]): void {
    this.eventBus.publishSync(eventType, payload, (error) => {
      this.logger.error({ err: error, eventType }, "event handler failed");
    });
  }
}
