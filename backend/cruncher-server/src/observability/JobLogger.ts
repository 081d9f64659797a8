/**
 * JobLogger
 *
 * Turns job pipeline events into structured log records. Results are logged
 * field by field; executors never put a password or a hash into them.
 */

import type { Logger } from "../logger";
import type { EventBus } from "../queue/EventBus";
import type { JobEvents } from "../queue/events";

/**
 * Subscribe the logger to every job pipeline event.
 *
 * @returns function that removes all subscriptions
 */
export function attachJobLogger(eventBus: EventBus<JobEvents>, logger: Logger): () => void {
  const subscriptions = [
    eventBus.subscribe("job.accepted", ({ payload }) => {
      logger.info({ jobId: payload.jobId, jobType: payload.type }, "job accepted");
    }),

    eventBus.subscribe("job.rejected", ({ payload }) => {
      logger.warn({ jobType: payload.type, code: payload.code }, `job rejected: ${payload.reason}`);
    }),

    eventBus.subscribe("job.status", ({ payload }) => {
      logger.info(
        { jobId: payload.jobId, jobType: payload.type, workerId: payload.workerId, from: payload.from, to: payload.to },
        `job status ${payload.from}→${payload.to}`
      );
    }),

    eventBus.subscribe("job.completed", ({ payload }) => {
      logger.info(
        {
          jobId: payload.jobId,
          jobType: payload.type,
          workerId: payload.workerId,
          durationMs: payload.durationMs,
          completedAt: payload.completedAt.toISOString(),
          result: payload.result,
        },
        `job completed in ${payload.durationMs}ms`
      );
    }),

    eventBus.subscribe("job.failed", ({ payload }) => {
      logger.error(
        {
          jobId: payload.jobId,
          jobType: payload.type,
          workerId: payload.workerId,
          durationMs: payload.durationMs,
          code: payload.errorCode,
        },
        `job failed: ${payload.error}`
      );
    }),

    eventBus.subscribe("worker.started", ({ payload }) => {
      logger.info({ workerId: payload.workerId }, "worker started, waiting for jobs");
    }),

    eventBus.subscribe("worker.stopped", ({ payload }) => {
      logger.info({ workerId: payload.workerId, stats: payload.stats }, "worker stopped (channel closed)");
    }),
  ];

  return () => {
    for (const subscription of subscriptions) {
      subscription.unsubscribe();
    }
  };
}
