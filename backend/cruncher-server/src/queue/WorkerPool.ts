/**
 * WorkerPool
 *
 * Runs N workers over one handoff channel. With N = 1 exactly one job is in
 * flight system-wide; raising N adds consumers without changing the per-job
 * isolation each Worker provides.
 *
 * Lifecycle:
 *   pool.start()        → every worker parks on the channel
 *   pool.stop(graceMs)  → closes the channel and waits (bounded) for the
 *                         workers to finish their in-hand jobs
 */

import type { TaskExecutors } from "../executors/types";
import type { Job } from "../jobs/Job";
import type { Logger } from "../logger";
import type { EventBus } from "./EventBus";
import type { JobEvents, WorkerStats } from "./events";
import type { HandoffChannel } from "./HandoffChannel";
import { Worker } from "./Worker";

export interface WorkerPoolOptions {
  /** Number of workers (default: 1) */
  concurrency?: number;
  executors: TaskExecutors;
  eventBus: EventBus<JobEvents>;
  logger: Logger;
}

export interface WorkerPoolStats extends Omit<WorkerStats, "busy"> {
  size: number;
  busyWorkers: number;
  /** Workers currently parked on the channel */
  idleWorkers: number;
}

export class WorkerPool {
  private readonly channel: HandoffChannel<Job>;
  private readonly workers: Worker[];
  private loops?: Promise<void>[];

  constructor(channel: HandoffChannel<Job>, options: WorkerPoolOptions) {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.channel = channel;
    this.workers = Array.from(
      { length: concurrency },
      (_, index) =>
        new Worker(index + 1, channel, {
          executors: options.executors,
          eventBus: options.eventBus,
          logger: options.logger,
        })
    );
  }

  get size(): number {
    return this.workers.length;
  }

  /**
   * Start every worker. Does nothing if already started.
   */
  start(): void {
    if (this.loops) {
      return;
    }
    this.loops = this.workers.map((worker) => worker.start());
  }

  /**
   * Close the channel and wait for the workers to drain.
   *
   * @param graceMs - Give up waiting after this many ms (default: wait indefinitely)
   * @returns true if every worker finished within the grace window
   */
  async stop(graceMs?: number): Promise<boolean> {
    this.channel.close();

    const drained = Promise.all(this.loops ?? []).then(() => true);
    if (graceMs === undefined) {
      return drained;
    }

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timeoutId = setTimeout(() => resolve(false), graceMs);
    });

    try {
      return await Promise.race([drained, timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  getStats(): WorkerPoolStats {
    const stats = this.workers.map((worker) => worker.getStats());
    const totalProcessed = stats.reduce((sum, s) => sum + s.totalProcessed, 0);
    const totalDurationMs = stats.reduce((sum, s) => sum + s.avgDurationMs * s.totalProcessed, 0);

    return {
      size: this.workers.length,
      busyWorkers: stats.filter((s) => s.busy).length,
      idleWorkers: this.channel.waitingReceivers,
      totalProcessed,
      successCount: stats.reduce((sum, s) => sum + s.successCount, 0),
      failureCount: stats.reduce((sum, s) => sum + s.failureCount, 0),
      avgDurationMs: totalProcessed > 0 ? totalDurationMs / totalProcessed : 0,
    };
  }
}
