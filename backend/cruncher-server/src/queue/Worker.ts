/**
 * Worker
 *
 * The consumer side of the handoff channel. A worker parks in `receive()`,
 * runs whatever job it is handed to completion, then parks again. It:
 * 1. Marks the job PROCESSING the moment it arrives
 * 2. Runs the executor registered for the job type
 * 3. Marks the job COMPLETED or FAILED and publishes a result/failure record
 *
 * A failing job never escapes `process()`, so one bad job cannot stop the
 * loop or affect the next one.
 *
 * Lifecycle:
 *   worker.start()   → loop runs until the channel closes
 *   channel.close()  → loop exits after the job in hand finishes
 */

import { describeError, UnknownJobTypeError } from "../errors";
import type { ExecutionContext, JobResult, TaskExecutors } from "../executors/types";
import { Job, transitionJob } from "../jobs/Job";
import { JobStatus } from "../jobs/JobStatus";
import type { Logger } from "../logger";
import type { EventBus } from "./EventBus";
import type { JobEvents, WorkerStats } from "./events";
import type { HandoffChannel } from "./HandoffChannel";

export interface WorkerOptions {
  /** Executors by job type */
  executors: TaskExecutors;
  eventBus: EventBus<JobEvents>;
  logger: Logger;
}

/**
 * Outcome of processing a single job
 */
export interface JobExecutionResult {
  job: Job;
  success: boolean;
  /** Executor result (if successful) */
  result?: JobResult;
  /** Error message (if failed) */
  error?: string;
  errorCode?: string;
  durationMs: number;
}

export class Worker {
  private readonly channel: HandoffChannel<Job>;
  private readonly executors: TaskExecutors;
  private readonly eventBus: EventBus<JobEvents>;
  private readonly logger: Logger;

  private loop?: Promise<void>;
  private busy: boolean = false;

  private stats = {
    totalProcessed: 0,
    successCount: 0,
    failureCount: 0,
    totalDurationMs: 0,
  };

  constructor(
    readonly id: number,
    channel: HandoffChannel<Job>,
    options: WorkerOptions
  ) {
    this.channel = channel;
    this.executors = options.executors;
    this.eventBus = options.eventBus;
    this.logger = options.logger.child({ workerId: id });
  }

  /**
   * Start the receive loop. Calling it again returns the same loop.
   *
   * @returns Promise that resolves once the channel is closed and the job in
   *          hand (if any) has finished
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  private async run(): Promise<void> {
    await this.eventBus.publish("worker.started", { workerId: this.id });

    for await (const job of this.channel) {
      await this.process(job);
    }

    await this.eventBus.publish("worker.stopped", { workerId: this.id, stats: this.getStats() });
  }

  /**
   * Run one job through its lifecycle. Never throws.
   */
  async process(job: Job): Promise<JobExecutionResult> {
    const startTime = Date.now();
    this.busy = true;

    const context: ExecutionContext = {
      workerId: this.id,
      logger: this.logger.child({ jobId: job.id, jobType: job.type }),
    };

    let outcome: JobExecutionResult;

    try {
      await this.transition(job, JobStatus.PROCESSING);
      const result = await this.execute(job, context);
      await this.transition(job, JobStatus.COMPLETED);

      outcome = { job, success: true, result, durationMs: Date.now() - startTime };
      this.stats.successCount++;

      await this.eventBus.publish("job.completed", {
        jobId: job.id,
        type: job.type,
        workerId: this.id,
        durationMs: outcome.durationMs,
        result,
        completedAt: new Date(),
      });
    } catch (error) {
      const { message, code } = describeError(error);
      // A job that never reached PROCESSING keeps its status
      if (job.status === JobStatus.PROCESSING) {
        await this.transition(job, JobStatus.FAILED);
      }

      outcome = { job, success: false, error: message, errorCode: code, durationMs: Date.now() - startTime };
      this.stats.failureCount++;

      await this.eventBus.publish("job.failed", {
        jobId: job.id,
        type: job.type,
        workerId: this.id,
        durationMs: outcome.durationMs,
        error: message,
        errorCode: code,
      });
    }

    this.stats.totalProcessed++;
    this.stats.totalDurationMs += outcome.durationMs;
    this.busy = false;

    return outcome;
  }

  private async execute(job: Job, context: ExecutionContext): Promise<JobResult> {
    const jobType: string = job.type;

    switch (job.type) {
      case "password_hash": {
        const executor = this.executors.password_hash;
        if (!executor) {
          throw new UnknownJobTypeError(jobType);
        }
        return executor(job, context);
      }
      case "report_generation": {
        const executor = this.executors.report_generation;
        if (!executor) {
          throw new UnknownJobTypeError(jobType);
        }
        return executor(job, context);
      }
      default:
        throw new UnknownJobTypeError(jobType);
    }
  }

  private async transition(job: Job, next: JobStatus): Promise<void> {
    const from = transitionJob(job, next);
    await this.eventBus.publish("job.status", {
      jobId: job.id,
      type: job.type,
      workerId: this.id,
      from,
      to: next,
    });
  }

  isBusy(): boolean {
    return this.busy;
  }

  getStats(): WorkerStats {
    return {
      busy: this.busy,
      totalProcessed: this.stats.totalProcessed,
      successCount: this.stats.successCount,
      failureCount: this.stats.failureCount,
      avgDurationMs:
        this.stats.totalProcessed > 0 ? this.stats.totalDurationMs / this.stats.totalProcessed : 0,
    };
  }
}
