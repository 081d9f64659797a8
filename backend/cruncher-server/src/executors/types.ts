import type { JobOfType, JobType } from "../jobs/Job";
import type { Logger } from "../logger";
import type { StatisticsSummary } from "../stats/computeStatistics";

/**
 * Summary of a password hashing run. Never carries the password or the hash.
 */
export interface PasswordHashResult {
  hash_length: number;
  cost: number;
  algorithm: "bcrypt";
  verified: true;
}

export interface ExecutorResults {
  password_hash: PasswordHashResult;
  report_generation: StatisticsSummary;
}

export type JobResult = ExecutorResults[JobType];

/**
 * Context handed to an executor by the worker running it
 */
export interface ExecutionContext {
  workerId: number;
  /** Child logger bound to the job id */
  logger: Logger;
}

/**
 * Runs one job type. Throwing marks the job FAILED; the worker keeps going.
 */
export type TaskExecutor<T extends JobType> = (
  job: JobOfType<T>,
  context: ExecutionContext
) => Promise<ExecutorResults[T]>;

export type TaskExecutors = { [K in JobType]?: TaskExecutor<K> };
