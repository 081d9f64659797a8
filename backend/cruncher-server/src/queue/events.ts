import type { JobResult } from "../executors/types";
import type { JobType } from "../jobs/Job";
import type { JobStatus } from "../jobs/JobStatus";

/**
 * Record published when a job completes. Mirrors what ends up in the log.
 */
export interface JobResultRecord {
  jobId: string;
  type: JobType;
  workerId: number;
  durationMs: number;
  result: JobResult;
  completedAt: Date;
}

export interface JobFailureRecord {
  jobId: string;
  type: JobType;
  workerId: number;
  durationMs: number;
  error: string;
  errorCode: string;
}

export interface WorkerStats {
  /** Whether a job is currently in hand */
  busy: boolean;
  totalProcessed: number;
  successCount: number;
  failureCount: number;
  avgDurationMs: number;
}

/**
 * Event map for the job pipeline bus
 */
export type JobEvents = {
  "job.accepted": { jobId: string; type: JobType };
  "job.rejected": { type: string; code: string; reason: string };
  "job.status": { jobId: string; type: JobType; workerId: number; from: JobStatus; to: JobStatus };
  "job.completed": JobResultRecord;
  "job.failed": JobFailureRecord;
  "worker.started": { workerId: number };
  "worker.stopped": { workerId: number; stats: WorkerStats };
};
