/**
 * JobStatus Enum
 *
 * Lifecycle of a job between admission and its terminal record:
 *
 *   PENDING → PROCESSING → COMPLETED
 *                 ↓
 *               FAILED
 *
 * - PENDING: set when the Dispatcher builds the job
 * - PROCESSING: set the moment a Worker receives it
 * - COMPLETED / FAILED: set after the executor returns or throws
 */
export enum JobStatus {
  PENDING = "pending",
  PROCESSING = "processing",
  COMPLETED = "completed",
  FAILED = "failed",
}

/**
 * Check if a status is terminal (no further transitions possible)
 */
export function isTerminalStatus(status: JobStatus): boolean {
  return status === JobStatus.COMPLETED || status === JobStatus.FAILED;
}

/**
 * Check if a status transition is valid
 */
export function isValidTransition(from: JobStatus, to: JobStatus): boolean {
  switch (from) {
    case JobStatus.PENDING:
      return to === JobStatus.PROCESSING;
    case JobStatus.PROCESSING:
      return to === JobStatus.COMPLETED || to === JobStatus.FAILED;
    default:
      return false;
  }
}

/**
 * Get allowed next statuses from the current one
 */
export function getAllowedTransitions(status: JobStatus): JobStatus[] {
  switch (status) {
    case JobStatus.PENDING:
      return [JobStatus.PROCESSING];
    case JobStatus.PROCESSING:
      return [JobStatus.COMPLETED, JobStatus.FAILED];
    default:
      return [];
  }
}
