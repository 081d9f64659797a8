/**
 * Error taxonomy
 *
 * Admission errors (InvalidRequestError, OverloadedError) carry the HTTP status
 * they map to. Execution errors never reach an HTTP caller; they end up in the
 * job's FAILED status and its `job.failed` record.
 */

export type CruncherErrorCode =
  | "INVALID_REQUEST"
  | "OVERLOADED"
  | "HASHING_FAILED"
  | "EMPTY_DATASET"
  | "UNKNOWN_JOB_TYPE"
  | "INVALID_CONFIG";

export abstract class CruncherError extends Error {
  abstract readonly code: CruncherErrorCode;
  /** HTTP status for admission errors, undefined for execution errors */
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or incomplete submission. HTTP 400, never retried. */
export class InvalidRequestError extends CruncherError {
  readonly code = "INVALID_REQUEST";
  readonly statusCode = 400;
}

/** No worker was ready to take the job. HTTP 503, caller may retry. */
export class OverloadedError extends CruncherError {
  readonly code = "OVERLOADED";
  readonly statusCode = 503;

  constructor() {
    super("System overloaded, try again later");
  }
}

export class HashingFailedError extends CruncherError {
  readonly code = "HASHING_FAILED";
}

export class EmptyDatasetError extends CruncherError {
  readonly code = "EMPTY_DATASET";

  constructor() {
    super("empty dataset");
  }
}

export class UnknownJobTypeError extends CruncherError {
  readonly code = "UNKNOWN_JOB_TYPE";

  constructor(readonly jobType: string) {
    super(`unknown job type: ${jobType}`);
  }
}

export class ConfigError extends CruncherError {
  readonly code = "INVALID_CONFIG";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

/**
 * Extract a message and code from anything thrown by an executor.
 */
export function describeError(error: unknown): { message: string; code: string } {
  if (error instanceof CruncherError) {
    return { message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { message: error.message, code: "INTERNAL" };
  }
  return { message: String(error), code: "INTERNAL" };
}
