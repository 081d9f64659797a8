/**
 * Job
 *
 * The unit of work flowing from the Dispatcher to a Worker. Each job type
 * carries its own payload shape, validated once at admission.
 */

import { randomInt } from "crypto";
import { format } from "date-fns";
import { JobStatus, isValidTransition } from "./JobStatus";

export const JOB_TYPES = ["password_hash", "report_generation"] as const;

export type JobType = (typeof JOB_TYPES)[number];

export interface PasswordHashPayload {
  password: string;
  /** bcrypt work factor; out-of-range values are clamped by the executor */
  cost?: number;
}

export interface ReportGenerationPayload {
  data_points: number;
}

interface JobBase {
  /** `YYYYMMDDHHMMSS-xxxxxx` */
  id: string;
  createdAt: Date;
  status: JobStatus;
}

export interface PasswordHashJob extends JobBase {
  type: "password_hash";
  payload: PasswordHashPayload;
}

export interface ReportGenerationJob extends JobBase {
  type: "report_generation";
  payload: ReportGenerationPayload;
}

export type Job = PasswordHashJob | ReportGenerationJob;

/** Job request before an id and status are assigned */
export type JobRequest =
  | Pick<PasswordHashJob, "type" | "payload">
  | Pick<ReportGenerationJob, "type" | "payload">;

export type JobOfType<T extends JobType> = Extract<Job, { type: T }>;

const ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
const ID_SUFFIX_LENGTH = 6;

export function isJobType(value: unknown): value is JobType {
  return JOB_TYPES.some((type) => type === value);
}

/**
 * Generate a time-ordered job ID.
 * The suffix is random, so IDs created in the same second are unlikely to
 * collide but not guaranteed unique.
 */
export function generateJobId(now: Date = new Date()): string {
  let suffix = "";
  for (let i = 0; i < ID_SUFFIX_LENGTH; i++) {
    suffix += ID_SUFFIX_ALPHABET[randomInt(ID_SUFFIX_ALPHABET.length)];
  }
  return `${format(now, "yyyyMMddHHmmss")}-${suffix}`;
}

/**
 * Build a PENDING job from a validated request.
 */
export function createJob(request: JobRequest, now: Date = new Date()): Job {
  const base: JobBase = { id: generateJobId(now), createdAt: now, status: JobStatus.PENDING };
  // Narrow per variant so the payload stays tied to its type
  switch (request.type) {
    case "password_hash":
      return { ...base, type: request.type, payload: request.payload };
    case "report_generation":
      return { ...base, type: request.type, payload: request.payload };
  }
}

/**
 * Move a job to a new status in place.
 *
 * @returns the previous status
 * @throws Error if the transition is not allowed
 */
export function transitionJob(job: Job, next: JobStatus): JobStatus {
  const previous = job.status;
  if (!isValidTransition(previous, next)) {
    throw new Error(`Invalid status transition: ${previous} -> ${next} for job ${job.id}`);
  }
  job.status = next;
  return previous;
}
