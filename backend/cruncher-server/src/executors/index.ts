/**
 * Task executors, one per job type.
 */

import { createPasswordHashExecutor } from "./passwordHash";
import { createReportGenerationExecutor } from "./reportGeneration";
import type { TaskExecutors } from "./types";

export {
  DEFAULT_BCRYPT_COST,
  MIN_BCRYPT_COST,
  MAX_BCRYPT_COST,
  bcryptHasher,
  createPasswordHashExecutor,
  hashPassword,
  resolveCost,
} from "./passwordHash";
export type { PasswordHasher } from "./passwordHash";
export {
  DEFAULT_DATA_POINTS,
  MAX_DATA_POINTS,
  createReportGenerationExecutor,
  generateDataset,
  generateReport,
  resolveDataPoints,
  secureDraw,
} from "./reportGeneration";
export type { RandomDraw } from "./reportGeneration";
export type {
  ExecutionContext,
  ExecutorResults,
  JobResult,
  PasswordHashResult,
  TaskExecutor,
  TaskExecutors,
} from "./types";

export function createDefaultExecutors(): TaskExecutors {
  return {
    password_hash: createPasswordHashExecutor(),
    report_generation: createReportGenerationExecutor(),
  };
}
