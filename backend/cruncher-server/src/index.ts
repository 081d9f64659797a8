/**
 * @cruncher/server
 * CPU-bound job server with zero-capacity admission control
 */

// Job model exports
export { JobStatus, isTerminalStatus, isValidTransition, getAllowedTransitions } from "./jobs/JobStatus";
export { JOB_TYPES, isJobType, generateJobId, createJob, transitionJob } from "./jobs/Job";
export type {
  Job,
  JobType,
  JobOfType,
  JobRequest,
  PasswordHashJob,
  PasswordHashPayload,
  ReportGenerationJob,
  ReportGenerationPayload,
} from "./jobs/Job";

// Statistics exports
export { computeStatistics, isEmptyDataset } from "./stats/computeStatistics";
export type { EmptyDatasetMarker, StatisticsResult, StatisticsSummary } from "./stats/computeStatistics";

// Executor exports
export {
  createDefaultExecutors,
  createPasswordHashExecutor,
  createReportGenerationExecutor,
  hashPassword,
  generateReport,
} from "./executors";
export type { ExecutionContext, JobResult, PasswordHashResult, TaskExecutor, TaskExecutors } from "./executors";

// Queue exports
export { HandoffChannel, EventBus, Dispatcher, parseJobRequest, Worker, WorkerPool } from "./queue";
export type {
  JobEvents,
  JobExecutionResult,
  JobFailureRecord,
  JobResultRecord,
  DispatcherStats,
  SubmitOutcome,
  WorkerPoolStats,
  WorkerStats,
} from "./queue";

// API exports
export { createServer, startServer } from "./api";
export type { ServerOptions } from "./api";

// Ambient exports
export { attachJobLogger } from "./observability/JobLogger";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export { loadConfig } from "./config";
export type { ServerConfig } from "./config";
export {
  CruncherError,
  InvalidRequestError,
  OverloadedError,
  HashingFailedError,
  EmptyDatasetError,
  UnknownJobTypeError,
  ConfigError,
} from "./errors";
