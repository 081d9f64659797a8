/**
 * Job Queue Module
 *
 * Admission (Dispatcher), the zero-capacity handoff channel, and the workers
 * consuming it.
 */

export { HandoffChannel } from "./HandoffChannel";
export type { ReceiveResult } from "./HandoffChannel";
export { EventBus } from "./EventBus";
export type { BusEvent, EventHandler, EventMap, PublishResult, Subscription } from "./EventBus";
export type { JobEvents, JobFailureRecord, JobResultRecord, WorkerStats } from "./events";
export { Dispatcher, parseJobRequest } from "./Dispatcher";
export type { DispatcherOptions, DispatcherStats, SubmitOutcome } from "./Dispatcher";
export { Worker } from "./Worker";
export type { JobExecutionResult, WorkerOptions } from "./Worker";
export { WorkerPool } from "./WorkerPool";
export type { WorkerPoolOptions, WorkerPoolStats } from "./WorkerPool";
