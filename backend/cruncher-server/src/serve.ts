/**
 * Server Entry Point
 *
 * Wires config, logging, the worker pool and the HTTP server together.
 * Can be run directly with: tsx src/serve.ts
 */

import { startServer } from "./api";
import { loadConfig, ServerConfig } from "./config";
import { createDefaultExecutors } from "./executors";
import type { Job } from "./jobs/Job";
import { createLogger } from "./logger";
import { attachJobLogger } from "./observability/JobLogger";
import { Dispatcher, EventBus, HandoffChannel, JobEvents, WorkerPool } from "./queue";

let config: ServerConfig;
try {
  config = loadConfig();
} catch (err) {
  createLogger().fatal({ err }, "Failed to load configuration");
  process.exit(1);
}

const logger = createLogger({ level: config.logLevel });

const eventBus = new EventBus<JobEvents>({ maxHistorySize: 100 });
attachJobLogger(eventBus, logger);

// Zero capacity: a submission is accepted only if a worker is parked on it
const channel = new HandoffChannel<Job>();
const pool = new WorkerPool(channel, {
  concurrency: config.workers,
  executors: createDefaultExecutors(),
  eventBus,
  logger,
});
const dispatcher = new Dispatcher(channel, { eventBus, logger });

logger.info(
  { workers: pool.size, shutdownGraceMs: config.shutdownGraceMs, phase: config.phase },
  `Worker pool configured: workers=${pool.size}, shutdownGraceMs=${config.shutdownGraceMs}`
);

pool.start();

startServer({
  dispatcher,
  workers: pool.size,
  phase: config.phase,
  port: config.port,
  host: config.host,
  logLevel: config.logLevel,
})
  .then((server) => {
    let isShuttingDown = false;

    async function gracefulShutdown(signal: string): Promise<void> {
      if (isShuttingDown) return;
      isShuttingDown = true;

      logger.info(`${signal} received, initiating graceful shutdown...`);

      try {
        // Stop accepting connections first, then close the channel
        await server.close();

        const drained = await pool.stop(config.shutdownGraceMs);
        if (drained) {
          logger.info(pool.getStats(), "All workers drained");
        } else {
          logger.warn(
            pool.getStats(),
            `Workers still busy after ${config.shutdownGraceMs}ms grace period, exiting anyway`
          );
        }

        logger.info("Shutdown complete");
        process.exit(0);
      } catch (err) {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      }
    }

    process.on("SIGTERM", () => {
      void gracefulShutdown("SIGTERM");
    });
    process.on("SIGINT", () => {
      void gracefulShutdown("SIGINT");
    });

    logger.info(`Server started on http://${config.host}:${config.port}`);
    logger.info(`Health check: GET http://${config.host}:${config.port}/health`);
    logger.info(`Submit jobs: POST http://${config.host}:${config.port}/submit`);
    logger.info(`Job types: password_hash, report_generation`);
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, "Failed to start server");
    process.exit(1);
  });
