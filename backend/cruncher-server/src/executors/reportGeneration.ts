/**
 * Report generation executor
 *
 * Synthesizes a dataset of integers drawn uniformly from [0, 1000) and runs it
 * through the statistics engine. Generation yields to the event loop between
 * chunks so the HTTP layer keeps answering while a large report is built.
 */

import { randomInt } from "crypto";
import { setImmediate as yieldToEventLoop } from "timers/promises";
import { EmptyDatasetError } from "../errors";
import { computeStatistics, isEmptyDataset, StatisticsSummary } from "../stats/computeStatistics";
import type { TaskExecutor } from "./types";

export const DEFAULT_DATA_POINTS = 1_000_000;
export const MAX_DATA_POINTS = 10_000_000;
export const VALUE_CEILING = 1000;

const CHUNK_SIZE = 65_536;

/** Produces one value in [0, 1000); may throw if its entropy source fails */
export type RandomDraw = () => number;

export const secureDraw: RandomDraw = () => randomInt(VALUE_CEILING);

/** Coarse time-derived value used when a secure draw fails */
export function fallbackDraw(): number {
  return Number(process.hrtime.bigint() % BigInt(VALUE_CEILING));
}

/**
 * Clamp to [0, 10,000,000], flooring fractions.
 */
export function resolveDataPoints(dataPoints: number = DEFAULT_DATA_POINTS): number {
  if (!Number.isFinite(dataPoints)) {
    return DEFAULT_DATA_POINTS;
  }
  return Math.min(MAX_DATA_POINTS, Math.max(0, Math.floor(dataPoints)));
}

export interface DatasetStats {
  /** Draws that fell back to the time-derived value */
  fallbackDraws: number;
}

export async function generateDataset(
  count: number,
  draw: RandomDraw = secureDraw
): Promise<{ data: Float64Array } & DatasetStats> {
  const data = new Float64Array(count);
  let fallbackDraws = 0;

  for (let i = 0; i < count; i++) {
    try {
      data[i] = draw();
    } catch {
      data[i] = fallbackDraw();
      fallbackDraws++;
    }

    if ((i + 1) % CHUNK_SIZE === 0) {
      await yieldToEventLoop();
    }
  }

  return { data, fallbackDraws };
}

export async function generateReport(
  dataPoints?: number,
  draw: RandomDraw = secureDraw
): Promise<StatisticsSummary> {
  const { data } = await generateDataset(resolveDataPoints(dataPoints), draw);
  return summarize(data);
}

function summarize(data: Float64Array): StatisticsSummary {
  const stats = computeStatistics(data);
  if (isEmptyDataset(stats)) {
    throw new EmptyDatasetError();
  }
  return stats;
}

export function createReportGenerationExecutor(
  draw: RandomDraw = secureDraw
): TaskExecutor<"report_generation"> {
  return async (job, context) => {
    const count = resolveDataPoints(job.payload.data_points);
    context.logger.debug({ dataPoints: count }, "generating random values for statistical analysis");

    const { data, fallbackDraws } = await generateDataset(count, draw);
    if (fallbackDraws > 0) {
      context.logger.warn({ fallbackDraws }, "secure random source failed; used time-derived values");
    }

    context.logger.debug({ dataPoints: count }, "computing statistics");
    return summarize(data);
  };
}
