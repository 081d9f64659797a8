import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_DATA_POINTS,
  MAX_DATA_POINTS,
  createReportGenerationExecutor,
  generateDataset,
  generateReport,
  resolveDataPoints,
} from "./reportGeneration";
import { EmptyDatasetError } from "../errors";
import type { ReportGenerationJob } from "../jobs/Job";
import { JobStatus } from "../jobs/JobStatus";
import { createLogger } from "../logger";

describe("resolveDataPoints", () => {
  it("defaults to one million when absent", () => {
    assert.equal(resolveDataPoints(), DEFAULT_DATA_POINTS);
    assert.equal(resolveDataPoints(undefined), 1_000_000);
  });

  it("clamps to the ten million cap", () => {
    assert.equal(resolveDataPoints(10_000_001), MAX_DATA_POINTS);
    assert.equal(resolveDataPoints(50_000_000), 10_000_000);
    assert.equal(resolveDataPoints(10_000_000), 10_000_000);
  });

  it("floors fractions and clamps negatives to zero", () => {
    assert.equal(resolveDataPoints(12.9), 12);
    assert.equal(resolveDataPoints(-5), 0);
  });
});

describe("generateDataset", () => {
  it("draws values in [0, 1000)", async () => {
    const { data, fallbackDraws } = await generateDataset(5000);

    assert.equal(data.length, 5000);
    assert.equal(fallbackDraws, 0);
    for (const value of data) {
      assert.ok(Number.isInteger(value) && value >= 0 && value < 1000, `out of range: ${value}`);
    }
  });

  it("falls back per draw when the secure source fails", async () => {
    let calls = 0;
    const flakyDraw = () => {
      calls++;
      if (calls % 2 === 0) {
        throw new Error("entropy unavailable");
      }
      return 7;
    };

    const { data, fallbackDraws } = await generateDataset(10, flakyDraw);

    assert.equal(fallbackDraws, 5);
    assert.equal(data.length, 10);
    assert.equal(data[0], 7);
    assert.ok(data[1] >= 0 && data[1] < 1000);
  });
});

describe("generateReport", () => {
  it("returns statistics over the requested number of values", async () => {
    const stats = await generateReport(2000);

    assert.equal(stats.count, 2000);
    assert.ok(stats.min >= 0);
    assert.ok(stats.max < 1000);
    assert.equal(stats.range, stats.max - stats.min);
  });

  it("feeds the drawn values into the statistics engine unchanged", async () => {
    const values = [1, 2, 3, 4, 5];
    let index = 0;
    const stats = await generateReport(5, () => values[index++]);

    assert.equal(stats.mean, 3);
    assert.equal(stats.median, 3);
    assert.equal(stats.range, 4);
  });

  it("fails with EmptyDatasetError for zero data points", async () => {
    await assert.rejects(generateReport(0), EmptyDatasetError);
  });
});

describe("createReportGenerationExecutor", () => {
  it("completes even when every secure draw fails", async () => {
    const executor = createReportGenerationExecutor(() => {
      throw new Error("entropy unavailable");
    });
    const job: ReportGenerationJob = {
      id: "20260115090507-abc123",
      type: "report_generation",
      payload: { data_points: 100 },
      createdAt: new Date(),
      status: JobStatus.PROCESSING,
    };

    const stats = await executor(job, { workerId: 1, logger: createLogger({ level: "silent" }) });

    assert.equal(stats.count, 100);
    assert.ok(stats.max < 1000);
  });
});
