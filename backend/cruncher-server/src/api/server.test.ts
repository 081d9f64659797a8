import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { FastifyInstance } from "fastify";
import { createServer } from "./server";
import { ACCEPTED_NOTE } from "./routes";
import { createDefaultExecutors } from "../executors";
import type { PasswordHashResult, TaskExecutors } from "../executors/types";
import type { Job } from "../jobs/Job";
import { createLogger } from "../logger";
import { Dispatcher, EventBus, HandoffChannel, WorkerPool } from "../queue";
import type { JobEvents } from "../queue";

const logger = createLogger({ level: "silent" });
const JOB_ID_PATTERN = /^\d{14}-[a-z0-9]{6}$/;

interface Harness {
  eventBus: EventBus<JobEvents>;
  pool: WorkerPool;
  server: FastifyInstance;
}

async function waitForReceivers(channel: HandoffChannel<Job>, count: number): Promise<void> {
  while (channel.waitingReceivers < count) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

async function startHarness(executors: TaskExecutors): Promise<Harness> {
  const eventBus = new EventBus<JobEvents>({ maxHistorySize: 100 });
  const channel = new HandoffChannel<Job>();
  const pool = new WorkerPool(channel, { executors, eventBus, logger });
  const dispatcher = new Dispatcher(channel, { eventBus, logger });
  const server = await createServer({ dispatcher, workers: pool.size });

  pool.start();
  await waitForReceivers(channel, 1);
  return { eventBus, pool, server };
}

describe("HTTP API", () => {
  let harness: Harness | undefined;

  afterEach(async () => {
    if (harness) {
      await harness.server.close();
      await harness.pool.stop(1000);
      harness = undefined;
    }
  });

  describe("GET /health", () => {
    it("reports service, phase and workers", async () => {
      harness = await startHarness({});

      const response = await harness.server.inject({ method: "GET", url: "/health" });
      const body = response.json();

      assert.equal(response.statusCode, 200);
      assert.equal(body.status, "healthy");
      assert.equal(body.service, "cruncher");
      assert.equal(body.phase, "1-skeleton");
      assert.equal(body.workers, 1);
      assert.match(body.time, /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(Z|[+-]\d{2}:\d{2})$/);
    });
  });

  describe("POST /submit", () => {
    it("accepts a password job and runs it to completion", async () => {
      harness = await startHarness(createDefaultExecutors());
      const completed = harness.eventBus.waitFor("job.completed", 5000);

      const response = await harness.server.inject({
        method: "POST",
        url: "/submit",
        payload: { type: "password_hash", payload: { password: "test-password", cost: 4 } },
      });
      const body = response.json();

      assert.equal(response.statusCode, 202);
      assert.equal(body.status, "accepted");
      assert.match(body.job_id, JOB_ID_PATTERN);
      assert.equal(body.message, `Job ${body.job_id} queued for CPU-intensive processing`);
      assert.equal(body.note, ACCEPTED_NOTE);

      const event = await completed;
      assert.equal(event.payload.jobId, body.job_id);
      const expected: PasswordHashResult = { hash_length: 60, cost: 4, algorithm: "bcrypt", verified: true };
      assert.deepEqual(event.payload.result, expected);

      const transitions = harness.eventBus
        .getHistoryByType("job.status")
        .filter((e) => e.payload.jobId === body.job_id)
        .map((e) => `${e.payload.from}→${e.payload.to}`);
      assert.deepEqual(transitions, ["pending→processing", "processing→completed"]);
    });

    it("rejects the second of two concurrent submissions with one idle worker", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const { server } = (harness = await startHarness({
        password_hash: async () => {
          await gate;
          return { hash_length: 60, cost: 4, algorithm: "bcrypt", verified: true };
        },
      }));

      const submit = () =>
        server.inject({
          method: "POST",
          url: "/submit",
          payload: { type: "password_hash", payload: { password: "test-password" } },
        });
      const responses = await Promise.all([submit(), submit()]);
      const statuses = responses.map((r) => r.statusCode).sort();

      assert.deepEqual(statuses, [202, 503]);
      const rejected = responses.find((r) => r.statusCode === 503);
      assert.deepEqual(rejected?.json(), {
        error: "Service Unavailable",
        message: "System overloaded, try again later",
      });

      release();
    });

    it("parses bodies sent with any content type as JSON", async () => {
      harness = await startHarness({
        report_generation: async () => ({
          count: 1,
          sum: 1,
          mean: 1,
          std_dev: 0,
          variance: 0,
          min: 1,
          max: 1,
          median: 1,
          p25: 1,
          p75: 1,
          p95: 1,
          p99: 1,
          range: 0,
        }),
      });

      const response = await harness.server.inject({
        method: "POST",
        url: "/submit",
        headers: { "content-type": "text/plain" },
        payload: JSON.stringify({ type: "report_generation", payload: { data_points: 1 } }),
      });

      assert.equal(response.statusCode, 202);
    });

    it("rejects an unknown job type", async () => {
      harness = await startHarness({});

      const response = await harness.server.inject({
        method: "POST",
        url: "/submit",
        payload: { type: "bogus" },
      });

      assert.equal(response.statusCode, 400);
      assert.deepEqual(response.json(), {
        error: "Bad Request",
        message: "Invalid job type. Use 'password_hash' or 'report_generation'",
      });
    });

    it("rejects a password job without a password", async () => {
      harness = await startHarness({});

      const response = await harness.server.inject({
        method: "POST",
        url: "/submit",
        payload: { type: "password_hash", payload: {} },
      });

      assert.equal(response.statusCode, 400);
      assert.deepEqual(response.json(), {
        error: "Bad Request",
        message: "Missing 'password' field in payload",
      });
    });

    it("rejects malformed JSON", async () => {
      harness = await startHarness({});

      const response = await harness.server.inject({
        method: "POST",
        url: "/submit",
        headers: { "content-type": "application/json" },
        payload: "{not json",
      });

      assert.equal(response.statusCode, 400);
      assert.deepEqual(response.json(), { error: "Bad Request", message: "Invalid JSON" });
    });

    it("rejects a body that is not a JSON object", async () => {
      harness = await startHarness({});

      const response = await harness.server.inject({
        method: "POST",
        url: "/submit",
        headers: { "content-type": "application/json" },
        payload: "[1,2,3]",
      });

      assert.equal(response.statusCode, 400);
      assert.deepEqual(response.json(), { error: "Bad Request", message: "Invalid JSON" });
    });
  });

  describe("other methods on /submit", () => {
    for (const method of ["GET", "PUT", "PATCH", "DELETE"] as const) {
      it(`answers ${method} with 405`, async () => {
        harness = await startHarness({});

        const response = await harness.server.inject({ method, url: "/submit" });

        assert.equal(response.statusCode, 405);
        assert.equal(response.headers.allow, "POST");
        assert.deepEqual(response.json(), { error: "Method Not Allowed", message: "Method not allowed" });
      });
    }
  });

  it("answers unknown routes with the error envelope", async () => {
    harness = await startHarness({});

    const response = await harness.server.inject({ method: "GET", url: "/nope" });

    assert.equal(response.statusCode, 404);
    assert.deepEqual(response.json(), { error: "Not Found", message: "Route GET /nope not found" });
  });

  it("answers CORS preflight requests", async () => {
    harness = await startHarness({});

    const response = await harness.server.inject({
      method: "OPTIONS",
      url: "/submit",
      headers: {
        origin: "http://client.test",
        "access-control-request-method": "POST",
      },
    });

    assert.equal(response.statusCode, 204);
    assert.equal(response.headers["access-control-allow-origin"], "http://client.test");
  });
});
