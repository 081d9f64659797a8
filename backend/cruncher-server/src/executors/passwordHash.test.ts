import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_BCRYPT_COST,
  PasswordHasher,
  bcryptHasher,
  createPasswordHashExecutor,
  hashPassword,
  resolveCost,
} from "./passwordHash";
import { HashingFailedError } from "../errors";
import type { PasswordHashJob } from "../jobs/Job";
import { JobStatus } from "../jobs/JobStatus";
import { createLogger } from "../logger";

describe("resolveCost", () => {
  it("keeps costs inside [4, 31]", () => {
    assert.equal(resolveCost(4), 4);
    assert.equal(resolveCost(12), 12);
    assert.equal(resolveCost(31), 31);
  });

  it("falls back to the default outside the range", () => {
    assert.equal(resolveCost(3), DEFAULT_BCRYPT_COST);
    assert.equal(resolveCost(32), DEFAULT_BCRYPT_COST);
    assert.equal(resolveCost(-1), DEFAULT_BCRYPT_COST);
    assert.equal(resolveCost(undefined), DEFAULT_BCRYPT_COST);
  });
});

describe("hashPassword", () => {
  it("hashes and verifies with real bcrypt", async () => {
    const result = await hashPassword("abc123", 4);

    assert.deepEqual(result, { hash_length: 60, cost: 4, algorithm: "bcrypt", verified: true });
  });

  it("reports the default cost when the requested one is out of range", async () => {
    const seenCosts: number[] = [];
    const hasher: PasswordHasher = {
      hash: async (_password, cost) => {
        seenCosts.push(cost);
        return "$2b$10$placeholderhash";
      },
      compare: async () => true,
    };

    const result = await hashPassword("abc123", 99, hasher);

    assert.equal(result.cost, DEFAULT_BCRYPT_COST);
    assert.deepEqual(seenCosts, [DEFAULT_BCRYPT_COST]);
    assert.equal(result.hash_length, "$2b$10$placeholderhash".length);
  });

  it("fails with HashingFailedError when verification does not match", async () => {
    const hasher: PasswordHasher = {
      hash: async () => "$2b$04$placeholderhash",
      compare: async () => false,
    };

    await assert.rejects(hashPassword("abc123", 4, hasher), (error: unknown) => {
      assert.ok(error instanceof HashingFailedError);
      assert.equal(error.code, "HASHING_FAILED");
      assert.equal(error.message, "hash verification failed: hash does not match password");
      return true;
    });
  });

  it("wraps errors thrown by the hasher", async () => {
    const cause = new Error("out of memory");
    const hasher: PasswordHasher = {
      hash: async () => {
        throw cause;
      },
      compare: bcryptHasher.compare,
    };

    await assert.rejects(hashPassword("abc123", 4, hasher), (error: unknown) => {
      assert.ok(error instanceof HashingFailedError);
      assert.equal(error.message, "bcrypt hashing failed: out of memory");
      assert.equal(error.cause, cause);
      return true;
    });
  });
});

describe("createPasswordHashExecutor", () => {
  it("never exposes the password or the hash", async () => {
    const executor = createPasswordHashExecutor();
    const job: PasswordHashJob = {
      id: "20260115090507-abc123",
      type: "password_hash",
      payload: { password: "abc123", cost: 4 },
      createdAt: new Date(),
      status: JobStatus.PROCESSING,
    };

    const result = await executor(job, {
      workerId: 1,
      logger: createLogger({ level: "silent" }),
    });

    assert.deepEqual(Object.keys(result).sort(), ["algorithm", "cost", "hash_length", "verified"]);
    assert.equal(JSON.stringify(result).includes("abc123"), false);
    assert.equal(result.verified, true);
  });
});
