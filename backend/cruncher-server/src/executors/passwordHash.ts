/**
 * Password hashing executor
 *
 * Hashes with bcrypt at the requested cost, then verifies the fresh hash
 * against the password. The verification doubles the CPU cost; a mismatch is
 * a failure, not a warning.
 */

import * as bcrypt from "bcrypt";
import { HashingFailedError } from "../errors";
import type { PasswordHashResult, TaskExecutor } from "./types";

export const DEFAULT_BCRYPT_COST = 10;
export const MIN_BCRYPT_COST = 4;
export const MAX_BCRYPT_COST = 31;

/**
 * The two bcrypt operations the executor needs, swappable in tests
 */
export interface PasswordHasher {
  hash(password: string, cost: number): Promise<string>;
  compare(password: string, hash: string): Promise<boolean>;
}

export const bcryptHasher: PasswordHasher = {
  hash: (password, cost) => bcrypt.hash(password, cost),
  compare: (password, hash) => bcrypt.compare(password, hash),
};

/**
 * Costs outside [4, 31], or no cost at all, fall back to the default.
 */
export function resolveCost(cost?: number): number {
  if (cost === undefined || cost < MIN_BCRYPT_COST || cost > MAX_BCRYPT_COST) {
    return DEFAULT_BCRYPT_COST;
  }
  return cost;
}

export async function hashPassword(
  password: string,
  cost?: number,
  hasher: PasswordHasher = bcryptHasher
): Promise<PasswordHashResult> {
  const effectiveCost = resolveCost(cost);

  let hash: string;
  try {
    hash = await hasher.hash(password, effectiveCost);
  } catch (error) {
    throw new HashingFailedError(`bcrypt hashing failed: ${errorMessage(error)}`, { cause: error });
  }

  let verified: boolean;
  try {
    verified = await hasher.compare(password, hash);
  } catch (error) {
    throw new HashingFailedError(`hash verification failed: ${errorMessage(error)}`, { cause: error });
  }
  if (!verified) {
    throw new HashingFailedError("hash verification failed: hash does not match password");
  }

  return {
    hash_length: hash.length,
    cost: effectiveCost,
    algorithm: "bcrypt",
    verified: true,
  };
}

export function createPasswordHashExecutor(
  hasher: PasswordHasher = bcryptHasher
): TaskExecutor<"password_hash"> {
  return async (job, context) => {
    const cost = resolveCost(job.payload.cost);
    context.logger.debug({ cost }, "hashing password with bcrypt");
    return hashPassword(job.payload.password, cost, hasher);
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
