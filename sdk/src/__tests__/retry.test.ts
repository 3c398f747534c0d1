import { describe, expect, it, vi } from "vitest";
import { ParsingError, RpcError } from "../errors.js";
import { computeBackoff, isRetryableError, withRetry } from "../utils/retry.js";

const UNAVAILABLE = 14;
const NOT_FOUND = 5;

describe("isRetryableError", () => {
  it("retries transient RPC statuses and connection errors only", () => {
    expect(isRetryableError(new RpcError("down", UNAVAILABLE))).toBe(true);
    expect(isRetryableError(new RpcError("missing", NOT_FOUND))).toBe(false);
    expect(isRetryableError(new RpcError("connect ECONNREFUSED 127.0.0.1:9000"))).toBe(true);
    expect(isRetryableError(new ParsingError("ETIMEDOUT in payload"))).toBe(false);
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
    expect(isRetryableError(new Error("boom"))).toBe(false);
  });
});

describe("computeBackoff", () => {
  it("doubles up to the cap", () => {
    const config = { baseDelayMs: 100, maxDelayMs: 500, jitterFactor: 0 };
    expect(computeBackoff(0, config)).toBe(100);
    expect(computeBackoff(1, config)).toBe(200);
    expect(computeBackoff(3, config)).toBe(500);
  });
});

describe("withRetry", () => {
  it("retries until the call succeeds", async () => {
    const sleepFn = vi.fn(async () => undefined);
    let failures = 2;
    const fn = vi.fn(async (): Promise<string> => {
      if (failures-- > 0) throw new RpcError("down", UNAVAILABLE);
      return "ok";
    });

    await expect(withRetry(fn, { sleepFn, config: { maxRetries: 2, jitterFactor: 0 } })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls).toEqual([[200], [400]]);
  });

  it("gives up after the configured retries", async () => {
    const error = new RpcError("down", UNAVAILABLE);
    const fn = vi.fn(async (): Promise<string> => {
      throw error;
    });

    await expect(withRetry(fn, { sleepFn: async () => undefined, config: { maxRetries: 2 } })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry final errors", async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new ParsingError("bad object");
    });

    await expect(withRetry(fn, { sleepFn: async () => undefined })).rejects.toThrow("bad object");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
