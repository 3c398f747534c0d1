/**
 * Bounded exponential-backoff retry for idempotent ledger reads.
 *
 * Transaction submission never goes through here.
 *
 * @module
 */

import { status as GrpcStatus } from "@grpc/grpc-js";
import { errorMessage, isNexusError, RpcError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export interface RetryConfig {
  /** Maximum retry attempts after the first call. Default: 3 */
  maxRetries: number;
  /** Base delay for exponential backoff in ms. Default: 200 */
  baseDelayMs: number;
  /** Maximum backoff delay in ms. Default: 10_000 */
  maxDelayMs: number;
  /** Random jitter factor (0-1). Default: 0.2 */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 10_000,
  jitterFactor: 0.2,
};

/** gRPC statuses that indicate a transient server or transport issue. */
const RETRYABLE_GRPC_STATUSES = new Set<number>([
  GrpcStatus.UNAVAILABLE,
  GrpcStatus.DEADLINE_EXCEEDED,
  GrpcStatus.RESOURCE_EXHAUSTED,
  GrpcStatus.ABORTED,
  GrpcStatus.INTERNAL,
]);

/** Retryable error patterns for errors that carry no status. */
const RETRYABLE_PATTERNS: readonly string[] = [
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "socket hang up",
];

/**
 * Classify whether an error is worth retrying. Only RPC failures qualify;
 * parsing and not-found errors are final.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RpcError) {
    if (error.statusCode !== undefined) return RETRYABLE_GRPC_STATUSES.has(error.statusCode);
  } else if (isNexusError(error)) {
    return false;
  }
  const msg = errorMessage(error);
  return RETRYABLE_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Compute exponential backoff delay with random jitter.
 *
 * Formula: `min(baseDelay * 2^attempt, maxDelay) * (1 + random * jitter)`
 */
export function computeBackoff(
  attempt: number,
  config: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs" | "jitterFactor">,
): number {
  const base = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
  const jitter = 1 + Math.random() * config.jitterFactor;
  return Math.round(base * jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface WithRetryOptions {
  config?: Partial<RetryConfig>;
  logger?: Logger;
  /** Label used in log lines */
  label?: string;
  /** Injectable for tests */
  sleepFn?: (ms: number) => Promise<void>;
}

/**
 * Run `fn`, retrying retryable failures with exponential backoff.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions = {}): Promise<T> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const logger = options.logger ?? silentLogger;
  const wait = options.sleepFn ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxRetries || !isRetryableError(error)) {
        throw error;
      }
      const delay = computeBackoff(attempt, config);
      logger.debug(
        `${options.label ?? "request"} failed (${errorMessage(error)}), retry ${attempt + 1}/${config.maxRetries} in ${delay}ms`,
      );
      await wait(delay);
    }
  }
}
