/**
 * VPC Atlas — AWS Retry Runner
 *
 * Retry logic for AWS API calls made during discovery.
 * Handles AWS throttling, rate limiting and transient network errors
 * with exponential back-off and jitter.
 */

import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
  /** Replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Default retry configuration for AWS API calls
 */
export const AWS_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

// =============================================================================
// Helpers
// =============================================================================

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function readProperty(err: unknown, key: string): unknown {
  if (!err || typeof err !== "object" || !(key in err)) return undefined;
  return Reflect.get(err, key);
}

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  const code = readProperty(err, "code");
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

function httpStatusOf(err: unknown): number | undefined {
  const status = readProperty(readProperty(err, "$metadata"), "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

function resolveRetryConfig(
  defaults: Required<RetryConfig>,
  overrides?: RetryConfig,
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Run fn until it succeeds, the attempts run out or shouldRetry declines.
 * The last error is rethrown.
 */
export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts: maxAttempts, minDelayMs, maxDelayMs, jitter } = resolveRetryConfig(
    AWS_RETRY_DEFAULTS,
    options,
  );
  const shouldRetry = options.shouldRetry ?? (() => true);
  const wait = options.sleep ?? sleep;
  let lastErr: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) break;

      const retryAfterMs = options.retryAfterMs?.(err);
      const baseDelay =
        typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs)
          ? Math.max(retryAfterMs, minDelayMs)
          : minDelayMs * 2 ** (attempt - 1);
      let delay = Math.min(baseDelay, maxDelayMs);
      delay = applyJitter(delay, jitter);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      options.onRetry?.({ attempt, maxAttempts, delayMs: delay, err, label: options.label });
      await wait(delay);
    }
  }

  throw lastErr ?? new Error("Retry failed");
}

// =============================================================================
// AWS-Specific Retry Logic
// =============================================================================

/**
 * Pattern matching AWS throttling and transient errors
 */
const AWS_RETRY_PATTERN =
  /throttl|rate exceeded|rate limit|503|504|timeout|ECONNRESET|ETIMEDOUT|TooManyRequestsException|ServiceUnavailable|RequestLimitExceeded|SlowDown/i;

/**
 * AWS error codes that should always be retried
 */
const AWS_RETRYABLE_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalServiceError",
  "InternalServerError",
  "SlowDown",
  "EC2ThrottledException",
  "RequestThrottled",
  "PriorRequestNotComplete",
  "RequestTimeout",
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
]);

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

/**
 * Extract retry-after delay from an AWS SDK v3 error response
 */
export function getAWSRetryAfterMs(err: unknown): number | undefined {
  const status = httpStatusOf(err);
  if (status !== 429 && status !== 503) return undefined;

  const headers = readProperty(readProperty(err, "$response"), "headers");
  const retryAfter = readProperty(headers, "retry-after");
  if (typeof retryAfter !== "string") return undefined;

  const seconds = parseInt(retryAfter, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Determine if an AWS error should be retried
 */
export function shouldRetryAWSError(err: unknown, _attempt: number): boolean {
  if (!err) return false;

  const code = extractErrorCode(err);
  if (code && AWS_RETRYABLE_CODES.has(code)) return true;

  if (err instanceof Error) {
    if (AWS_RETRYABLE_CODES.has(err.name)) return true;
    const status = httpStatusOf(err);
    if (status !== undefined && RETRYABLE_STATUS.has(status)) return true;
  }

  return AWS_RETRY_PATTERN.test(formatErrorMessage(err));
}

export type AWSRetryOptions = {
  retry?: RetryConfig;
  logger?: Logger;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
};

export type AWSRetryRunner = <T>(fn: () => Promise<T>, label?: string) => Promise<T>;

/**
 * Create an AWS retry runner function
 */
export function createAWSRetryRunner(options: AWSRetryOptions = {}): AWSRetryRunner {
  const config = resolveRetryConfig(AWS_RETRY_DEFAULTS, options.retry);

  return async function awsRetry<T>(fn: () => Promise<T>, label?: string): Promise<T> {
    return retryAsync(fn, {
      ...config,
      label,
      shouldRetry: shouldRetryAWSError,
      retryAfterMs: getAWSRetryAfterMs,
      sleep: options.sleep,
      onRetry: (info) => {
        options.logger?.warn(
          `${info.label ?? "operation"} throttled, retry ${info.attempt}/${info.maxAttempts} in ${info.delayMs}ms`,
          { error: formatErrorMessage(info.err) },
        );
        options.onRetry?.(info);
      },
    });
  };
}

/**
 * Execute an AWS operation with retry logic
 *
 * @example
 * ```typescript
 * const result = await withAWSRetry(
 *   () => ec2.send(new DescribeVpcsCommand({})),
 *   { label: "DescribeVpcs" },
 * );
 * ```
 */
export async function withAWSRetry<T>(
  fn: () => Promise<T>,
  options: { label?: string } & AWSRetryOptions = {},
): Promise<T> {
  return createAWSRetryRunner(options)(fn, options.label);
}
