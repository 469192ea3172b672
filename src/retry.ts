/**
 * AWS Retry Runner
 *
 * Retry with exponential backoff for the WorkSpaces, CloudWatch and EC2
 * calls made while building a report. Throttling and transient network
 * errors are retried; everything else fails on the first attempt.
 */

import { formatErrorMessage } from "./errors.js";
import type { ReportLogger } from "./logging/index.js";

export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export const AWS_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

const AWS_RETRY_PATTERN =
  /throttl|rate exceeded|503|504|timeout|ECONNRESET|ETIMEDOUT|socket hang up|TooManyRequestsException|ServiceUnavailable|RequestLimitExceeded/i;

const AWS_RETRYABLE_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalFailure",
  "InternalServiceError",
  "EC2ThrottledException",
  "RequestThrottled",
  "RequestTimeout",
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
]);

export function resolveRetryConfig(overrides?: RetryConfig): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? AWS_RETRY_DEFAULTS.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? AWS_RETRY_DEFAULTS.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? AWS_RETRY_DEFAULTS.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? AWS_RETRY_DEFAULTS.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

function httpStatusOf(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

/**
 * Retry-After delay from a throttled SDK v3 response, in milliseconds
 */
export function getAWSRetryAfterMs(err: unknown): number | undefined {
  const status = httpStatusOf(err);
  if (status !== 429 && status !== 503) return undefined;
  if (!err || typeof err !== "object" || !("$response" in err)) return undefined;

  const response = err.$response;
  if (!response || typeof response !== "object" || !("headers" in response)) return undefined;
  const headers = response.headers;
  if (!headers || typeof headers !== "object" || !("retry-after" in headers)) return undefined;

  const retryAfter = headers["retry-after"];
  if (typeof retryAfter !== "string") return undefined;
  const seconds = parseInt(retryAfter, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

export function shouldRetryAWSError(err: unknown): boolean {
  if (!err) return false;

  const code = extractErrorCode(err);
  if (code && AWS_RETRYABLE_CODES.has(code)) return true;

  if (err instanceof Error && AWS_RETRYABLE_CODES.has(err.name)) return true;

  const status = httpStatusOf(err);
  if (status === 429 || status === 500 || status === 502 || status === 503 || status === 504) {
    return true;
  }

  return AWS_RETRY_PATTERN.test(formatErrorMessage(err));
}

export type AWSRetryOptions = {
  retry?: RetryConfig;
  label?: string;
  logger?: ReportLogger;
  onRetry?: (info: RetryInfo) => void;
};

/**
 * Execute an AWS operation with retry logic
 *
 * @example
 * ```typescript
 * const result = await withAWSRetry(
 *   () => workspaces.send(new DescribeWorkspacesCommand({})),
 *   { label: "DescribeWorkspaces" }
 * );
 * ```
 */
export async function withAWSRetry<T>(fn: () => Promise<T>, options: AWSRetryOptions = {}): Promise<T> {
  const { attempts, minDelayMs, maxDelayMs, jitter } = resolveRetryConfig(options.retry);
  let lastErr: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= attempts || !shouldRetryAWSError(err)) break;

      const retryAfterMs = getAWSRetryAfterMs(err);
      const baseDelay = retryAfterMs !== undefined
        ? Math.max(retryAfterMs, minDelayMs)
        : minDelayMs * 2 ** (attempt - 1);
      let delay = applyJitter(Math.min(baseDelay, maxDelayMs), jitter);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      const info: RetryInfo = { attempt, maxAttempts: attempts, delayMs: delay, err, label: options.label };
      options.logger?.warn(
        `${options.label ?? "operation"} retry ${attempt}/${attempts} after ${formatErrorMessage(err)}, waiting ${delay}ms`,
      );
      options.onRetry?.(info);
      await sleep(delay);
    }
  }

  throw lastErr ?? new Error("Retry failed");
}
