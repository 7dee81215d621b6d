/**
 * Retry and Error Utilities
 *
 * Error classification for ARM responses, plus an exponential-backoff runner
 * the client wrappers use. The runner defaults to a single attempt; extra
 * attempts only happen when `retryConfig.maxAttempts` asks for them.
 */

import type { AzureRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 1,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
]);

// =============================================================================
// Error Inspection
// =============================================================================

type ErrorFields = {
  code?: string;
  statusCode?: number;
  message?: string;
  headers?: Record<string, string>;
};

function readErrorFields(error: unknown): ErrorFields {
  if (typeof error !== "object" || error === null) return {};
  const fields: ErrorFields = {};
  if ("code" in error && typeof error.code === "string") fields.code = error.code;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    fields.statusCode = error.statusCode;
  } else if ("status" in error && typeof error.status === "number") {
    fields.statusCode = error.status;
  }
  if ("message" in error && typeof error.message === "string") fields.message = error.message;
  if ("headers" in error && typeof error.headers === "object" && error.headers !== null) {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(error.headers)) {
      if (typeof value === "string") headers[key] = value;
    }
    fields.headers = headers;
  }
  return fields;
}

/**
 * Whether an ARM error means the target resource does not exist.
 */
export function isAzureNotFoundError(error: unknown): boolean {
  const { code, statusCode, message } = readErrorFields(error);
  if (statusCode === 404) return true;
  if (code && /NotFound$/i.test(code)) return true;
  return (message ?? "").includes("ResourceNotFound");
}

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  const { code, statusCode, message } = readErrorFields(error);
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  if (statusCode === 429) return true;
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) return true;

  const text = (message ?? "").toLowerCase();
  const retryablePatterns = [
    "throttl",
    "too many requests",
    "server busy",
    "temporarily unavailable",
    "socket hang up",
    "econnreset",
    "etimedout",
  ];
  return retryablePatterns.some((pattern) => text.includes(pattern));
}

/**
 * Extract the Retry-After header value from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const { headers } = readErrorFields(error);
  if (!headers) return null;

  const retryAfter = headers["retry-after"] ?? headers["Retry-After"];
  if (!retryAfter) return null;

  // Seconds or an HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

/**
 * Execute a function with Azure-specific retry logic.
 */
export async function withAzureRetry<T>(
  fn: () => Promise<T>,
  options?: AzureRetryOptions,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = retryAfterMs;
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const { code, statusCode, message } = readErrorFields(error);

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message ?? "Unknown error");

  return parts.join(" ");
}
