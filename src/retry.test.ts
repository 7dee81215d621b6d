/**
 * Retry and Error Utilities: Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  shouldRetryAzureError,
  getAzureRetryAfterMs,
  isAzureNotFoundError,
  withAzureRetry,
  formatErrorMessage,
  AZURE_RETRYABLE_CODES,
} from "./retry.js";

describe("isAzureNotFoundError", () => {
  it("recognises HTTP 404", () => {
    expect(isAzureNotFoundError({ statusCode: 404 })).toBe(true);
  });

  it("recognises NotFound error codes", () => {
    expect(isAzureNotFoundError({ code: "ResourceNotFound" })).toBe(true);
    expect(isAzureNotFoundError({ code: "StorageAccountNotFound" })).toBe(true);
  });

  it("recognises ResourceNotFound in the message", () => {
    expect(isAzureNotFoundError(new Error("Code: ResourceNotFound, account missing"))).toBe(true);
  });

  it("rejects other failures", () => {
    expect(isAzureNotFoundError({ statusCode: 403, code: "AuthorizationFailed" })).toBe(false);
    expect(isAzureNotFoundError(new Error("socket hang up"))).toBe(false);
    expect(isAzureNotFoundError(null)).toBe(false);
  });
});

describe("shouldRetryAzureError", () => {
  it("returns false for null/undefined", () => {
    expect(shouldRetryAzureError(null)).toBe(false);
    expect(shouldRetryAzureError(undefined)).toBe(false);
  });

  it("retries known Azure error codes", () => {
    for (const code of AZURE_RETRYABLE_CODES) {
      expect(shouldRetryAzureError({ code })).toBe(true);
    }
  });

  it("retries HTTP 429 and 5xx", () => {
    expect(shouldRetryAzureError({ statusCode: 429 })).toBe(true);
    expect(shouldRetryAzureError({ statusCode: 503 })).toBe(true);
    expect(shouldRetryAzureError({ status: 500 })).toBe(true);
  });

  it("does not retry other 4xx", () => {
    expect(shouldRetryAzureError({ statusCode: 400 })).toBe(false);
    expect(shouldRetryAzureError({ statusCode: 404 })).toBe(false);
  });

  it("retries errors with retryable message patterns", () => {
    expect(shouldRetryAzureError({ message: "Too Many Requests" })).toBe(true);
    expect(shouldRetryAzureError({ message: "socket hang up" })).toBe(true);
    expect(shouldRetryAzureError({ message: "Invalid parameter" })).toBe(false);
  });
});

describe("getAzureRetryAfterMs", () => {
  it("returns null without headers", () => {
    expect(getAzureRetryAfterMs(null)).toBe(null);
    expect(getAzureRetryAfterMs({ message: "error" })).toBe(null);
    expect(getAzureRetryAfterMs({ headers: {} })).toBe(null);
  });

  it("parses numeric retry-after (seconds)", () => {
    expect(getAzureRetryAfterMs({ headers: { "retry-after": "5" } })).toBe(5000);
  });
});

describe("withAzureRetry", () => {
  it("makes a single attempt by default", async () => {
    const error = { code: "ServiceUnavailable", statusCode: 503, message: "Down" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withAzureRetry(fn)).rejects.toEqual(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries on retryable error when more attempts are configured", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce({ code: "TooManyRequests", statusCode: 429 })
      .mockResolvedValue("ok");

    const result = await withAzureRetry(fn, { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 10 });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry non-retryable errors", async () => {
    const error = { code: "ResourceNotFound", statusCode: 404, message: "Not found" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(
      withAzureRetry(fn, { maxAttempts: 3, minDelayMs: 1, maxDelayMs: 10 }),
    ).rejects.toEqual(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("formatErrorMessage", () => {
  it("handles null and strings", () => {
    expect(formatErrorMessage(null)).toBe("Unknown error");
    expect(formatErrorMessage("boom")).toBe("boom");
  });

  it("formats error with code and status", () => {
    expect(formatErrorMessage({ code: "Forbidden", statusCode: 403, message: "Access denied" }))
      .toBe("[Forbidden] (HTTP 403) Access denied");
  });

  it("formats a plain Error", () => {
    expect(formatErrorMessage(new Error("quota exceeded"))).toBe("quota exceeded");
  });
});
