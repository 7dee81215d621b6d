/**
 * Shared Types
 *
 * Core type definitions used across the compute, storage and BGInfo modules.
 */

// =============================================================================
// Common Configuration
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type AzureCredentialMethod = "default" | "cli" | "service-principal" | "managed-identity";

// =============================================================================
// Logging
// =============================================================================

/** Logger contract every manager and core routine accepts. */
export type PluginLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

// =============================================================================
// Notices
// =============================================================================

export type NoticeLevel = "info" | "warning";

export type NoticeCode =
  | "storage-account-not-found"
  | "storage-account-lookup-failed"
  | "reusing-storage-account"
  | "created-storage-account"
  | "storage-account-create-failed"
  | "bginfo-extension-failed";

/**
 * A non-fatal event on the diagnostics path. The operation degraded
 * (no diagnostics, no extension) but carried on.
 */
export type Notice = {
  level: NoticeLevel;
  code: NoticeCode;
  message: string;
};

/** Optional value plus the notices collected while producing it. */
export type NoticedResult<T> = {
  value?: T;
  notices: Notice[];
};

/** Records a notice and mirrors it to the logger, if any. */
export function pushNotice(
  notices: Notice[],
  notice: Notice,
  logger?: PluginLogger,
): void {
  notices.push(notice);
  if (!logger) return;
  if (notice.level === "warning") logger.warn(notice.message);
  else logger.info(notice.message);
}
