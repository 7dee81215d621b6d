/**
 * Library surface: the create flow and the Azure-backed managers behind it.
 */

export * from "./vms/index.js";
export * from "./bootdiag/index.js";
export * from "./bginfo/index.js";
export * from "./storage/index.js";
export * from "./vm-extensions/index.js";
export * from "./context/index.js";
export * from "./credentials/index.js";

export {
  configSchema,
  ConfigValidationError,
  getDefaultConfig,
  loadConfig,
  mergeConfig,
  parseConfig,
  configFromEnv,
} from "./config.js";
export type { ProvisionerConfig } from "./config.js";
export { createPluginState, clearPluginState } from "./plugin-state.js";
export type { ProvisionerState } from "./plugin-state.js";
export { startServices, stopServices, getCreateDependencies } from "./lifecycle.js";
export { registerVMCli, collectTag, formatCreateSummary } from "./register-cli.js";
export type { CliContext, VMCliHooks } from "./register-cli.js";
export { createConsoleLogger, theme } from "./logger.js";
export {
  AZURE_RETRY_DEFAULTS,
  formatErrorMessage,
  isAzureNotFoundError,
  shouldRetryAzureError,
  withAzureRetry,
} from "./retry.js";
export { pushNotice } from "./types.js";
export type {
  AzureCredentialMethod,
  AzureRetryOptions,
  Notice,
  NoticeCode,
  NoticeLevel,
  NoticedResult,
  PluginLogger,
} from "./types.js";
