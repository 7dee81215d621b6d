/**
 * Service lifecycle: builds every manager from config on start and
 * drops them on stop.
 */

import type { ProvisionerState } from "./plugin-state.js";
import { clearPluginState } from "./plugin-state.js";
import type { AzureRetryOptions } from "./types.js";
import type { VMCreateDependencies } from "./vms/create.js";
import { createCredentialsManagerFromConfig } from "./credentials/index.js";
import { createContextManager } from "./context/index.js";
import { createStorageManager } from "./storage/index.js";
import { createVMManager } from "./vms/index.js";
import { createVMExtensionManager } from "./vm-extensions/index.js";

export function startServices(state: ProvisionerState): void {
  const config = state.config;
  const subscriptionId = config.defaultSubscription;
  if (!subscriptionId) {
    throw new Error("No subscription configured: set AZURE_SUBSCRIPTION_ID or defaultSubscription");
  }

  const retryOpts: AzureRetryOptions | undefined = config.retryConfig
    ? {
        maxAttempts: config.retryConfig.maxAttempts,
        minDelayMs: config.retryConfig.minDelayMs,
        maxDelayMs: config.retryConfig.maxDelayMs,
      }
    : undefined;
  const logger = state.logger ?? undefined;

  state.credentialsManager = createCredentialsManagerFromConfig(config);
  state.contextManager = createContextManager(state.credentialsManager, retryOpts);
  state.storageManager = createStorageManager(state.credentialsManager, subscriptionId, retryOpts, logger);
  state.vmManager = createVMManager(state.credentialsManager, subscriptionId, retryOpts, logger);
  state.extensionManager = createVMExtensionManager(state.credentialsManager, subscriptionId, retryOpts, logger);

  logger?.debug?.(`Managers ready for subscription ${subscriptionId}`);
}

export function stopServices(state: ProvisionerState): void {
  clearPluginState(state);
}

/**
 * Dependencies for {@link createVirtualMachine}, or an error if the
 * services were not started.
 */
export function getCreateDependencies(state: ProvisionerState): VMCreateDependencies {
  const { vmManager, extensionManager, storageManager, contextManager } = state;
  if (!vmManager || !extensionManager || !storageManager || !contextManager) {
    throw new Error("Services not started");
  }
  return {
    compute: vmManager,
    extensions: extensionManager,
    storage: storageManager,
    session: contextManager,
    logger: state.logger ?? undefined,
  };
}
