/**
 * Shared mutable state for the CLI.
 *
 * Manager references live on a single object so the registered commands can
 * capture it by reference. The lifecycle (start/stop) populates and clears
 * it; commands read from it when they run.
 */

import type { ProvisionerConfig } from "./config.js";
import type { AzureCredentialsManager } from "./credentials/index.js";
import type { AzureContextManager } from "./context/index.js";
import type { AzureStorageManager } from "./storage/index.js";
import type { AzureVMManager } from "./vms/index.js";
import type { AzureVMExtensionManager } from "./vm-extensions/index.js";
import type { PluginLogger } from "./types.js";

export interface ProvisionerState {
  config: ProvisionerConfig;
  logger: PluginLogger | null;

  credentialsManager: AzureCredentialsManager | null;
  contextManager: AzureContextManager | null;
  storageManager: AzureStorageManager | null;
  vmManager: AzureVMManager | null;
  extensionManager: AzureVMExtensionManager | null;
}

export function createPluginState(config: ProvisionerConfig): ProvisionerState {
  return {
    config,
    logger: null,
    credentialsManager: null,
    contextManager: null,
    storageManager: null,
    vmManager: null,
    extensionManager: null,
  };
}

export function clearPluginState(state: ProvisionerState): void {
  state.credentialsManager?.clearCache();
  state.credentialsManager = null;
  state.contextManager = null;
  state.storageManager = null;
  state.vmManager = null;
  state.extensionManager = null;
}
