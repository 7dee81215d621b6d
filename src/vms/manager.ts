/**
 * VM Manager
 *
 * Submits VM create-or-update requests via @azure/arm-compute.
 */

import type { VirtualMachine } from "@azure/arm-compute";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions, PluginLogger } from "../types.js";
import { formatErrorMessage, withAzureRetry } from "../retry.js";
import type { ComputeClientLike, VMCreateOperationResult } from "./types.js";

// =============================================================================
// AzureVMManager
// =============================================================================

export class AzureVMManager implements ComputeClientLike {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;
  private retryOptions: AzureRetryOptions;
  private logger?: PluginLogger;

  constructor(
    credentialsManager: AzureCredentialsManager,
    subscriptionId: string,
    retryOptions?: AzureRetryOptions,
    logger?: PluginLogger,
  ) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions ?? {};
    this.logger = logger;
  }

  private async getComputeClient() {
    const { credential } = await this.credentialsManager.getCredential();
    const { ComputeManagementClient } = await import("@azure/arm-compute");
    return new ComputeManagementClient(credential, this.subscriptionId);
  }

  /**
   * Create (or update) a VM and wait for the operation to settle.
   * Rejects when the service reports the operation as failed.
   */
  async createOrUpdateVM(
    resourceGroup: string,
    vmName: string,
    parameters: VirtualMachine,
  ): Promise<VMCreateOperationResult> {
    const client = await this.getComputeClient();
    const startedAt = new Date().toISOString();

    this.logger?.debug?.(`compute: create-or-update ${resourceGroup}/${vmName}`);
    let operationId: string | undefined;
    const poller = await withAzureRetry(
      () =>
        client.virtualMachines.beginCreateOrUpdate(resourceGroup, vmName, parameters, {
          onResponse: (response) => {
            // first response is the submission; later ones are polls
            if (!operationId) operationId = response.headers.get("x-ms-request-id") ?? undefined;
          },
        }),
      this.retryOptions,
    );
    const vm = await poller.pollUntilDone();
    const state = poller.getOperationState();

    return {
      status: state.status,
      operationId,
      vmName: vm.name ?? vmName,
      vmId: vm.id,
      provisioningState: vm.provisioningState,
      startedAt,
      completedAt: new Date().toISOString(),
      error: state.error ? formatErrorMessage(state.error) : undefined,
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createVMManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  logger?: PluginLogger,
): AzureVMManager {
  return new AzureVMManager(credentialsManager, subscriptionId, retryOptions, logger);
}
