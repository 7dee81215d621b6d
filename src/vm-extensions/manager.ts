/**
 * VM Extension Manager
 *
 * Extension image catalogue lookups and extension installation via
 * @azure/arm-compute.
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions, PluginLogger } from "../types.js";
import { withAzureRetry } from "../retry.js";
import type { ExtensionImageClientLike, ExtensionSpec, VMExtensionClientLike } from "../bginfo/types.js";

export class AzureVMExtensionManager implements ExtensionImageClientLike, VMExtensionClientLike {
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

  async listPublishers(location: string): Promise<string[]> {
    const client = await this.getComputeClient();
    const publishers = await withAzureRetry(
      () => client.virtualMachineImages.listPublishers(location),
      this.retryOptions,
    );
    return publishers.map((p) => p.name);
  }

  async listExtensionTypes(location: string, publisher: string): Promise<string[]> {
    const client = await this.getComputeClient();
    const types = await withAzureRetry(
      () => client.virtualMachineExtensionImages.listTypes(location, publisher),
      this.retryOptions,
    );
    return types.flatMap((t) => (t.name ? [t.name] : []));
  }

  async listExtensionVersions(location: string, publisher: string, type: string): Promise<string[]> {
    const client = await this.getComputeClient();
    const versions = await withAzureRetry(
      () => client.virtualMachineExtensionImages.listVersions(location, publisher, type),
      this.retryOptions,
    );
    return versions.flatMap((v) => (v.name ? [v.name] : []));
  }

  /**
   * Install (or update) an extension on a VM and wait for it to finish.
   */
  async createOrUpdateExtension(resourceGroup: string, vmName: string, extension: ExtensionSpec): Promise<void> {
    const client = await this.getComputeClient();
    this.logger?.debug?.(
      `compute: install ${extension.publisher}/${extension.type} ${extension.typeHandlerVersion} on ${resourceGroup}/${vmName}`,
    );
    await withAzureRetry(
      () =>
        client.virtualMachineExtensions.beginCreateOrUpdateAndWait(resourceGroup, vmName, extension.name, {
          location: extension.location,
          publisher: extension.publisher,
          typePropertiesType: extension.type,
          typeHandlerVersion: extension.typeHandlerVersion,
          autoUpgradeMinorVersion: extension.autoUpgradeMinorVersion,
        }),
      this.retryOptions,
    );
  }
}

export function createVMExtensionManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  logger?: PluginLogger,
): AzureVMExtensionManager {
  return new AzureVMExtensionManager(credentialsManager, subscriptionId, retryOptions, logger);
}
