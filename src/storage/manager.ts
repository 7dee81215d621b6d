/**
 * Storage Manager
 *
 * Storage account lookups and creation via @azure/arm-storage.
 */
import type { StorageAccount } from "@azure/arm-storage";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions, PluginLogger } from "../types.js";
import { isAzureNotFoundError, withAzureRetry } from "../retry.js";
import {
  StorageAccountNotFoundError,
  type StorageAccountCreateOptions,
  type StorageAccountRef,
  type StorageClientLike,
} from "./types.js";

export class AzureStorageManager implements StorageClientLike {
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

  private async getStorageClient() {
    const { credential } = await this.credentialsManager.getCredential();
    const { StorageManagementClient } = await import("@azure/arm-storage");
    return new StorageManagementClient(credential, this.subscriptionId);
  }

  async getAccount(resourceGroup: string, name: string): Promise<StorageAccountRef> {
    const client = await this.getStorageClient();
    this.logger?.debug?.(`storage: get properties ${resourceGroup}/${name}`);
    try {
      const account = await withAzureRetry(
        () => client.storageAccounts.getProperties(resourceGroup, name),
        this.retryOptions,
      );
      return toAccountRef(account);
    } catch (error) {
      if (isAzureNotFoundError(error)) throw new StorageAccountNotFoundError(resourceGroup, name, error);
      throw error;
    }
  }

  /**
   * List every storage account in a resource group.
   */
  async listAccounts(resourceGroup: string): Promise<StorageAccountRef[]> {
    const client = await this.getStorageClient();
    this.logger?.debug?.(`storage: list accounts in ${resourceGroup}`);
    return withAzureRetry(async () => {
      const accounts: StorageAccountRef[] = [];
      for await (const account of client.storageAccounts.listByResourceGroup(resourceGroup)) {
        accounts.push(toAccountRef(account));
      }
      return accounts;
    }, this.retryOptions);
  }

  async isNameAvailable(name: string): Promise<boolean> {
    const client = await this.getStorageClient();
    const result = await withAzureRetry(
      () => client.storageAccounts.checkNameAvailability({ name, type: "Microsoft.Storage/storageAccounts" }),
      this.retryOptions,
    );
    this.logger?.debug?.(`storage: name ${name} available=${String(result.nameAvailable)}`);
    return result.nameAvailable ?? false;
  }

  /**
   * Create a storage account and wait for provisioning to finish.
   */
  async createAccount(options: StorageAccountCreateOptions): Promise<void> {
    const client = await this.getStorageClient();
    this.logger?.debug?.(`storage: create ${options.resourceGroup}/${options.name} (${options.sku}, ${options.location})`);
    await withAzureRetry(
      () =>
        client.storageAccounts.beginCreateAndWait(options.resourceGroup, options.name, {
          location: options.location,
          kind: "StorageV2",
          sku: { name: options.sku },
          enableHttpsTrafficOnly: true,
          minimumTlsVersion: "TLS1_2",
          tags: options.tags,
        }),
      this.retryOptions,
    );
  }
}

function toAccountRef(account: StorageAccount): StorageAccountRef {
  return {
    name: account.name ?? "",
    location: account.location ?? "",
    sku: account.sku?.name,
    tier: account.sku?.tier,
    primaryBlobEndpoint: account.primaryEndpoints?.blob,
  };
}

export function createStorageManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  logger?: PluginLogger,
): AzureStorageManager {
  return new AzureStorageManager(credentialsManager, subscriptionId, retryOptions, logger);
}
