/**
 * Storage: Type Definitions
 */

export type StorageSkuName =
  | "Standard_LRS"
  | "Standard_GRS"
  | "Standard_RAGRS"
  | "Standard_ZRS"
  | "Standard_GZRS"
  | "Standard_RAGZRS"
  | "Premium_LRS"
  | "Premium_ZRS";

export type StorageSkuTier = "Standard" | "Premium";

/** The parts of a storage account boot diagnostics cares about. */
export type StorageAccountRef = {
  name: string;
  location: string;
  /** Account type. Absent when the service did not report one. */
  sku?: string;
  tier?: string;
  primaryBlobEndpoint?: string;
};

export type StorageAccountCreateOptions = {
  resourceGroup: string;
  name: string;
  location: string;
  sku: StorageSkuName;
  tags?: Record<string, string>;
};

/** Storage operations the boot-diagnostics resolver consumes. */
export interface StorageClientLike {
  /** Throws {@link StorageAccountNotFoundError} when the account does not exist. */
  getAccount(resourceGroup: string, name: string): Promise<StorageAccountRef>;
  listAccounts(resourceGroup: string): Promise<StorageAccountRef[]>;
  isNameAvailable(name: string): Promise<boolean>;
  createAccount(options: StorageAccountCreateOptions): Promise<void>;
}

export class StorageAccountNotFoundError extends Error {
  readonly accountName: string;
  readonly resourceGroup: string;

  constructor(resourceGroup: string, accountName: string, cause?: unknown) {
    super(`Storage account '${accountName}' was not found in resource group '${resourceGroup}'`, { cause });
    this.name = "StorageAccountNotFoundError";
    this.accountName = accountName;
    this.resourceGroup = resourceGroup;
  }
}

/** Premium accounts cannot hold boot diagnostics blobs. */
export function isPremiumAccount(account: StorageAccountRef): boolean {
  return account.tier === "Premium" || (account.sku?.startsWith("Premium_") ?? false);
}
