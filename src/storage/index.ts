export { AzureStorageManager, createStorageManager } from "./manager.js";
export { StorageAccountNotFoundError, isPremiumAccount } from "./types.js";
export type {
  StorageAccountRef,
  StorageAccountCreateOptions,
  StorageClientLike,
  StorageSkuName,
  StorageSkuTier,
} from "./types.js";
