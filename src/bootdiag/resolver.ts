/**
 * Boot Diagnostics Storage Resolver
 *
 * Chooses the storage account that receives boot diagnostics for a new VM:
 * the account behind the OS disk VHD, else an existing standard account in
 * the resource group, else a freshly created Standard_GRS account.
 */

import type { SubscriptionInfoProvider } from "../context/manager.js";
import { formatErrorMessage } from "../retry.js";
import {
  StorageAccountNotFoundError,
  isPremiumAccount,
  type StorageAccountRef,
  type StorageClientLike,
} from "../storage/types.js";
import { pushNotice, type Notice, type NoticedResult, type PluginLogger } from "../types.js";
import type { VirtualMachineSpec } from "../vms/types.js";
import { pickStorageAccountName } from "./naming.js";

export type BootDiagnosticsStorage = {
  storageUri: string;
  accountName: string;
  source: "os-disk" | "existing" | "created";
};

export type ResolverDependencies = {
  storage: StorageClientLike;
  session: SubscriptionInfoProvider;
  logger?: PluginLogger;
  now?: () => Date;
};

export type ResolverInput = {
  resourceGroup: string;
  /** Location for a new account; falls back to the VM's own location. */
  location?: string;
  vm: VirtualMachineSpec;
};

/**
 * Storage account name from a blob URI: the host up to the first dot.
 * Returns undefined for anything that is not an absolute URI with a dotted host.
 */
export function storageAccountNameFromUri(uri: string): string | undefined {
  let host: string;
  try {
    host = new URL(uri).hostname;
  } catch {
    return undefined;
  }
  const index = host.indexOf(".");
  return index > 0 ? host.slice(0, index) : undefined;
}

function usableEndpoint(account: StorageAccountRef): string | undefined {
  if (isPremiumAccount(account)) return undefined;
  return account.primaryBlobEndpoint || undefined;
}

async function fromOsDisk(
  deps: ResolverDependencies,
  input: ResolverInput,
  notices: Notice[],
): Promise<BootDiagnosticsStorage | undefined> {
  const vhdUri = input.vm.storageProfile?.osDisk?.vhd?.uri;
  if (!vhdUri) return undefined;

  const accountName = storageAccountNameFromUri(vhdUri);
  if (!accountName) {
    deps.logger?.debug?.(`bootdiag: cannot read an account name from ${vhdUri}`);
    return undefined;
  }

  try {
    const account = await deps.storage.getAccount(input.resourceGroup, accountName);
    const storageUri = usableEndpoint(account);
    if (storageUri) return { storageUri, accountName: account.name || accountName, source: "os-disk" };
  } catch (error) {
    if (error instanceof StorageAccountNotFoundError) {
      pushNotice(notices, {
        level: "warning",
        code: "storage-account-not-found",
        message: `Storage account '${accountName}' referenced by the OS disk was not found; boot diagnostics will use another account.`,
      }, deps.logger);
    } else {
      pushNotice(notices, {
        level: "warning",
        code: "storage-account-lookup-failed",
        message: `Could not read storage account '${accountName}' for boot diagnostics: ${formatErrorMessage(error)}`,
      }, deps.logger);
    }
  }
  return undefined;
}

async function fromResourceGroup(
  deps: ResolverDependencies,
  input: ResolverInput,
  notices: Notice[],
): Promise<BootDiagnosticsStorage | undefined> {
  const accounts = await deps.storage.listAccounts(input.resourceGroup);
  for (const account of accounts) {
    if (!account.sku && !account.tier) continue;
    const storageUri = usableEndpoint(account);
    if (!storageUri) continue;

    pushNotice(notices, {
      level: "warning",
      code: "reusing-storage-account",
      message: `Using existing storage account '${account.name}' for boot diagnostics.`,
    }, deps.logger);
    return { storageUri, accountName: account.name, source: "existing" };
  }
  return undefined;
}

async function createAccount(
  deps: ResolverDependencies,
  input: ResolverInput,
  notices: Notice[],
): Promise<BootDiagnosticsStorage | undefined> {
  const now = deps.now?.() ?? new Date();
  const location = input.location || input.vm.location;

  try {
    const subscriptionName = await deps.session.getSubscriptionName();
    const accountName = await pickStorageAccountName(
      { subscriptionName, resourceGroup: input.resourceGroup, vmName: input.vm.name },
      (name) => deps.storage.isNameAvailable(name),
      now,
    );

    await deps.storage.createAccount({
      resourceGroup: input.resourceGroup,
      name: accountName,
      location,
      sku: "Standard_GRS",
    });
    const account = await deps.storage.getAccount(input.resourceGroup, accountName);
    if (!account.primaryBlobEndpoint) {
      throw new Error(`storage account '${accountName}' reports no blob endpoint`);
    }

    pushNotice(notices, {
      level: "warning",
      code: "created-storage-account",
      message: `Created storage account '${accountName}' for boot diagnostics.`,
    }, deps.logger);
    return { storageUri: account.primaryBlobEndpoint, accountName, source: "created" };
  } catch (error) {
    pushNotice(notices, {
      level: "warning",
      code: "storage-account-create-failed",
      message: `Could not create a storage account for boot diagnostics; continuing without them: ${formatErrorMessage(error)}`,
    }, deps.logger);
    return undefined;
  }
}

/**
 * Resolve the boot diagnostics blob endpoint for a VM. An empty result means
 * boot diagnostics stay off; the notices say why. Only a failure to list the
 * resource group's accounts rejects.
 */
export async function resolveBootDiagnosticsStorage(
  deps: ResolverDependencies,
  input: ResolverInput,
): Promise<NoticedResult<BootDiagnosticsStorage>> {
  const notices: Notice[] = [];

  const value =
    (await fromOsDisk(deps, input, notices)) ??
    (await fromResourceGroup(deps, input, notices)) ??
    (await createAccount(deps, input, notices));

  return { value, notices };
}
