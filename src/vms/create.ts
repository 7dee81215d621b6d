/**
 * VM creation with boot diagnostics and the BGInfo extension.
 */

import type { VirtualMachine } from "@azure/arm-compute";
import type { SubscriptionInfoProvider } from "../context/manager.js";
import type { StorageClientLike } from "../storage/types.js";
import { resolveBootDiagnosticsStorage } from "../bootdiag/resolver.js";
import { selectBginfoVersion } from "../bginfo/selector.js";
import {
  createBginfoExtensionSpec,
  type ExtensionImageClientLike,
  type VMExtensionClientLike,
} from "../bginfo/types.js";
import { formatErrorMessage } from "../retry.js";
import { pushNotice, type Notice, type PluginLogger } from "../types.js";
import { isLinuxVM } from "./platform.js";
import type { ComputeClientLike, VMCreateRequest, VMCreateResult, VirtualMachineSpec } from "./types.js";

export type VMCreateDependencies = {
  compute: ComputeClientLike;
  extensions: ExtensionImageClientLike & VMExtensionClientLike;
  storage: StorageClientLike;
  session: SubscriptionInfoProvider;
  logger?: PluginLogger;
  now?: () => Date;
};

/**
 * The ARM request body for a template. Never mutates the template.
 */
export function buildCreateParameters(
  vm: VirtualMachineSpec,
  location: string | undefined,
  tags: Record<string, string> | undefined,
): VirtualMachine {
  return {
    location: location || vm.location,
    hardwareProfile: vm.hardwareProfile,
    storageProfile: vm.storageProfile,
    networkProfile: vm.networkProfile,
    osProfile: vm.osProfile,
    diagnosticsProfile: vm.diagnosticsProfile,
    plan: vm.plan,
    availabilitySet: vm.availabilitySet,
    tags: tags ?? vm.tags,
  };
}

async function installBginfo(
  deps: VMCreateDependencies,
  resourceGroup: string,
  vmName: string,
  location: string,
  notices: Notice[],
): Promise<VMCreateResult["extension"]> {
  try {
    const version = await selectBginfoVersion(deps.extensions, location, deps.logger);
    if (!version) return undefined;

    const extension = createBginfoExtensionSpec(location, version);
    await deps.extensions.createOrUpdateExtension(resourceGroup, vmName, extension);
    deps.logger?.info(`Installed ${extension.name} ${version} on ${vmName}`);
    return { name: extension.name, version };
  } catch (error) {
    pushNotice(notices, {
      level: "warning",
      code: "bginfo-extension-failed",
      message: `BGInfo extension was not installed on '${vmName}': ${formatErrorMessage(error)}`,
    }, deps.logger);
    return undefined;
  }
}

/**
 * Create a VM from a template.
 *
 * Templates without a diagnostics profile get boot diagnostics when a
 * storage account can be found or created. Windows VMs get the BGInfo
 * extension unless disabled. Failures on either of those paths surface as
 * notices; a failed VM creation rejects.
 */
export async function createVirtualMachine(
  deps: VMCreateDependencies,
  request: VMCreateRequest,
): Promise<VMCreateResult> {
  const { resourceGroup, vm } = request;
  const location = request.location || vm.location;
  const notices: Notice[] = [];

  let template = vm;
  let diagnostics: VMCreateResult["diagnostics"];

  if (!vm.diagnosticsProfile) {
    const resolved = await resolveBootDiagnosticsStorage(
      { storage: deps.storage, session: deps.session, logger: deps.logger, now: deps.now },
      { resourceGroup, location, vm },
    );
    notices.push(...resolved.notices);

    if (resolved.value) {
      diagnostics = resolved.value;
      template = {
        ...vm,
        diagnosticsProfile: {
          bootDiagnostics: { enabled: true, storageUri: resolved.value.storageUri },
        },
      };
    }
  }

  const parameters = buildCreateParameters(template, request.location, request.tags);
  deps.logger?.info(`Creating VM ${vm.name} in ${resourceGroup} (${parameters.location})`);
  const operation = await deps.compute.createOrUpdateVM(resourceGroup, vm.name, parameters);

  let extension: VMCreateResult["extension"];
  if (!request.disableBginfoExtension && !isLinuxVM(vm)) {
    extension = await installBginfo(deps, resourceGroup, vm.name, location, notices);
  }

  return { operation, diagnostics, extension, notices };
}
