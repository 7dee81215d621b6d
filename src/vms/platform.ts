import type { VirtualMachineSpec } from "./types.js";

/**
 * Whether the template describes a Linux VM. The OS disk's declared type
 * wins; otherwise a Linux configuration block in the OS profile decides.
 */
export function isLinuxVM(vm: VirtualMachineSpec | undefined): boolean {
  if (!vm) return false;

  const osType = vm.storageProfile?.osDisk?.osType;
  if (osType) return osType.toLowerCase() === "linux";

  return Boolean(vm.osProfile?.linuxConfiguration);
}
