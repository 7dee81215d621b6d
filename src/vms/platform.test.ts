import { describe, it, expect } from "vitest";
import { isLinuxVM } from "./platform.js";
import type { VirtualMachineSpec } from "./types.js";

const base: VirtualMachineSpec = { name: "vm-1", location: "eastus" };

describe("isLinuxVM", () => {
  it("trusts the OS disk type first", () => {
    expect(isLinuxVM({ ...base, storageProfile: { osDisk: { createOption: "FromImage", osType: "Linux" } } })).toBe(true);
    expect(
      isLinuxVM({
        ...base,
        storageProfile: { osDisk: { createOption: "FromImage", osType: "Windows" } },
        osProfile: { linuxConfiguration: { disablePasswordAuthentication: true } },
      }),
    ).toBe(false);
  });

  it("falls back to the Linux OS profile section", () => {
    expect(isLinuxVM({ ...base, osProfile: { linuxConfiguration: {} } })).toBe(true);
  });

  it("defaults to not Linux", () => {
    expect(isLinuxVM(base)).toBe(false);
    expect(isLinuxVM({ ...base, osProfile: { windowsConfiguration: {} } })).toBe(false);
    expect(isLinuxVM(undefined)).toBe(false);
  });
});
