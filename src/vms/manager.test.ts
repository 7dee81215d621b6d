/**
 * VM Manager: Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureVMManager } from "./manager.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";

// ---------------------------------------------------------------------------
// Mock Azure SDK
// ---------------------------------------------------------------------------

const mockVMs = { beginCreateOrUpdate: vi.fn() };

vi.mock("@azure/arm-compute", () => ({
  ComputeManagementClient: vi.fn().mockImplementation(function () {
    return { virtualMachines: mockVMs };
  }),
}));

const mockCredentialsManager = {
  getCredential: vi.fn().mockResolvedValue({ credential: { getToken: vi.fn() }, method: "default" }),
  getSubscriptionId: () => "sub-1",
  getTenantId: () => undefined,
  clearCache: vi.fn(),
} as unknown as AzureCredentialsManager;

function makePoller(result: unknown, state: Record<string, unknown>) {
  return {
    pollUntilDone: vi.fn().mockResolvedValue(result),
    getOperationState: vi.fn().mockReturnValue(state),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("AzureVMManager", () => {
  let mgr: AzureVMManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AzureVMManager(mockCredentialsManager, "sub-1", { maxAttempts: 1 });
  });

  it("submits the request and maps the finished operation", async () => {
    const vmId = "/subscriptions/sub-1/resourceGroups/rg-1/providers/Microsoft.Compute/virtualMachines/vm-1";
    mockVMs.beginCreateOrUpdate.mockResolvedValue(
      makePoller({ id: vmId, name: "vm-1", provisioningState: "Succeeded" }, { status: "succeeded" }),
    );

    const params = { location: "eastus", hardwareProfile: { vmSize: "Standard_B2s" } };
    const result = await mgr.createOrUpdateVM("rg-1", "vm-1", params);

    expect(mockVMs.beginCreateOrUpdate).toHaveBeenCalledWith("rg-1", "vm-1", params, expect.any(Object));
    expect(result).toMatchObject({
      status: "succeeded",
      vmName: "vm-1",
      vmId,
      provisioningState: "Succeeded",
      error: undefined,
    });
    expect(Date.parse(result.startedAt)).not.toBeNaN();
    expect(Date.parse(result.completedAt)).toBeGreaterThanOrEqual(Date.parse(result.startedAt));
  });

  it("records the request id of the submission as the operation id", async () => {
    const headers = (requestId: string) => ({
      get: (name: string) => (name === "x-ms-request-id" ? requestId : undefined),
    });
    mockVMs.beginCreateOrUpdate.mockImplementation(
      async (_rg: string, _name: string, _params: unknown, options: { onResponse: (response: unknown) => void }) => {
        options.onResponse({ headers: headers("req-submit") });
        options.onResponse({ headers: headers("req-poll") });
        return makePoller({ name: "vm-1", provisioningState: "Succeeded" }, { status: "succeeded" });
      },
    );

    const result = await mgr.createOrUpdateVM("rg-1", "vm-1", { location: "eastus" });
    expect(result.operationId).toBe("req-submit");
  });

  it("leaves the operation id unset when no response carried one", async () => {
    mockVMs.beginCreateOrUpdate.mockResolvedValue(makePoller({ name: "vm-1" }, { status: "succeeded" }));
    const result = await mgr.createOrUpdateVM("rg-1", "vm-1", { location: "eastus" });
    expect(result.operationId).toBeUndefined();
  });

  it("carries the operation error text", async () => {
    mockVMs.beginCreateOrUpdate.mockResolvedValue(
      makePoller({ name: "vm-1" }, { status: "canceled", error: new Error("operation canceled") }),
    );
    const result = await mgr.createOrUpdateVM("rg-1", "vm-1", { location: "eastus" });
    expect(result.status).toBe("canceled");
    expect(result.error).toBe("operation canceled");
  });

  it("propagates a failed operation", async () => {
    mockVMs.beginCreateOrUpdate.mockResolvedValue({
      pollUntilDone: vi.fn().mockRejectedValue(new Error("AllocationFailed")),
      getOperationState: vi.fn(),
    });
    await expect(mgr.createOrUpdateVM("rg-1", "vm-1", { location: "eastus" })).rejects.toThrow("AllocationFailed");
  });

  it("propagates a rejected submission", async () => {
    mockVMs.beginCreateOrUpdate.mockRejectedValue({ statusCode: 400, code: "InvalidParameter", message: "bad size" });
    await expect(mgr.createOrUpdateVM("rg-1", "vm-1", { location: "eastus" })).rejects.toMatchObject({ code: "InvalidParameter" });
  });
});
