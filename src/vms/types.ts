/**
 * VMs: Type Definitions
 */

import type {
  DiagnosticsProfile,
  HardwareProfile,
  NetworkProfile,
  OSProfile,
  Plan,
  StorageProfile,
  SubResource,
  VirtualMachine,
} from "@azure/arm-compute";
import type { Notice } from "../types.js";

// =============================================================================
// VM Template
// =============================================================================

/**
 * Caller-supplied VM template. Profile shapes are the ARM compute models, so
 * a template exported from the portal or another tool can be passed as-is.
 */
export type VirtualMachineSpec = {
  name: string;
  location: string;
  hardwareProfile?: HardwareProfile;
  storageProfile?: StorageProfile;
  networkProfile?: NetworkProfile;
  osProfile?: OSProfile;
  diagnosticsProfile?: DiagnosticsProfile;
  plan?: Plan;
  availabilitySet?: SubResource;
  tags?: Record<string, string>;
};

// =============================================================================
// VM Operations
// =============================================================================

export type VMOperationStatus = "notStarted" | "running" | "succeeded" | "failed" | "canceled";

/** Caller-facing view of the long-running create operation. */
export type VMCreateOperationResult = {
  status: VMOperationStatus;
  /** ARM request id of the submission (`x-ms-request-id`). */
  operationId?: string;
  vmName: string;
  vmId?: string;
  provisioningState?: string;
  startedAt: string;
  completedAt: string;
  error?: string;
};

/** Compute operations the create flow consumes. */
export interface ComputeClientLike {
  createOrUpdateVM(
    resourceGroup: string,
    vmName: string,
    parameters: VirtualMachine,
  ): Promise<VMCreateOperationResult>;
}

export type VMCreateRequest = {
  resourceGroup: string;
  /** Overrides the template's location when non-empty. */
  location?: string;
  vm: VirtualMachineSpec;
  /** Replaces the template's tags when given. */
  tags?: Record<string, string>;
  disableBginfoExtension?: boolean;
};

export type VMCreateResult = {
  operation: VMCreateOperationResult;
  /** Boot diagnostics storage attached by this call, if any. */
  diagnostics?: {
    storageUri: string;
    accountName: string;
    source: "os-disk" | "existing" | "created";
  };
  /** BGInfo version installed, if any. */
  extension?: { name: string; version: string };
  notices: Notice[];
};
