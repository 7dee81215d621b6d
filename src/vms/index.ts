export { AzureVMManager, createVMManager } from "./manager.js";
export { createVirtualMachine, buildCreateParameters } from "./create.js";
export type { VMCreateDependencies } from "./create.js";
export { isLinuxVM } from "./platform.js";

export type {
  VirtualMachineSpec,
  VMOperationStatus,
  VMCreateOperationResult,
  VMCreateRequest,
  VMCreateResult,
  ComputeClientLike,
} from "./types.js";
export { loadVMTemplate, parseVMTemplate, vmTemplateSchema, VMTemplateError } from "./template.js";
