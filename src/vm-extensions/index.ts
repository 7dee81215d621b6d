export { AzureVMExtensionManager, createVMExtensionManager } from "./manager.js";
