export { AzureContextManager, createContextManager } from "./manager.js";
export type { AzureSessionContext, SubscriptionInfoProvider } from "./manager.js";
