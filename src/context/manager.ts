/**
 * Session Context: active subscription and its display name
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";

// =============================================================================
// Types
// =============================================================================

export type AzureSessionContext = {
  subscriptionId: string;
  subscriptionName: string;
  tenantId?: string;
};

/** What the boot-diagnostics naming needs from the session. */
export interface SubscriptionInfoProvider {
  getSubscriptionName(): Promise<string>;
}

// =============================================================================
// Context Manager
// =============================================================================

export class AzureContextManager implements SubscriptionInfoProvider {
  private credentialsManager: AzureCredentialsManager;
  private retryOptions: AzureRetryOptions;
  private currentContext: AzureSessionContext | null = null;

  constructor(credentialsManager: AzureCredentialsManager, retryOptions?: AzureRetryOptions) {
    this.credentialsManager = credentialsManager;
    this.retryOptions = retryOptions ?? {};
  }

  /**
   * Resolve the active subscription, looking up its display name once.
   */
  async initialize(): Promise<AzureSessionContext> {
    if (this.currentContext) return this.currentContext;

    const { credential, subscriptionId, tenantId } = await this.credentialsManager.getCredential();
    if (!subscriptionId) {
      throw new Error("No subscription selected: set AZURE_SUBSCRIPTION_ID or defaultSubscription");
    }

    const { SubscriptionClient } = await import("@azure/arm-subscriptions");
    const client = new SubscriptionClient(credential);
    const subscription = await withAzureRetry(
      () => client.subscriptions.get(subscriptionId),
      this.retryOptions,
    );

    this.currentContext = {
      subscriptionId,
      subscriptionName: subscription.displayName ?? subscriptionId,
      tenantId: subscription.tenantId ?? tenantId,
    };
    return this.currentContext;
  }

  async getSubscriptionName(): Promise<string> {
    const context = await this.initialize();
    return context.subscriptionName;
  }

  getSubscriptionId(): string {
    return this.currentContext?.subscriptionId ?? this.credentialsManager.getSubscriptionId() ?? "";
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createContextManager(
  credentialsManager: AzureCredentialsManager,
  retryOptions?: AzureRetryOptions,
): AzureContextManager {
  return new AzureContextManager(credentialsManager, retryOptions);
}
