/**
 * Credentials Manager
 *
 * Resolves an @azure/identity TokenCredential for the management clients.
 * Supports the DefaultAzureCredential chain, Azure CLI, Service Principal and
 * Managed Identity.
 */

import type { TokenCredential } from "@azure/identity";
import type { ProvisionerConfig } from "../config.js";
import type { AzureCredentialMethod } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  defaultSubscription?: string;
  defaultTenantId?: string;
  credentialMethod?: AzureCredentialMethod;
  /** How long a resolved credential object is reused. */
  cacheTtlMs?: number;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

type CachedCredential = { credential: TokenCredential; expiresAt: number };

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private method: AzureCredentialMethod;
  private subscriptionId?: string;
  private tenantId?: string;
  private cacheTtlMs: number;
  private cache = new Map<AzureCredentialMethod, CachedCredential>();

  constructor(options: CredentialsManagerOptions = {}) {
    this.method = options.credentialMethod ?? "default";
    this.subscriptionId = options.defaultSubscription ?? process.env.AZURE_SUBSCRIPTION_ID;
    this.tenantId = options.defaultTenantId ?? process.env.AZURE_TENANT_ID;
    this.cacheTtlMs = options.cacheTtlMs ?? 3_600_000;
  }

  /**
   * Get a TokenCredential for the configured (or given) method.
   */
  async getCredential(method?: AzureCredentialMethod): Promise<CredentialResolutionResult> {
    const resolvedMethod = method ?? this.method;

    const cached = this.cache.get(resolvedMethod);
    let credential: TokenCredential;
    if (cached && Date.now() <= cached.expiresAt) {
      credential = cached.credential;
    } else {
      credential = await this.createCredential(resolvedMethod);
      this.cache.set(resolvedMethod, { credential, expiresAt: Date.now() + this.cacheTtlMs });
    }

    return {
      credential,
      method: resolvedMethod,
      subscriptionId: this.subscriptionId,
      tenantId: this.tenantId,
    };
  }

  getSubscriptionId(): string | undefined {
    return this.subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Dynamic import keeps @azure/identity off the load path until a client is built.
   */
  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);

      case "service-principal": {
        const clientId = process.env.AZURE_CLIENT_ID;
        const clientSecret = process.env.AZURE_CLIENT_SECRET;

        if (!this.tenantId || !clientId || !clientSecret) {
          throw new Error(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET",
          );
        }

        return new identity.ClientSecretCredential(this.tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = process.env.AZURE_CLIENT_ID;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(
  options?: CredentialsManagerOptions,
): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}

export function createCredentialsManagerFromConfig(
  config: ProvisionerConfig,
): AzureCredentialsManager {
  return new AzureCredentialsManager({
    defaultSubscription: config.defaultSubscription,
    defaultTenantId: config.defaultTenantId,
    credentialMethod: config.credentialMethod,
  });
}
