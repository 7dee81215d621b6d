/**
 * Configuration schema (TypeBox), defaults and loading.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

export const configSchema = Type.Object({
  defaultSubscription: Type.Optional(Type.String({ description: "Default Azure subscription ID" })),
  defaultTenantId: Type.Optional(Type.String({ description: "Default Azure AD tenant ID" })),
  defaultRegion: Type.Optional(Type.String({ description: "Region used when neither --location nor the VM template names one" })),
  credentialMethod: Type.Optional(
    Type.Union(
      [
        Type.Literal("default"),
        Type.Literal("cli"),
        Type.Literal("service-principal"),
        Type.Literal("managed-identity"),
      ],
      { description: "Credential method: default | cli | service-principal | managed-identity" },
    ),
  ),
  retryConfig: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
      minDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
    }),
  ),
  diagnostics: Type.Optional(
    Type.Object({
      verbose: Type.Optional(Type.Boolean()),
    }),
  ),
});

export type ProvisionerConfig = Static<typeof configSchema>;

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export function getDefaultConfig(): ProvisionerConfig {
  return {
    defaultRegion: "eastus",
    credentialMethod: "default",
    retryConfig: { maxAttempts: 1, minDelayMs: 100, maxDelayMs: 30000 },
    diagnostics: { verbose: false },
  };
}

/**
 * Validate an unknown value against the schema.
 */
export function parseConfig(value: unknown, source = "config"): ProvisionerConfig {
  if (Check(configSchema, value)) return value;
  const issues = [...Errors(configSchema, value)].map(
    (e) => `${e.path || "/"}: ${e.message}`,
  );
  throw new ConfigValidationError(source, issues);
}

/**
 * Overrides taken from the environment. Only set keys are returned.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ProvisionerConfig {
  const raw: Record<string, unknown> = {};
  if (env.AZURE_SUBSCRIPTION_ID) raw.defaultSubscription = env.AZURE_SUBSCRIPTION_ID;
  if (env.AZURE_TENANT_ID) raw.defaultTenantId = env.AZURE_TENANT_ID;
  if (env.AZVM_REGION) raw.defaultRegion = env.AZVM_REGION;
  if (env.AZVM_CREDENTIAL_METHOD) raw.credentialMethod = env.AZVM_CREDENTIAL_METHOD;
  return parseConfig(raw, "environment");
}

export function mergeConfig(...layers: ProvisionerConfig[]): ProvisionerConfig {
  const merged: ProvisionerConfig = {};
  for (const layer of layers) {
    const { retryConfig, diagnostics } = merged;
    Object.assign(merged, layer);
    if (layer.retryConfig) merged.retryConfig = { ...retryConfig, ...layer.retryConfig };
    if (layer.diagnostics) merged.diagnostics = { ...diagnostics, ...layer.diagnostics };
  }
  return merged;
}

/**
 * Resolve configuration: defaults, then the JSON file (if any), then env.
 */
export async function loadConfig(
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<ProvisionerConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.AZVM_CONFIG;

  let fileConfig: ProvisionerConfig = {};
  if (configPath) {
    const text = await readFile(configPath, "utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ConfigValidationError(configPath, [`not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
    }
    fileConfig = parseConfig(parsed, configPath);
  }

  return mergeConfig(getDefaultConfig(), fileConfig, configFromEnv(env));
}
