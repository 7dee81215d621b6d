/**
 * VM template schema (TypeBox) and loading from a JSON file.
 */

import { readFile } from "node:fs/promises";
import { Type } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import type {
  DiagnosticsProfile,
  HardwareProfile,
  NetworkProfile,
  OSProfile,
  Plan,
  StorageProfile,
  SubResource,
} from "@azure/arm-compute";
import type { VirtualMachineSpec } from "./types.js";

// Profile bodies are passed through to ARM, which validates them.
const Profile = <T>() => Type.Unsafe<T>(Type.Object({}, { additionalProperties: true }));

export const vmTemplateSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  location: Type.String(),
  hardwareProfile: Type.Optional(Profile<HardwareProfile>()),
  storageProfile: Type.Optional(Profile<StorageProfile>()),
  networkProfile: Type.Optional(Profile<NetworkProfile>()),
  osProfile: Type.Optional(Profile<OSProfile>()),
  diagnosticsProfile: Type.Optional(Profile<DiagnosticsProfile>()),
  plan: Type.Optional(Profile<Plan>()),
  availabilitySet: Type.Optional(Profile<SubResource>()),
  tags: Type.Optional(Type.Record(Type.String(), Type.String())),
});

export class VMTemplateError extends Error {
  constructor(source: string, issues: string[]) {
    super(`Invalid VM template ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "VMTemplateError";
  }
}

export function parseVMTemplate(value: unknown, source = "template"): VirtualMachineSpec {
  if (Check(vmTemplateSchema, value)) return value;
  const issues = [...Errors(vmTemplateSchema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
  throw new VMTemplateError(source, issues);
}

export async function loadVMTemplate(path: string): Promise<VirtualMachineSpec> {
  const text = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new VMTemplateError(path, [`not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return parseVMTemplate(parsed, path);
}
