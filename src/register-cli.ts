/**
 * `azvm vm` subcommands.
 */

import { InvalidArgumentError, type Command } from "commander";
import { formatErrorMessage } from "./retry.js";
import type { PluginLogger } from "./types.js";
import { createVirtualMachine, type VMCreateDependencies } from "./vms/create.js";
import { loadVMTemplate } from "./vms/template.js";
import type { VMCreateResult, VirtualMachineSpec } from "./vms/types.js";

export type CliContext = {
  program: Command;
  /** Command output. Managers log through their own logger. */
  logger: PluginLogger;
};

/** Resolved when a command runs, after the global options are applied. */
export type VMCliHooks = {
  getDependencies: () => VMCreateDependencies;
  getDefaultRegion?: () => string | undefined;
  loadTemplate?: (path: string) => Promise<VirtualMachineSpec>;
};

type VMCreateCliOptions = {
  resourceGroup: string;
  location?: string;
  vm: string;
  tag?: Record<string, string>;
  disableBginfoExtension?: boolean;
  json?: boolean;
};

/**
 * Commander collector for repeated `--tag key=value`.
 */
export function collectTag(value: string, previous?: Record<string, string>): Record<string, string> {
  const index = value.indexOf("=");
  if (index <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${value}'.`);
  }
  return { ...previous, [value.slice(0, index)]: value.slice(index + 1) };
}

export function formatCreateSummary(result: VMCreateResult): string[] {
  const { operation } = result;
  const lines = [`VM ${operation.vmName}: ${operation.status}`];
  if (operation.provisioningState) lines.push(`  Provisioning state: ${operation.provisioningState}`);
  if (operation.vmId) lines.push(`  ID:                 ${operation.vmId}`);
  if (result.diagnostics) {
    lines.push(
      `  Boot diagnostics:   ${result.diagnostics.storageUri} (${result.diagnostics.accountName}, ${result.diagnostics.source})`,
    );
  }
  if (result.extension) lines.push(`  Extension:          ${result.extension.name} ${result.extension.version}`);
  if (operation.error) lines.push(`  Error:              ${operation.error}`);
  return lines;
}

export function registerVMCli(ctx: CliContext, hooks: VMCliHooks): void {
  const loadTemplate = hooks.loadTemplate ?? loadVMTemplate;
  const vm = ctx.program.command("vm").description("Virtual machine commands");

  vm.command("create")
    .description("Create a VM from a JSON template, with boot diagnostics and BGInfo")
    .requiredOption("-g, --resource-group <name>", "Resource group")
    .requiredOption("--vm <path>", "VM template (JSON)")
    .option("-l, --location <region>", "Region (overrides the template)")
    .option("--tag <key=value>", "Tag to set (repeatable; replaces template tags)", collectTag)
    .option("--disable-bginfo-extension", "Skip the BGInfo extension on Windows VMs")
    .option("--json", "Print the result as JSON")
    .action(async (opts: VMCreateCliOptions) => {
      try {
        const template = await loadTemplate(opts.vm);
        const result = await createVirtualMachine(hooks.getDependencies(), {
          resourceGroup: opts.resourceGroup,
          location: opts.location || template.location || hooks.getDefaultRegion?.(),
          vm: template,
          tags: opts.tag,
          disableBginfoExtension: opts.disableBginfoExtension,
        });

        if (opts.json) {
          ctx.logger.info(JSON.stringify(result, null, 2));
        } else {
          for (const line of formatCreateSummary(result)) ctx.logger.info(line);
        }
        if (result.operation.status !== "succeeded") process.exitCode = 1;
      } catch (error) {
        ctx.logger.error(`vm create failed: ${formatErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
