#!/usr/bin/env node
/**
 * azvm: create Azure VMs with boot diagnostics and the BGInfo extension.
 */

import { Command } from "commander";
import { getDefaultConfig, loadConfig } from "./src/config.js";
import { getCreateDependencies, startServices, stopServices } from "./src/lifecycle.js";
import { createConsoleLogger, theme } from "./src/logger.js";
import { createPluginState } from "./src/plugin-state.js";
import { registerVMCli } from "./src/register-cli.js";
import { formatErrorMessage } from "./src/retry.js";
import { VERSION } from "./src/version.js";

type GlobalOptions = { config?: string; verbose?: boolean };

const state = createPluginState(getDefaultConfig());

const program = new Command("azvm")
  .description("Azure VM provisioning with boot diagnostics")
  .version(VERSION)
  .option("-c, --config <path>", "Config file (JSON); defaults to $AZVM_CONFIG")
  .option("-v, --verbose", "Debug logging");

program.hook("preAction", async () => {
  const opts = program.opts<GlobalOptions>();
  state.config = await loadConfig({ configPath: opts.config });
  state.logger = createConsoleLogger({ verbose: opts.verbose || state.config.diagnostics?.verbose });
  startServices(state);
});

program.hook("postAction", () => {
  stopServices(state);
});

registerVMCli(
  { program, logger: createConsoleLogger() },
  {
    getDependencies: () => getCreateDependencies(state),
    getDefaultRegion: () => state.config.defaultRegion,
  },
);

try {
  await program.parseAsync(process.argv);
} catch (error) {
  console.error(theme.error(formatErrorMessage(error)));
  process.exitCode = 1;
}
