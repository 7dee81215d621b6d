/**
 * Console-backed logger and colour theme for CLI output.
 */

import type { PluginLogger } from "./types.js";

export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  warn: (s: string) => `\x1b[33m${s}\x1b[0m`,
  muted: (s: string) => `\x1b[90m${s}\x1b[0m`,
} as const;

/**
 * Info goes to stdout; warnings, errors and debug lines go to stderr so
 * `--json` output stays parseable.
 */
export function createConsoleLogger(options: { verbose?: boolean } = {}): PluginLogger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.error(theme.warn(`warning: ${message}`)),
    error: (message) => console.error(theme.error(message)),
    debug: options.verbose ? (message) => console.error(theme.muted(message)) : undefined,
  };
}
