import { createRequire } from "node:module";

// Sources sit one level below the package root; compiled output two.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg: { name?: string; version?: string } = require(candidate);
      if (pkg.name === "azure-vm-bootdiag" && pkg.version) return pkg.version;
    } catch {
      // not at this depth
    }
  }
  return null;
}

export const VERSION = process.env.AZVM_VERSION || readVersionFromPackageJson() || "0.0.0";
