import { createRequire } from "node:module";

// src/ when run from sources, dist/src/ when built.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg = require(candidate) as { name?: string; version?: string };
      if (pkg.name === "bastion-tunnels-inventory" && pkg.version) return pkg.version;
    } catch {
      // try the next location
    }
  }
  return null;
}

export const VERSION = readVersionFromPackageJson() ?? "0.0.0";
