import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  // Source runs from src/, the build from dist/src/
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = require(candidate);
      if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return null;
}

export const VERSION = process.env.DATATABLES_VERSION || readVersionFromPackageJson() || "0.0.0";
