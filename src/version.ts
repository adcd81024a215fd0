import { createRequire } from "node:module";

const CORE_PACKAGE_NAME = "taskhooks";

const PACKAGE_JSON_CANDIDATES = [
  "../package.json",
  "../../package.json",
  "../../../package.json",
  "./package.json",
] as const;

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      // missing or unreadable candidate
      continue;
    }
    if (typeof parsed !== "object" || parsed === null) continue;
    if (!("name" in parsed) || parsed.name !== CORE_PACKAGE_NAME) continue;
    if (!("version" in parsed) || typeof parsed.version !== "string") continue;
    const version = parsed.version.trim();
    if (version) return version;
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
