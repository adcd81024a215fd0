/**
 * User-level home for diagnostic logs: TASKHOOKS_HOME or the OS home.
 */
import os from "node:os";
import path from "node:path";

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TASKHOOKS_HOME?.trim();
  if (override) {
    if (override.split(/[\\/]/).includes("..")) {
      throw new Error(
        `Invalid TASKHOOKS_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!path.isAbsolute(override)) {
      throw new Error(`Invalid TASKHOOKS_HOME path '${override}': path must be absolute`);
    }
    return path.resolve(override);
  }
  return os.homedir();
}
