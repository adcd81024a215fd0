/**
 * Install `taskhooks detect` as the repository's post-commit hook.
 */
import fs from "node:fs";
import path from "node:path";
import { runGit } from "../store/git-store.js";

export const GIT_HOOK_MARKER = "# installed by taskhooks";

export const POST_COMMIT_SCRIPT = `#!/bin/sh
${GIT_HOOK_MARKER}
# Detect task changes in the commit just made and run matching hooks.
exec taskhooks detect --before HEAD~1 --after HEAD
`;

export type GitHookInstallStatus = "installed" | "replaced" | "unchanged" | "exists";

export interface GitHookInstallResult {
  status: GitHookInstallStatus;
  path: string;
}

/** Path of the post-commit hook, honouring `core.hooksPath`. */
export function resolvePostCommitPath(projectRoot: string): string {
  const result = runGit(["rev-parse", "--git-path", "hooks/post-commit"], projectRoot);
  if (!result.success) {
    throw new Error(`Not a git repository: ${projectRoot} (${result.output})`);
  }
  return path.resolve(projectRoot, result.output.trim());
}

/**
 * Write the post-commit hook. A foreign hook is only replaced with `force`;
 * a hook written by taskhooks is refreshed in place.
 */
export function installGitHook(projectRoot: string, options: { force?: boolean } = {}): GitHookInstallResult {
  const hookPath = resolvePostCommitPath(projectRoot);

  let status: GitHookInstallStatus = "installed";
  if (fs.existsSync(hookPath)) {
    const current = fs.readFileSync(hookPath, "utf-8");
    if (current === POST_COMMIT_SCRIPT) return { status: "unchanged", path: hookPath };
    if (!current.includes(GIT_HOOK_MARKER) && !options.force) return { status: "exists", path: hookPath };
    status = "replaced";
  }

  fs.mkdirSync(path.dirname(hookPath), { recursive: true });
  fs.writeFileSync(hookPath, POST_COMMIT_SCRIPT, { encoding: "utf-8", mode: 0o755 });
  fs.chmodSync(hookPath, 0o755);
  return { status, path: hookPath };
}
