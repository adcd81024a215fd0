/**
 * Git-backed work-item store.
 *
 * Reads tracked documents straight from the object database with
 * `git ls-tree` and `git show`, so the working tree state never leaks in.
 * Every git call is an argument vector; revision names are never passed
 * through a shell.
 */
import { execFileSync } from "node:child_process";
import type { TaskDocument } from "../shared/types.js";
import { isRecord } from "../shared/guards.js";
import { WorkItemStoreError, type RevisionInfo, type WorkItemStore } from "./work-item-store.js";

// ---------------------------------------------------------------------------
// Low-level helpers
// ---------------------------------------------------------------------------

export interface GitResult {
  /** Whether the command succeeded. */
  success: boolean;
  /** stdout on success, stdout + stderr on failure. */
  output: string;
}

const GIT_TIMEOUT_MS = 30_000;
const GIT_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Run a git command and return the result.
 */
export function runGit(args: readonly string[], cwd: string): GitResult {
  try {
    const output = execFileSync("git", args, {
      cwd,
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
      timeout: GIT_TIMEOUT_MS,
      maxBuffer: GIT_MAX_BUFFER,
    });
    return { success: true, output };
  } catch (error: unknown) {
    const parts: string[] = [];
    if (isRecord(error)) {
      if (typeof error.stdout === "string") parts.push(error.stdout);
      if (typeof error.stderr === "string") parts.push(error.stderr);
    }
    if (parts.every((p) => !p) && error instanceof Error) parts.push(error.message);
    return { success: false, output: parts.filter(Boolean).join("\n").trimEnd() };
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface GitStoreOptions {
  /** Only paths accepted here are read with `git show`. */
  pathFilter?: (filePath: string) => boolean;
}

export class GitWorkItemStore implements WorkItemStore {
  private readonly cwd: string;
  private readonly pathFilter: (filePath: string) => boolean;

  constructor(cwd: string, options: GitStoreOptions = {}) {
    this.cwd = cwd;
    this.pathFilter = options.pathFilter ?? (() => true);
  }

  describeRevision(revision: string): RevisionInfo {
    const resolved = runGit(["rev-parse", "--verify", "--quiet", `${revision}^{commit}`], this.cwd);
    if (!resolved.success) {
      const repo = runGit(["rev-parse", "--git-dir"], this.cwd);
      if (!repo.success) {
        throw new WorkItemStoreError(`Not a git repository: ${this.cwd} (${repo.output})`, revision);
      }
      return { ref: revision, exists: false };
    }

    const ref = resolved.output.trim();
    const info: RevisionInfo = { ref, exists: true };
    const log = runGit(["log", "-1", "--format=%cI", ref], this.cwd);
    const committedAt = log.output.trim();
    if (log.success && committedAt) {
      info.committedAt = new Date(committedAt).toISOString();
    }
    return info;
  }

  listDocuments(revision: string): TaskDocument[] {
    const info = this.describeRevision(revision);
    if (!info.exists) return [];

    const tree = runGit(["ls-tree", "-r", "-z", "--name-only", info.ref], this.cwd);
    if (!tree.success) {
      throw new WorkItemStoreError(`git ls-tree failed for ${revision}: ${tree.output}`, revision);
    }

    const docs: TaskDocument[] = [];
    for (const filePath of tree.output.split("\0")) {
      if (!filePath || !this.pathFilter(filePath)) continue;
      const shown = runGit(["show", `${info.ref}:${filePath}`], this.cwd);
      if (!shown.success) {
        throw new WorkItemStoreError(`git show failed for ${revision}:${filePath}: ${shown.output}`, revision);
      }
      docs.push({ path: filePath, content: shown.output });
    }
    return docs;
  }
}
