/**
 * Work-item store boundary.
 *
 * The pipeline only needs "every (path, content) at revision X" for two
 * revisions. Git is the production implementation; tests use the memory store.
 */
import type { TaskDocument } from "../shared/types.js";

export interface RevisionInfo {
  /** Resolved revision identifier (a commit sha for git). */
  ref: string;
  /** False when the revision does not exist (e.g. the parent of a root commit). */
  exists: boolean;
  /** ISO-8601 commit time, when the store knows it. */
  committedAt?: string;
}

export interface WorkItemStore {
  /** Documents at `revision`. A revision that does not exist yields []. */
  listDocuments(revision: string): TaskDocument[];
  describeRevision(revision: string): RevisionInfo;
}

export class WorkItemStoreError extends Error {
  readonly revision: string;

  constructor(message: string, revision: string) {
    super(message);
    this.name = "WorkItemStoreError";
    this.revision = revision;
  }
}
