import type { TaskDocument } from "../shared/types.js";
import type { RevisionInfo, WorkItemStore } from "./work-item-store.js";

export interface MemoryRevision {
  documents: TaskDocument[];
  committedAt?: string;
}

/** In-memory store keyed by revision name. Unknown revisions are empty. */
export class MemoryWorkItemStore implements WorkItemStore {
  private readonly revisions = new Map<string, MemoryRevision>();

  constructor(revisions: Record<string, MemoryRevision> = {}) {
    for (const [name, revision] of Object.entries(revisions)) {
      this.setRevision(name, revision);
    }
  }

  setRevision(name: string, revision: MemoryRevision): void {
    this.revisions.set(name, {
      ...revision,
      documents: revision.documents.map((doc) => ({ ...doc })),
    });
  }

  listDocuments(revision: string): TaskDocument[] {
    return (this.revisions.get(revision)?.documents ?? []).map((doc) => ({ ...doc }));
  }

  describeRevision(revision: string): RevisionInfo {
    const found = this.revisions.get(revision);
    if (!found) return { ref: revision, exists: false };
    const info: RevisionInfo = { ref: revision, exists: true };
    if (found.committedAt) info.committedAt = found.committedAt;
    return info;
  }
}
