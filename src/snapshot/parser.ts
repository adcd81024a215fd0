/**
 * Snapshot parser: turns one versioned task document into a TaskSnapshot.
 *
 * Documents are Markdown files with a YAML front-matter block:
 *
 *   ---
 *   id: task-12
 *   title: Add login
 *   status: In Progress
 *   priority: high
 *   labels: [backend]
 *   ---
 *   ## Acceptance Criteria
 *   <!-- AC:BEGIN -->
 *   - [x] #1 Form renders
 *   - [ ] #2 Errors shown
 *   <!-- AC:END -->
 *
 * Anything that is not a well-formed tracked task is a skip, never an error.
 */
import path from "node:path";
import picomatch from "picomatch";
import { parse as parseYaml } from "yaml";
import type { AcceptanceItem, TaskDocument, TaskSnapshot } from "../shared/types.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { errorMessage, isRecord } from "../shared/guards.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SkipReason = "not-tracked" | "malformed-id" | "invalid-metadata";

export type ParseResult =
  | { kind: "snapshot"; snapshot: TaskSnapshot }
  | { kind: "skip"; reason: SkipReason; detail: string };

/** Snapshots keyed by task id. */
export type SnapshotSet = ReadonlyMap<string, TaskSnapshot>;

export interface ParseOptions {
  /** Identifier prefix (e.g. "task"). */
  idPrefix: string;
  /** Glob selecting tracked documents. Every document is tracked when omitted. */
  tasksGlob?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Identifier grammar
// ---------------------------------------------------------------------------

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function idPattern(prefix: string): string {
  return `${escapeRegExp(prefix)}-\\d+(?:\\.\\d+)?`;
}

/** Whether `value` is exactly `prefix-<int>` or `prefix-<int>.<int>`. */
export function isValidTaskId(value: string, prefix: string): boolean {
  return new RegExp(`^${idPattern(prefix)}$`).test(value);
}

/**
 * Extract the task id from a document file name.
 *
 * Accepts `ID.md` and `ID - Title.md`; returns null for anything else.
 */
export function parseTaskId(fileName: string, prefix: string): string | null {
  const base = path.posix.basename(fileName.replace(/\\/g, "/"));
  const match = new RegExp(`^(${idPattern(prefix)})(?: - .+)?\\.md$`).exec(base);
  return match?.[1] ?? null;
}

// ---------------------------------------------------------------------------
// Document parsing
// ---------------------------------------------------------------------------

const FRONT_MATTER = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;
const AC_BEGIN = "<!-- AC:BEGIN -->";
const AC_END = "<!-- AC:END -->";
const CHECKBOX = /^\s*[-*]\s+\[([ xX])\]\s*(?:#(\d+)(?:\s+|$))?(.*)$/;

/** Parse checkbox lines, restricted to the AC:BEGIN/AC:END region when present. */
export function parseAcceptanceItems(body: string): AcceptanceItem[] {
  let region = body;
  const begin = body.indexOf(AC_BEGIN);
  const end = begin >= 0 ? body.indexOf(AC_END, begin) : -1;
  if (begin >= 0 && end >= 0) {
    region = body.slice(begin + AC_BEGIN.length, end);
  }

  const items: AcceptanceItem[] = [];
  for (const line of region.split(/\r?\n/)) {
    const match = CHECKBOX.exec(line);
    if (!match) continue;
    const [, mark, index, text] = match;
    items.push({
      index: index ? Number(index) : items.length + 1,
      text: (text ?? "").trim(),
      checked: mark === "x" || mark === "X",
    });
  }
  return items;
}

function scalarToString(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

function parseLabels(value: unknown): string[] | null {
  if (value === undefined || value === null) return [];
  const raw = Array.isArray(value) ? value : [value];
  const labels = new Set<string>();
  for (const item of raw) {
    const label = scalarToString(item);
    if (label === undefined) return null;
    labels.add(label);
  }
  return [...labels].sort();
}

function trackedMatcher(options: ParseOptions): (p: string) => boolean {
  return options.tasksGlob ? picomatch(options.tasksGlob) : () => true;
}

function parseWith(
  doc: TaskDocument,
  options: ParseOptions,
  isTracked: (p: string) => boolean,
): ParseResult {
  const skip = (reason: SkipReason, detail: string): ParseResult => ({ kind: "skip", reason, detail });

  if (!isTracked(doc.path)) {
    return skip("not-tracked", "path does not match the tasks glob");
  }

  const id = parseTaskId(doc.path, options.idPrefix);
  if (!id) {
    return skip("malformed-id", `file name does not carry a ${options.idPrefix}-<n> identifier`);
  }

  const fm = FRONT_MATTER.exec(doc.content);
  if (!fm) {
    return skip("invalid-metadata", "missing front matter");
  }

  let meta: unknown;
  try {
    meta = parseYaml(fm[1] ?? "");
  } catch (err: unknown) {
    return skip("invalid-metadata", `unreadable front matter: ${errorMessage(err)}`);
  }
  if (!isRecord(meta)) {
    return skip("invalid-metadata", "front matter is not a mapping");
  }

  if (meta.id !== undefined) {
    const declared = scalarToString(meta.id);
    if (!declared || !isValidTaskId(declared, options.idPrefix)) {
      return skip("malformed-id", `front matter id '${String(meta.id)}' is malformed`);
    }
    if (declared !== id) {
      return skip("invalid-metadata", `front matter id '${declared}' does not match file name id '${id}'`);
    }
  }

  const status = scalarToString(meta.status);
  if (!status) {
    return skip("invalid-metadata", "missing status");
  }

  const labels = parseLabels(meta.labels);
  if (!labels) {
    return skip("invalid-metadata", "labels must be strings");
  }

  const body = doc.content.slice(fm[0].length);
  const titleFromName = / - (.+)\.md$/.exec(path.posix.basename(doc.path))?.[1];
  const title = scalarToString(meta.title) ?? titleFromName;
  const priority = scalarToString(meta.priority);

  const snapshot: TaskSnapshot = {
    id,
    path: doc.path,
    status,
    labels,
    acceptanceItems: parseAcceptanceItems(body),
  };
  if (title !== undefined) snapshot.title = title;
  if (priority !== undefined) snapshot.priority = priority;

  return { kind: "snapshot", snapshot };
}

/** Parse one document. Skips are logged at debug. */
export function parseSnapshot(doc: TaskDocument, options: ParseOptions): ParseResult {
  const result = parseWith(doc, options, trackedMatcher(options));
  if (result.kind === "skip") {
    (options.logger ?? silentLogger()).debug(`Skipping ${doc.path}: ${result.reason} (${result.detail})`);
  }
  return result;
}

/**
 * Parse every document of one revision into a snapshot set.
 *
 * Skipped documents are dropped. When several documents carry the same id,
 * all of them are excluded.
 */
export function parseSnapshotSet(docs: readonly TaskDocument[], options: ParseOptions): SnapshotSet {
  const logger = options.logger ?? silentLogger();
  const isTracked = trackedMatcher(options);
  const byId = new Map<string, TaskSnapshot[]>();

  for (const doc of docs) {
    const result = parseWith(doc, options, isTracked);
    if (result.kind === "skip") {
      const line = `Skipping ${doc.path}: ${result.reason} (${result.detail})`;
      if (result.reason === "not-tracked") {
        logger.trace(line);
      } else {
        logger.debug(line);
      }
      continue;
    }
    const existing = byId.get(result.snapshot.id);
    if (existing) {
      existing.push(result.snapshot);
    } else {
      byId.set(result.snapshot.id, [result.snapshot]);
    }
  }

  const set = new Map<string, TaskSnapshot>();
  for (const [id, snapshots] of byId) {
    const [only, ...rest] = snapshots;
    if (only && rest.length === 0) {
      set.set(id, only);
      continue;
    }
    logger.warn(`Duplicate task id ${id} in ${snapshots.map((s) => s.path).join(", ")}; excluding all`);
  }
  return set;
}
