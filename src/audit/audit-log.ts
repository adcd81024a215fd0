/**
 * Append-only audit sinks.
 *
 * JsonlAuditLog writes one record per line. Before an append that would
 * start on a file at or above `maxBytes`, the active file is rotated to
 * audit.jsonl.1 (older generations shift up, the oldest beyond
 * `maxGenerations` is deleted). Every record carries the hash of the record
 * before it, across rotations, so edits and deletions inside the retained
 * history are detectable.
 */
import fs from "node:fs";
import path from "node:path";
import { silentLogger, type Logger } from "../shared/logger.js";
import { computeEntryHash, parseAuditLine, sealRecord } from "./record.js";
import type { AuditEntry, AuditRecord, IntegrityReport } from "./types.js";

export interface AuditSink {
  /** Chain and persist one entry. Throws when the record cannot be written. */
  append(entry: AuditEntry): AuditRecord;
  /** Every retained record, oldest first. */
  readAll(): AuditRecord[];
}

// ---------------------------------------------------------------------------
// In-memory sink
// ---------------------------------------------------------------------------

export class MemoryAuditSink implements AuditSink {
  private readonly records: AuditRecord[] = [];

  append(entry: AuditEntry): AuditRecord {
    const prev = this.records.at(-1)?.entry_hash ?? null;
    const record = sealRecord(entry, prev);
    this.records.push(record);
    return record;
  }

  readAll(): AuditRecord[] {
    return [...this.records];
  }
}

// ---------------------------------------------------------------------------
// JSONL file sink
// ---------------------------------------------------------------------------

export interface JsonlAuditLogOptions {
  maxBytes: number;
  /** Rotated files kept besides the active one. */
  maxGenerations: number;
  logger?: Logger;
}

interface ParsedLine {
  file: string;
  line: number;
  record: AuditRecord | null;
}

export class JsonlAuditLog implements AuditSink {
  readonly filePath: string;
  private readonly maxBytes: number;
  private readonly maxGenerations: number;
  private readonly logger: Logger;
  /** undefined until the tail of the chain has been read from disk. */
  private lastHash: string | null | undefined;

  constructor(filePath: string, options: JsonlAuditLogOptions) {
    this.filePath = filePath;
    this.maxBytes = options.maxBytes;
    this.maxGenerations = options.maxGenerations;
    this.logger = options.logger ?? silentLogger();
  }

  /** Files holding records, oldest generation first. */
  files(): string[] {
    const files: string[] = [];
    for (let gen = this.maxGenerations; gen >= 1; gen--) {
      const file = this.generationPath(gen);
      if (fs.existsSync(file)) files.push(file);
    }
    if (fs.existsSync(this.filePath)) files.push(this.filePath);
    return files;
  }

  append(entry: AuditEntry): AuditRecord {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    if (this.lastHash === undefined) {
      this.lastHash = this.readChainTail();
    }
    this.rotateIfNeeded();

    const record = sealRecord(entry, this.lastHash);
    fs.appendFileSync(this.filePath, JSON.stringify(record) + "\n", "utf-8");
    this.lastHash = record.entry_hash;
    return record;
  }

  readAll(): AuditRecord[] {
    const records: AuditRecord[] = [];
    for (const parsed of this.readLines()) {
      if (parsed.record) {
        records.push(parsed.record);
      } else {
        this.logger.warn(`Skipping unreadable audit line ${parsed.line} in ${parsed.file}`);
      }
    }
    return records;
  }

  /**
   * Re-hash every retained record and check each link. The first retained
   * record may point at a record that has been rotated away.
   */
  verifyIntegrity(): IntegrityReport {
    const errors: string[] = [];
    let count = 0;
    let prev: string | null | undefined;

    for (const { file, line, record } of this.readLines()) {
      const where = `${path.basename(file)}:${line}`;
      if (!record) {
        errors.push(`${where} is not a valid audit record`);
        prev = undefined;
        continue;
      }
      count++;
      if (computeEntryHash(record) !== record.entry_hash) {
        errors.push(`${where} entry_hash does not match record ${record.record_id}`);
      }
      if (prev !== undefined && record.prev_hash !== prev) {
        errors.push(`${where} prev_hash breaks the chain at record ${record.record_id}`);
      }
      prev = record.entry_hash;
    }

    return { valid: errors.length === 0, records: count, errors };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private generationPath(gen: number): string {
    return `${this.filePath}.${gen}`;
  }

  private readLines(): ParsedLine[] {
    const lines: ParsedLine[] = [];
    for (const file of this.files()) {
      const content = fs.readFileSync(file, "utf-8");
      content.split("\n").forEach((text, i) => {
        if (text.trim() === "") return;
        lines.push({ file, line: i + 1, record: parseAuditLine(text) });
      });
    }
    return lines;
  }

  private readChainTail(): string | null {
    for (const file of [...this.files()].reverse()) {
      const lines = fs.readFileSync(file, "utf-8").split("\n").filter((l) => l.trim() !== "");
      const last = lines.at(-1);
      if (last === undefined) continue;
      const record = parseAuditLine(last);
      if (record) return record.entry_hash;
      this.logger.warn(`Last line of ${file} is not an audit record; starting a new chain`);
      return null;
    }
    return null;
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) return;
    const size = fs.statSync(this.filePath).size;
    if (size < this.maxBytes) return;

    const oldest = this.generationPath(this.maxGenerations);
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let gen = this.maxGenerations - 1; gen >= 1; gen--) {
      const from = this.generationPath(gen);
      if (fs.existsSync(from)) fs.renameSync(from, this.generationPath(gen + 1));
    }
    if (this.maxGenerations > 0) {
      fs.renameSync(this.filePath, this.generationPath(1));
    } else {
      fs.unlinkSync(this.filePath);
    }
    this.logger.debug(`Rotated audit log (${size} bytes)`);
  }
}
