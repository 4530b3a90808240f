// ─────────────────────────────────────────────────────────────
// Document Store — Metadata for uploaded documents
// Records keep insertion order; each call is one write.
// ─────────────────────────────────────────────────────────────

import type { DocumentRecord } from "../schema/documentSchema";
import { JsonStore, readNumber, readString } from "./jsonStore";
import { logEvent } from "../config/log";

const DOCUMENTS_FILE = "documents.json";

export class DocumentStore extends JsonStore<DocumentRecord> {
  constructor(storeDir: string) {
    super(storeDir, DOCUMENTS_FILE, "DOCUMENTS");
  }

  insert(name: string, owner: string, type: string, timestamp: string): number {
    const record: DocumentRecord = {
      id: this.takeId(),
      name,
      owner,
      timestamp,
      type,
      summary: null,
    };
    this.store.records.push(record);
    this.save();

    logEvent("DOCUMENTS", `Recorded ${name} (${type}) for ${owner}`);
    return record.id;
  }

  listAll(): DocumentRecord[] {
    return [...this.store.records];
  }

  /** First record with this name, in insertion order */
  findByName(name: string): DocumentRecord | null {
    return this.store.records.find((r) => r.name === name) ?? null;
  }

  /** Remove every record with this name. Returns the number removed. */
  deleteByName(name: string): number {
    const before = this.store.records.length;
    this.store.records = this.store.records.filter((r) => r.name !== name);
    const removed = before - this.store.records.length;
    if (removed > 0) {
      this.save();
      logEvent("DOCUMENTS", `Deleted ${removed} record(s) named ${name}`);
    }
    return removed;
  }

  /** Attach a summary to every record with this name. Returns false if none matched. */
  setSummary(name: string, summary: string): boolean {
    const matches = this.store.records.filter((r) => r.name === name);
    if (matches.length === 0) return false;
    for (const record of matches) {
      record.summary = summary;
    }
    this.save();
    return true;
  }

  protected acceptRecord(raw: unknown): DocumentRecord | null {
    if (typeof raw !== "object" || raw === null) return null;
    const id = readNumber(raw, "id");
    const name = readString(raw, "name");
    const owner = readString(raw, "owner");
    const timestamp = readString(raw, "timestamp");
    const type = readString(raw, "type");
    if (id === null || name === null || owner === null || timestamp === null || type === null) {
      return null;
    }
    return { id, name, owner, timestamp, type, summary: readString(raw, "summary") };
  }
}
