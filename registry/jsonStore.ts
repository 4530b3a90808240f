// ─────────────────────────────────────────────────────────────
// JSON Store — Load-on-construct / save-on-write file registry
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { logEvent } from "../config/log";
import { DocCliError } from "../access/accessErrors";

/** Envelope written around every store's records */
export interface StoreEnvelope<R> {
  engine: string;
  version: string;
  createdAt: string;
  lastUpdated: string;
  /** Next integer id to hand out */
  nextId: number;
  records: R[];
}

export const STORE_ENGINE = "doccli";
export const STORE_VERSION = "1.0.0";

export abstract class JsonStore<R> {
  protected store: StoreEnvelope<R>;
  protected readonly storePath: string;
  private readonly tag: string;

  constructor(storeDir: string, fileName: string, tag: string) {
    this.storePath = path.join(storeDir, fileName);
    this.tag = tag;
    this.store = this.load();
  }

  /** Narrow one parsed record; null drops it */
  protected abstract acceptRecord(raw: unknown): R | null;

  /**
   * Load store from disk, or start an empty one when there is no file.
   * A file that cannot be read back in full is refused rather than
   * replaced, since the next save would overwrite it.
   */
  private load(): StoreEnvelope<R> {
    if (!fs.existsSync(this.storePath)) {
      const now = new Date().toISOString();
      return {
        engine: STORE_ENGINE,
        version: STORE_VERSION,
        createdAt: now,
        lastUpdated: now,
        nextId: 1,
        records: [],
      };
    }

    const parsed = this.readFile();
    if (typeof parsed !== "object" || parsed === null) {
      throw this.corrupt("no records list");
    }
    const list: unknown = "records" in parsed ? parsed.records : undefined;
    if (!Array.isArray(list)) {
      throw this.corrupt("no records list");
    }

    const raw: unknown[] = list;
    const records = raw.map((r) => this.acceptRecord(r)).filter((r): r is R => r !== null);
    if (records.length !== raw.length) {
      throw this.corrupt(`${raw.length - records.length} unreadable record(s)`);
    }

    const createdAt =
      "createdAt" in parsed && typeof parsed.createdAt === "string" ? parsed.createdAt : new Date().toISOString();
    const nextId = "nextId" in parsed && typeof parsed.nextId === "number" ? parsed.nextId : records.length + 1;
    return {
      engine: STORE_ENGINE,
      version: STORE_VERSION,
      createdAt,
      lastUpdated: createdAt,
      nextId,
      records,
    };
  }

  private readFile(): unknown {
    try {
      return JSON.parse(fs.readFileSync(this.storePath, "utf-8"));
    } catch (err) {
      logEvent(this.tag, `Unparseable store file: ${err instanceof Error ? err.message : String(err)}`);
      throw this.corrupt("not valid JSON", err);
    }
  }

  private corrupt(detail: string, cause?: unknown): DocCliError {
    return new DocCliError(
      "CorruptStore",
      `Corrupt store file ${this.storePath} (${detail}). Repair or restore it before continuing.`,
      { cause }
    );
  }

  /** Persist store to disk */
  protected save(): void {
    const dir = path.dirname(this.storePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.store.lastUpdated = new Date().toISOString();
    fs.writeFileSync(this.storePath, JSON.stringify(this.store, null, 2), "utf-8");
  }

  protected takeId(): number {
    const id = this.store.nextId;
    this.store.nextId = id + 1;
    return id;
  }
}

// ── Field helpers for acceptRecord ───────────────────────────

export function readString(raw: object, key: string): string | null {
  const value: unknown = Reflect.get(raw, key);
  return typeof value === "string" ? value : null;
}

export function readNumber(raw: object, key: string): number | null {
  const value: unknown = Reflect.get(raw, key);
  return typeof value === "number" ? value : null;
}
