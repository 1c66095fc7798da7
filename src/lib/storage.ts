/**
 * Key-Value Storage
 * Persistence port consumed by the geo cache, plus in-process implementations
 *
 * Reads never throw for bad data: a value that cannot be decoded comes
 * back as { status: "type-mismatch" } so callers can treat it as absent.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export type StorageReadResult =
  | { status: "found"; value: unknown }
  | { status: "missing" }
  | { status: "type-mismatch"; reason: string };

export interface KeyValueStorage {
  get(key: string): Promise<StorageReadResult>;
  set(key: string, value: unknown): Promise<void>;
  /** Write several keys so that either all of them or none are stored */
  setMany(entries: Record<string, unknown>): Promise<void>;
  remove(key: string): Promise<void>;
}

// ============================================
// In-memory storage
// ============================================

/**
 * Process-local storage. Values are stored as JSON text so that a read
 * returns a fresh copy, the same way a persistent backend would.
 */
export class MemoryStorage implements KeyValueStorage {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<StorageReadResult> {
    const raw = this.entries.get(key);
    if (raw === undefined) return { status: "missing" };
    try {
      return { status: "found", value: JSON.parse(raw) };
    } catch (error) {
      return { status: "type-mismatch", reason: String(error) };
    }
  }

  async set(key: string, value: unknown): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
  }

  async setMany(entries: Record<string, unknown>): Promise<void> {
    const encoded = Object.entries(entries).map(
      ([key, value]): [string, string] => [key, JSON.stringify(value)]
    );
    for (const [key, raw] of encoded) this.entries.set(key, raw);
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Store raw text as-is (used to simulate corrupted data) */
  setRaw(key: string, raw: string): void {
    this.entries.set(key, raw);
  }
}

// ============================================
// JSON file storage
// ============================================

type Document = Record<string, unknown>;

type DocumentRead =
  | { status: "ok"; document: Document }
  | { status: "corrupt"; reason: string };

/** Makes temp file names unique across instances in this process */
let tempFileCount = 0;

function isDocument(value: unknown): value is Document {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * All keys live in one JSON document on disk
 *
 * Writes go to a temp file that is renamed over the original, so a crash
 * mid-write leaves the previous document intact. Writes from one instance
 * run one at a time, each read-modify-write seeing the previous one's result.
 */
export class JsonFileStorage implements KeyValueStorage {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /**
   * Run a write after every earlier write has settled
   *
   * The caller sees the task's own result; a failure does not stall the queue.
   */
  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const result = this.writeQueue.then(task);
    this.writeQueue = result.catch(() => undefined);
    return result;
  }

  private async readDocument(): Promise<DocumentRead> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return { status: "ok", document: {} };
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (!isDocument(parsed)) {
        return { status: "corrupt", reason: "document is not an object" };
      }
      return { status: "ok", document: parsed };
    } catch (error) {
      return { status: "corrupt", reason: String(error) };
    }
  }

  private async writeDocument(document: Document): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    tempFileCount++;
    const tempPath = `${this.filePath}.${process.pid}.${tempFileCount}.tmp`;
    await writeFile(tempPath, JSON.stringify(document), "utf-8");
    await rename(tempPath, this.filePath);
  }

  async get(key: string): Promise<StorageReadResult> {
    const read = await this.readDocument();
    if (read.status === "corrupt") {
      return { status: "type-mismatch", reason: read.reason };
    }
    if (!(key in read.document)) return { status: "missing" };
    return { status: "found", value: read.document[key] };
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.setMany({ [key]: value });
  }

  async setMany(entries: Record<string, unknown>): Promise<void> {
    await this.enqueueWrite(async () => {
      const read = await this.readDocument();
      // A corrupt document is replaced rather than merged into
      const document = read.status === "ok" ? read.document : {};
      Object.assign(document, entries);
      await this.writeDocument(document);
    });
  }

  async remove(key: string): Promise<void> {
    await this.enqueueWrite(async () => {
      const read = await this.readDocument();
      if (read.status === "corrupt" || !(key in read.document)) return;
      delete read.document[key];
      await this.writeDocument(read.document);
    });
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
