import { FileNotFoundError } from "../errors.js";
import type { FileContent, FileRecord } from "../types/file.js";
import type { StorageAdapter } from "./adapter.js";

function copyContent(content: FileContent | null): FileContent {
  if (content === null) return "";
  return typeof content === "string" ? content : new Uint8Array(content);
}

/** Map-backed adapter. Records do not outlive the instance. */
export class InMemoryStorageAdapter implements StorageAdapter {
  private files = new Map<string, FileRecord>();

  async save(file: FileRecord): Promise<boolean> {
    this.files.set(file.key, {
      key: file.key,
      content: copyContent(file.content),
      modifiedAt: new Date(),
    });
    return true;
  }

  async load(key: string): Promise<FileRecord> {
    const stored = this.files.get(key);
    if (!stored) {
      throw new FileNotFoundError(`File not found: ${key}`, { key });
    }
    return {
      key: stored.key,
      content: copyContent(stored.content),
      modifiedAt: stored.modifiedAt && new Date(stored.modifiedAt),
    };
  }

  async init(key: string, touch: boolean): Promise<FileRecord> {
    return { key, content: touch ? "" : null };
  }

  async delete(key: string): Promise<boolean> {
    if (!this.files.delete(key)) {
      throw new FileNotFoundError(`File not found: ${key}`, { key });
    }
    return true;
  }

  // --- Test helpers ---

  has(key: string): boolean {
    return this.files.has(key);
  }

  keys(): string[] {
    return [...this.files.keys()].sort();
  }

  clear(): void {
    this.files.clear();
  }

  get size(): number {
    return this.files.size;
  }
}
