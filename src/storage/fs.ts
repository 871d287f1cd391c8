import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FileNotFoundError, InvalidFileKeyError } from "../errors.js";
import type { FileContent, FileRecord } from "../types/file.js";
import type { StorageAdapter } from "./adapter.js";

export type FileEncoding = "utf-8" | "binary";

export interface FileSystemStorageOptions {
  baseDir: string;
  /** `"utf-8"` loads content as strings, `"binary"` as byte arrays. */
  encoding?: FileEncoding;
}

// ENOTDIR: a parent segment of the key is a regular file, so no record maps to it.
const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR"]);

function isNotFound(err: unknown): err is NodeJS.ErrnoException {
  if (!(err instanceof Error)) return false;
  const code = (err as NodeJS.ErrnoException).code;
  return code !== undefined && NOT_FOUND_CODES.has(code);
}

/**
 * Stores each record as one file under `baseDir`; the key is the file's
 * path relative to it.
 */
export class FileSystemStorageAdapter implements StorageAdapter {
  readonly baseDir: string;
  readonly encoding: FileEncoding;

  constructor(options: FileSystemStorageOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.encoding = options.encoding ?? "utf-8";
  }

  private resolve(key: string): string {
    const resolved = path.resolve(this.baseDir, key);
    const rel = path.relative(this.baseDir, resolved);
    if (
      rel === "" ||
      rel === ".." ||
      rel.startsWith(".." + path.sep) ||
      path.isAbsolute(rel)
    ) {
      throw new InvalidFileKeyError(`File key escapes storage directory: ${key}`, {
        key,
      });
    }
    return resolved;
  }

  private emptyContent(): FileContent {
    return this.encoding === "binary" ? new Uint8Array(0) : "";
  }

  async save(file: FileRecord): Promise<boolean> {
    const full = this.resolve(file.key);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, file.content ?? this.emptyContent());
    return true;
  }

  async load(key: string): Promise<FileRecord> {
    const full = this.resolve(key);
    try {
      const [buf, s] = await Promise.all([fs.readFile(full), fs.stat(full)]);
      const content: FileContent =
        this.encoding === "binary"
          ? new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength)
          : buf.toString("utf-8");
      return { key, content, modifiedAt: s.mtime };
    } catch (err: unknown) {
      if (isNotFound(err)) {
        throw new FileNotFoundError(`File not found: ${key}`, {
          key,
          cause: err,
        });
      }
      throw err;
    }
  }

  async init(key: string, touch: boolean): Promise<FileRecord> {
    this.resolve(key);
    return { key, content: touch ? this.emptyContent() : null };
  }

  async delete(key: string): Promise<boolean> {
    const full = this.resolve(key);
    try {
      await fs.unlink(full);
      return true;
    } catch (err: unknown) {
      if (isNotFound(err)) {
        throw new FileNotFoundError(`File not found: ${key}`, {
          key,
          cause: err,
        });
      }
      throw err;
    }
  }
}
