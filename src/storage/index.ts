export type { StorageAdapter } from "./adapter.js";
export type { FileEncoding, FileSystemStorageOptions } from "./fs.js";
export type { FileStorageOptions } from "./file-storage.js";
export { FileStorage } from "./file-storage.js";
export { FileSystemStorageAdapter } from "./fs.js";
export { InMemoryStorageAdapter } from "./memory.js";
export { validateKey, isEmptyContent } from "./key.js";

import type { FileStorageConfig } from "../config.js";
import type { FileStorageHooks } from "../types/file.js";
import type { StorageAdapter } from "./adapter.js";
import type { FileEncoding } from "./fs.js";
import { FileStorage } from "./file-storage.js";
import { FileSystemStorageAdapter } from "./fs.js";
import { InMemoryStorageAdapter } from "./memory.js";

export type StorageAdapterOptions =
  | { type: "memory" }
  | { type: "filesystem"; baseDir: string; encoding?: FileEncoding };

export function createStorageAdapter(
  options: StorageAdapterOptions,
): StorageAdapter {
  switch (options.type) {
    case "memory":
      return new InMemoryStorageAdapter();
    case "filesystem":
      return new FileSystemStorageAdapter({
        baseDir: options.baseDir,
        encoding: options.encoding,
      });
  }
}

export function createFileStorage(
  config: FileStorageConfig,
  options?: { hooks?: FileStorageHooks },
): FileStorage {
  const adapter =
    config.adapter === "memory"
      ? createStorageAdapter({ type: "memory" })
      : createStorageAdapter({
          type: "filesystem",
          baseDir: config.baseDir,
          encoding: config.encoding,
        });
  return new FileStorage({
    adapter,
    keyPattern: config.keyPattern,
    hooks: options?.hooks,
  });
}
