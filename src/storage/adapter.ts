import type { FileRecord } from "../types/file.js";

/**
 * Backing store consumed by {@link FileStorage}.
 *
 * `load` and `delete` must reject with `FileNotFoundError` when no record
 * maps to the key; the facade relies on that to tell "absent" apart from
 * other failures during `init`.
 */
export interface StorageAdapter {
  save(file: FileRecord): Promise<boolean>;
  load(key: string): Promise<FileRecord>;
  /** Build a new, empty record bound to `key`. Does not persist it. */
  init(key: string, touch: boolean): Promise<FileRecord>;
  delete(key: string): Promise<boolean>;
}
