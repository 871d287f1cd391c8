import {
  EmptyFileContentError,
  FileAlreadyExistsError,
  FileNotFoundError,
} from "../errors.js";
import type {
  FileOperation,
  FileRecord,
  FileStorageHooks,
} from "../types/file.js";
import type { StorageAdapter } from "./adapter.js";
import { runAfterOperationHooks, runOperationErrorHooks } from "./hooks.js";
import { isEmptyContent, validateKey } from "./key.js";

export interface FileStorageOptions {
  adapter: StorageAdapter;
  /** Keys must also match this pattern, on top of being non-blank. */
  keyPattern?: RegExp;
  hooks?: FileStorageHooks;
}

/**
 * Validates keys and content, then delegates to a {@link StorageAdapter}.
 *
 * Keys are checked before every adapter call, so an adapter never sees a
 * blank key. Nothing is cached, retried or locked here.
 */
export class FileStorage {
  readonly adapter: StorageAdapter;
  private readonly keyPattern?: RegExp;
  private readonly hooks?: FileStorageHooks;

  constructor(options: FileStorageOptions) {
    this.adapter = options.adapter;
    this.keyPattern = options.keyPattern;
    this.hooks = options.hooks;
  }

  /**
   * Persists changes to a file.
   *
   * @throws InvalidFileKeyError if the key is blank or fails the key pattern
   * @throws EmptyFileContentError if the content is null or empty
   */
  async save(file: FileRecord): Promise<boolean> {
    return this.run("save", file.key, async (key) => {
      if (isEmptyContent(file.content)) {
        throw new EmptyFileContentError("Cannot save an empty file", { key });
      }
      return this.adapter.save(file);
    });
  }

  /**
   * Loads a file for reading and modifying.
   *
   * @throws InvalidFileKeyError if the key is invalid
   * @throws FileNotFoundError from the adapter if no file maps to the key
   */
  async load(key: string | null | undefined): Promise<FileRecord> {
    return this.run("load", key, (validKey) => this.adapter.load(validKey));
  }

  /**
   * Initializes a new file for further modifying.
   *
   * With `touch`, the empty file is saved right away, which reserves the key
   * in the backing store at the cost of one more adapter round trip. Without
   * it the key stays free until the first save. The existence check and the
   * creation are separate adapter calls, so two callers may both initialize
   * the same absent key.
   *
   * @throws InvalidFileKeyError if the key is invalid
   * @throws FileAlreadyExistsError if a file already exists for the key
   */
  async init(
    key: string | null | undefined,
    touch = false,
  ): Promise<FileRecord> {
    return this.run("init", key, async (validKey) => {
      if (await this.exists(validKey)) {
        throw new FileAlreadyExistsError("File already exists", {
          key: validKey,
        });
      }

      const file = await this.adapter.init(validKey, touch);
      if (touch) {
        // The adapter's empty record is the one content-less save allowed.
        await this.adapter.save(file);
      }
      return file;
    });
  }

  /**
   * Deletes a file.
   *
   * @throws InvalidFileKeyError if the key is invalid
   * @throws FileNotFoundError from the adapter if no file maps to the key
   */
  async delete(key: string | null | undefined): Promise<boolean> {
    return this.run("delete", key, (validKey) => this.adapter.delete(validKey));
  }

  private async exists(key: string): Promise<boolean> {
    try {
      await this.adapter.load(key);
      return true;
    } catch (err: unknown) {
      if (err instanceof FileNotFoundError) return false;
      throw err;
    }
  }

  private async run<T extends boolean | FileRecord>(
    operation: FileOperation,
    key: string | null | undefined,
    fn: (key: string) => Promise<T>,
  ): Promise<T> {
    let validKey: string;
    let result: T;
    try {
      validateKey(key, this.keyPattern);
      validKey = key;
      result = await fn(validKey);
    } catch (error: unknown) {
      await runOperationErrorHooks(this.hooks, { operation, key, error });
      throw error;
    }
    await runAfterOperationHooks(this.hooks, {
      operation,
      key: validKey,
      result,
    });
    return result;
  }
}
