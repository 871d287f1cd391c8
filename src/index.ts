// Types
export type {
  FileContent,
  FileRecord,
  FileOperation,
  AfterOperationContext,
  OperationErrorContext,
  AfterOperationHook,
  OperationErrorHook,
  FileStorageHooks,
} from "./types/index.js";

// Errors
export type { FileStorageErrorKind } from "./errors.js";
export {
  FileStorageError,
  InvalidFileKeyError,
  EmptyFileContentError,
  FileNotFoundError,
  FileAlreadyExistsError,
  FileStorageConfigError,
} from "./errors.js";

// Storage
export type {
  StorageAdapter,
  StorageAdapterOptions,
  FileStorageOptions,
  FileEncoding,
  FileSystemStorageOptions,
} from "./storage/index.js";
export {
  FileStorage,
  FileSystemStorageAdapter,
  InMemoryStorageAdapter,
  createStorageAdapter,
  createFileStorage,
  validateKey,
  isEmptyContent,
} from "./storage/index.js";

// Config
export type { FileStorageConfig, FileStorageConfigInput } from "./config.js";
export {
  FileStorageConfigSchema,
  parseFileStorageConfig,
  loadFileStorageConfig,
} from "./config.js";
