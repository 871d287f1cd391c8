export type {
  FileContent,
  FileRecord,
  FileOperation,
  AfterOperationContext,
  OperationErrorContext,
  AfterOperationHook,
  OperationErrorHook,
  FileStorageHooks,
} from "./file.js";
