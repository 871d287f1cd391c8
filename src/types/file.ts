export type FileContent = string | Uint8Array;

export interface FileRecord {
  readonly key: string;
  content: FileContent | null;
  /** Last persisted modification time, when the adapter tracks one. */
  modifiedAt?: Date;
}

export type FileOperation = "save" | "load" | "init" | "delete";

export interface AfterOperationContext {
  operation: FileOperation;
  key: string;
  result: boolean | FileRecord;
}

export interface OperationErrorContext {
  operation: FileOperation;
  key: string | null | undefined;
  error: unknown;
}

export type AfterOperationHook = (ctx: AfterOperationContext) => Promise<void> | void;
export type OperationErrorHook = (ctx: OperationErrorContext) => Promise<void> | void;

export interface FileStorageHooks {
  afterOperation?: AfterOperationHook[];
  onError?: OperationErrorHook[];
}
