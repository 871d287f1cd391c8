import type {
  AfterOperationContext,
  FileStorageHooks,
  OperationErrorContext,
} from "../types/file.js";

export async function runAfterOperationHooks(
  hooks: FileStorageHooks | undefined,
  ctx: AfterOperationContext,
): Promise<void> {
  if (!hooks?.afterOperation) return;
  for (const hook of hooks.afterOperation) {
    await hook(ctx);
  }
}

export async function runOperationErrorHooks(
  hooks: FileStorageHooks | undefined,
  ctx: OperationErrorContext,
): Promise<void> {
  if (!hooks?.onError) return;
  for (const hook of hooks.onError) {
    await hook(ctx);
  }
}
