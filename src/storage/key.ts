import { InvalidFileKeyError } from "../errors.js";
import type { FileContent } from "../types/file.js";

export function validateKey(
  key: string | null | undefined,
  pattern?: RegExp,
): asserts key is string {
  if (typeof key !== "string" || key.trim().length === 0) {
    throw new InvalidFileKeyError("File key cannot be empty", { key });
  }
  if (!pattern) return;

  // Global and sticky patterns keep state between test() calls.
  pattern.lastIndex = 0;
  if (!pattern.test(key)) {
    throw new InvalidFileKeyError(
      `File key does not match ${pattern}: ${key}`,
      { key },
    );
  }
}

export function isEmptyContent(
  content: FileContent | null | undefined,
): boolean {
  return content == null || content.length === 0;
}
