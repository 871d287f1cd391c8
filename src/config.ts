import { z } from "zod";
import { FileStorageConfigError } from "./errors.js";

const keyPatternSchema = z
  .string()
  .optional()
  .transform((source, ctx): RegExp | undefined => {
    if (source === undefined) return undefined;
    try {
      return new RegExp(source);
    } catch (err: unknown) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid key pattern: ${err instanceof Error ? err.message : String(err)}`,
      });
      return z.NEVER;
    }
  });

export const FileStorageConfigSchema = z.object({
  adapter: z.enum(["memory", "filesystem"]).default("filesystem"),
  baseDir: z.string().min(1).default("./storage"),
  encoding: z.enum(["utf-8", "binary"]).default("utf-8"),
  keyPattern: keyPatternSchema,
});

export type FileStorageConfig = z.output<typeof FileStorageConfigSchema>;
export type FileStorageConfigInput = z.input<typeof FileStorageConfigSchema>;

export function parseFileStorageConfig(input: unknown): FileStorageConfig {
  const parsed = FileStorageConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new FileStorageConfigError(
      `Invalid file storage configuration: ${details}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

function fromEnv(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Reads `FILE_STORAGE_ADAPTER`, `FILE_STORAGE_DIR`, `FILE_STORAGE_ENCODING`
 * and `FILE_STORAGE_KEY_PATTERN`. Empty variables count as unset.
 */
export function loadFileStorageConfig(
  env: NodeJS.ProcessEnv = process.env,
): FileStorageConfig {
  return parseFileStorageConfig({
    adapter: fromEnv(env.FILE_STORAGE_ADAPTER),
    baseDir: fromEnv(env.FILE_STORAGE_DIR),
    encoding: fromEnv(env.FILE_STORAGE_ENCODING),
    keyPattern: fromEnv(env.FILE_STORAGE_KEY_PATTERN),
  });
}
