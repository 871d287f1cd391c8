export type FileStorageErrorKind =
  | "InvalidKey"
  | "EmptyContent"
  | "NotFound"
  | "AlreadyExists"
  | "InvalidConfig";

export class FileStorageError extends Error {
  readonly key?: string | null;

  constructor(
    message: string,
    options?: { key?: string | null; cause?: Error },
  ) {
    super(message, { cause: options?.cause });
    this.name = "FileStorageError";
    this.key = options?.key;
  }
}

export class InvalidFileKeyError extends FileStorageError {
  readonly kind = "InvalidKey" as const;

  constructor(
    message: string,
    options: { key: string | null | undefined; cause?: Error },
  ) {
    super(message, options);
    this.name = "InvalidFileKeyError";
  }
}

export class EmptyFileContentError extends FileStorageError {
  readonly kind = "EmptyContent" as const;
  declare readonly key: string;

  constructor(message: string, options: { key: string; cause?: Error }) {
    super(message, options);
    this.name = "EmptyFileContentError";
  }
}

export class FileNotFoundError extends FileStorageError {
  readonly kind = "NotFound" as const;
  declare readonly key: string;

  constructor(message: string, options: { key: string; cause?: Error }) {
    super(message, options);
    this.name = "FileNotFoundError";
  }
}

export class FileAlreadyExistsError extends FileStorageError {
  readonly kind = "AlreadyExists" as const;
  declare readonly key: string;

  constructor(message: string, options: { key: string; cause?: Error }) {
    super(message, options);
    this.name = "FileAlreadyExistsError";
  }
}

export class FileStorageConfigError extends FileStorageError {
  readonly kind = "InvalidConfig" as const;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "FileStorageConfigError";
  }
}
