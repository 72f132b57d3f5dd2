import type { FileSystemErrorKind } from "./types.js";

/**
 * Failure reported by an `IFileSystem` implementation.
 */
export class FileSystemError extends Error {
  constructor(
    message: string,
    public readonly kind: FileSystemErrorKind,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FileSystemError";
  }
}

export class NotFoundError extends FileSystemError {
  constructor(path: string, options?: { cause?: unknown }) {
    super(`No such file or directory: ${path}`, "not-found", path, options);
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends FileSystemError {
  constructor(path: string, options?: { cause?: unknown }) {
    super(`File already exists: ${path}`, "already-exists", path, options);
    this.name = "AlreadyExistsError";
  }
}

export class PermissionDeniedError extends FileSystemError {
  constructor(path: string, options?: { cause?: unknown }) {
    super(`Permission denied: ${path}`, "permission-denied", path, options);
    this.name = "PermissionDeniedError";
  }
}

export function isFileSystemError(error: unknown, kind?: FileSystemErrorKind): error is FileSystemError {
  return error instanceof FileSystemError && (kind === undefined || error.kind === kind);
}

/**
 * Converts any thrown value to an Error.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === "string") {
    return new Error(error);
  }

  if (typeof error === "object" && error !== null) {
    if ("message" in error && typeof error.message === "string") {
      return new Error(error.message);
    }
    try {
      return new Error(JSON.stringify(error));
    } catch (_stringifyError) {
      // Circular structures cannot be stringified
      return new Error(String(error));
    }
  }

  return new Error(String(error));
}
