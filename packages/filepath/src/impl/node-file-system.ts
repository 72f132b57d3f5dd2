/**
 * Node.js implementation of IFileSystem
 */

import type * as NodeFS from "node:fs/promises";
import { FileSystemError, toError } from "../errors.js";
import { createFilePath } from "../file-path.js";
import type { FileInfo, FileSystemErrorKind, IFileSystem } from "../types.js";

interface NodeFileSystemOptions {
  fs: typeof NodeFS;
}

const ERROR_KINDS: Record<string, FileSystemErrorKind> = {
  ENOENT: "not-found",
  EACCES: "permission-denied",
  EPERM: "permission-denied",
  EEXIST: "already-exists",
};

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Wraps an error thrown by `node:fs` into a FileSystemError.
 */
export function toFileSystemError(error: unknown, path: string): FileSystemError {
  const cause = toError(error);
  if (cause instanceof FileSystemError) return cause;
  const code = errorCode(cause);
  const kind = (code && ERROR_KINDS[code]) || "other";
  return new FileSystemError(cause.message, kind, path, { cause });
}

export class NodeFileSystem implements IFileSystem {
  private fs: typeof NodeFS;
  private paths = createFilePath();

  constructor(options: NodeFileSystemOptions) {
    this.fs = options.fs;
  }

  async stats(path: string): Promise<FileInfo | undefined> {
    try {
      const stat = await this.fs.stat(path);
      return {
        kind: stat.isDirectory() ? "directory" : "file",
        name: this.paths.getFileName(path),
        path,
        size: stat.size,
        lastModified: stat.mtimeMs,
      };
    } catch (error) {
      const code = errorCode(toError(error));
      if (code === "ENOENT" || code === "ENOTDIR") {
        return undefined;
      }
      throw toFileSystemError(error, path);
    }
  }

  async *list(path: string): AsyncGenerator<string> {
    let names: string[];
    try {
      names = await this.fs.readdir(path);
    } catch (error) {
      throw toFileSystemError(error, path);
    }
    yield* names;
  }

  async mkdir(path: string): Promise<void> {
    try {
      await this.fs.mkdir(path);
    } catch (error) {
      throw toFileSystemError(error, path);
    }
  }
}
