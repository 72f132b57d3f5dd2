/**
 * In-memory implementation of IFileSystem for testing
 */

import { AlreadyExistsError, FileSystemError, NotFoundError } from "../errors.js";
import { createFilePath, type FilePath } from "../file-path.js";
import type { FileInfo, IFileSystem, PlatformOverride } from "../types.js";

interface FileEntry {
  kind: "file";
  path: string;
  content: Uint8Array;
  lastModified: number;
}

interface DirEntry {
  kind: "directory";
  path: string;
  lastModified: number;
}

type Entry = FileEntry | DirEntry;

export interface MemFileSystemOptions {
  /** Grammar the stored paths follow. Defaults to `"posix"`. */
  platform?: PlatformOverride;
  /** OS identity used when `platform` is `"detected"`. Defaults to the host's. */
  osName?: string;
  /** Directory relative paths are resolved against. Defaults to the root. */
  cwd?: string;
  /** Initial files to populate. Keys are paths, values are content. */
  initialFiles?: Record<string, string | Uint8Array>;
  /** Initial directories to create, with their parents. */
  initialDirectories?: string[];
}

/**
 * Directory tree held in a map keyed by the comparable form of each
 * absolute path. Every root exists. `list` yields `.` and `..` ahead of the
 * real entries, as `readdir(3)` does.
 */
export class MemFileSystem implements IFileSystem {
  private entries = new Map<string, Entry>();
  private paths: FilePath;
  private cwd: string;

  constructor(options: MemFileSystemOptions = {}) {
    this.paths = createFilePath({
      platform: options.platform ?? "posix",
      osName: options.osName,
    });
    this.cwd = options.cwd ?? (this.paths.mode === "windows" ? "C:\\" : "/");

    for (const directory of options.initialDirectories ?? []) {
      this.ensureParentDirs(this.resolve(directory));
      this.setDirectory(this.resolve(directory));
    }

    for (const [path, content] of Object.entries(options.initialFiles ?? {})) {
      const bytes = typeof content === "string" ? new TextEncoder().encode(content) : content;
      this.setFile(this.resolve(path), bytes);
    }
  }

  /**
   * Absolute normalized path without a trailing separator outside the root.
   */
  private resolve(path: string): string {
    const absolute = this.paths.fullPathWith(this.cwd, path);
    const [drive, rest] = this.paths.splitDrive(absolute);
    if (this.paths.isDirectoryLike(rest)) {
      return drive + rest.substring(0, rest.length - 1);
    }
    return absolute;
  }

  private keyOf(resolved: string): string {
    return this.paths.toComparable(resolved);
  }

  private isRoot(resolved: string): boolean {
    return this.paths.hasDrive(resolved) && this.paths.dropDrive(resolved).length === 0;
  }

  private parentOf(resolved: string): string {
    return this.resolve(this.paths.dropFileName(resolved));
  }

  private lookup(resolved: string): Entry | undefined {
    const entry = this.entries.get(this.keyOf(resolved));
    if (entry) return entry;
    if (this.isRoot(resolved)) {
      return { kind: "directory", path: resolved, lastModified: 0 };
    }
    return undefined;
  }

  private setDirectory(resolved: string): void {
    if (this.lookup(resolved)) return;
    this.entries.set(this.keyOf(resolved), {
      kind: "directory",
      path: resolved,
      lastModified: Date.now(),
    });
  }

  private setFile(resolved: string, content: Uint8Array): void {
    this.ensureParentDirs(resolved);
    this.entries.set(this.keyOf(resolved), {
      kind: "file",
      path: resolved,
      content,
      lastModified: Date.now(),
    });
  }

  private ensureParentDirs(resolved: string): void {
    const [drive, rest] = this.paths.splitDrive(resolved);
    const segments = this.paths.splitPath(rest);
    let current = drive;
    for (const segment of segments.slice(0, -1)) {
      current += segment;
      this.setDirectory(this.resolve(current));
    }
  }

  async stats(path: string): Promise<FileInfo | undefined> {
    const resolved = this.resolve(path);
    const entry = this.lookup(resolved);
    if (!entry) return undefined;

    const info: FileInfo = {
      kind: entry.kind,
      name: this.paths.getFileName(entry.path),
      path: entry.path,
      lastModified: entry.lastModified,
    };
    if (entry.kind === "file") {
      info.size = entry.content.length;
    }
    return info;
  }

  async *list(path: string): AsyncGenerator<string> {
    const resolved = this.resolve(path);
    const entry = this.lookup(resolved);
    if (!entry) {
      throw new NotFoundError(path);
    }
    if (entry.kind !== "directory") {
      throw new FileSystemError(`Not a directory: ${path}`, "other", path);
    }

    yield ".";
    yield "..";

    const key = this.keyOf(resolved);
    for (const child of [...this.entries.values()]) {
      if (this.isRoot(child.path)) continue;
      if (this.keyOf(this.parentOf(child.path)) === key) {
        yield this.paths.getFileName(child.path);
      }
    }
  }

  async mkdir(path: string): Promise<void> {
    const resolved = this.resolve(path);
    if (this.lookup(resolved)) {
      throw new AlreadyExistsError(path);
    }

    const parent = this.lookup(this.parentOf(resolved));
    if (!parent) {
      throw new NotFoundError(path);
    }
    if (parent.kind !== "directory") {
      throw new FileSystemError(`Not a directory: ${path}`, "other", path);
    }

    this.setDirectory(resolved);
  }
}
