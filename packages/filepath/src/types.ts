/**
 * Type definitions for the path algebra and its capability interfaces
 */

export type PlatformMode = "posix" | "windows";

/**
 * Override slot for the platform mode. `"detected"` uses the OS identity.
 */
export type PlatformOverride = "detected" | PlatformMode;

/**
 * Separators of one path grammar.
 */
export interface PathGrammar {
  readonly mode: PlatformMode;
  /** The canonical separator, used whenever one is inserted. */
  readonly pathSeparator: string;
  /** Every character accepted as a separator. */
  readonly pathSeparators: readonly string[];
  /** Separator between entries of a search-path variable such as `PATH`. */
  readonly searchPathSeparator: string;
  readonly extSeparator: string;
}

export type FileKind = "file" | "directory";

export interface FileInfo {
  kind: FileKind;
  name: string;
  path: string;
  size?: number;
  lastModified: number;
}

export type FileSystemErrorKind = "not-found" | "permission-denied" | "already-exists" | "other";

/**
 * Filesystem capability consumed by `PathSystem`.
 * Implementations report failures as `FileSystemError`.
 */
export interface IFileSystem {
  /** Returns `undefined` when nothing exists at `path`. */
  stats(path: string): Promise<FileInfo | undefined>;
  /** Yields the raw entry names of a directory. */
  list(path: string): AsyncGenerator<string>;
  /** Creates one directory; the parent must already exist. */
  mkdir(path: string): Promise<void>;
}

/**
 * Environment capability consumed by `PathSystem`.
 */
export interface IEnvironment {
  currentDirectory(): string;
  getVariable(name: string): string | undefined;
  temporaryDirectory(): string;
  processName(): string;
  osName(): string;
}
