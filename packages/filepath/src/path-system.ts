/**
 * PathSystem: helpers that combine the path algebra with an injected
 * filesystem and environment
 */

import { isFileSystemError, toError } from "./errors.js";
import { createFilePath, type FilePath } from "./file-path.js";
import { type ILogger, NoOpLogger } from "./logger.js";
import type { IEnvironment, IFileSystem, PlatformOverride } from "./types.js";
import { collectGenerator } from "./utils/collect-stream.js";

export interface PathSystemConfig {
  /** How many seeds `getTemporaryFileNew` tries before giving up. */
  temporaryFileAttempts?: number;
}

export interface PathSystemOptions {
  fs: IFileSystem;
  env: IEnvironment;
  /** Forces a grammar; `"detected"` (the default) asks `env.osName()`. */
  platform?: PlatformOverride;
  logger?: ILogger;
  config?: PathSystemConfig;
}

const DEFAULT_CONFIG: Required<PathSystemConfig> = {
  temporaryFileAttempts: 100,
};

const SEARCH_PATH_VARIABLE = "PATH";

function isFakeDirectory(name: string): boolean {
  return name === "." || name === "..";
}

export class PathSystem {
  readonly paths: FilePath;
  private fs: IFileSystem;
  private env: IEnvironment;
  private logger: ILogger;
  private config: Required<PathSystemConfig>;

  constructor(options: PathSystemOptions) {
    this.fs = options.fs;
    this.env = options.env;
    this.logger = options.logger ?? new NoOpLogger();
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.paths = createFilePath({
      platform: options.platform,
      osName: this.env.osName(),
    });
  }

  // ========================================
  // IFileSystem adapters
  // ========================================

  async pathExists(path: string): Promise<boolean> {
    const info = await this.fs.stats(path);
    return info !== undefined;
  }

  async directoryExists(path: string): Promise<boolean> {
    const info = await this.fs.stats(path);
    return info?.kind === "directory";
  }

  createDirectory(path: string): Promise<void> {
    return this.fs.mkdir(path);
  }

  listDirectoryEntries(path: string): Promise<string[]> {
    return collectGenerator(this.fs.list(path));
  }

  // ========================================
  // Environment
  // ========================================

  currentDirectory(): string {
    return this.env.currentDirectory();
  }

  /**
   * `fullPathWith` the current directory.
   */
  fullPath(path: string): string {
    return this.paths.fullPathWith(this.currentDirectory(), path);
  }

  /**
   * `shortPathWith` the current directory.
   */
  shortPath(path: string): string {
    return this.paths.shortPathWith(this.currentDirectory(), path);
  }

  /**
   * Entries of the `PATH` variable; empty when it is unset.
   */
  getSearchPath(): string[] {
    return this.paths.splitSearchPath(this.env.getVariable(SEARCH_PATH_VARIABLE) ?? "");
  }

  // ========================================
  // Directories
  // ========================================

  /**
   * Names of the subdirectories of `path`, without `.` and `..`.
   */
  async getDirectoryList(path: string): Promise<string[]> {
    const names = await this.listDirectoryEntries(path);
    const directories: string[] = [];
    for (const name of names) {
      if (isFakeDirectory(name)) continue;
      if (await this.directoryExists(this.paths.combine(path, name))) {
        directories.push(name);
      }
    }
    return directories;
  }

  /**
   * Creates a directory and every missing parent (`mkdir -p`).
   * For example `ensureDirectory("./One/Two/Three")` creates `Two` and
   * `Three` if `.` and `One` already exist.
   */
  async ensureDirectory(path: string): Promise<void> {
    const [drive, rest] = this.paths.splitDrive(this.paths.normalise(path));
    let current = drive;
    for (const segment of this.paths.splitPath(rest)) {
      current += segment;
      if (await this.directoryExists(current)) continue;
      try {
        await this.createDirectory(current);
        this.logger.debug("Created directory", { path: current });
      } catch (error) {
        // Someone else may have created it between the check and the mkdir
        if (isFileSystemError(error, "already-exists") && (await this.directoryExists(current))) {
          continue;
        }
        this.logger.error("Failed to create directory", toError(error), { path: current });
        throw error;
      }
    }
  }

  // ========================================
  // Temporary file names
  // ========================================

  /**
   * `<tmpdir>/<process name><seed>.<ext>`, made valid for the platform.
   */
  getTemporaryFileSeed(seed: number, ext: string): string {
    const name = `${this.env.processName()}${seed}`;
    const file = this.paths.combine(this.env.temporaryDirectory(), name);
    return this.paths.makeValid(this.paths.addExtension(file, ext));
  }

  getTemporaryFile(ext: string): string {
    return this.getTemporaryFileSeed(1, ext);
  }

  /**
   * First temporary name nothing exists at, or `undefined` once every seed
   * is taken. The name may be claimed by someone else before it is used.
   */
  async getTemporaryFileNew(ext: string): Promise<string | undefined> {
    for (let seed = 1; seed <= this.config.temporaryFileAttempts; seed++) {
      const file = this.getTemporaryFileSeed(seed, ext);
      if (!(await this.pathExists(file))) {
        return file;
      }
      this.logger.debug("Temporary name taken", { path: file });
    }
    this.logger.info("No free temporary name", {
      attempts: this.config.temporaryFileAttempts,
    });
    return undefined;
  }
}
