/**
 * FilePath binds one path grammar to every path operation.
 */

import { equalFilePath, fullPathWith, shortPathWith, toComparable } from "./compare.js";
import {
  dropDrive,
  getDrive,
  hasDrive,
  isAbsolute,
  isRelative,
  joinDrive,
  setDrive,
  splitDrive,
} from "./drive.js";
import {
  addExtension,
  dropExtension,
  dropExtensions,
  getExtension,
  getExtensions,
  hasExtension,
  joinExtension,
  setExtension,
  splitExtension,
  splitExtensions,
} from "./extension.js";
import {
  addFileName,
  dropFileName,
  getBaseName,
  getDirectory,
  getFileName,
  isDirectoryLike,
  joinFileName,
  setBaseName,
  setDirectory,
  setFileName,
  splitFileName,
} from "./filename.js";
import { grammarFor, isExtSeparator, isPathSeparator, isSearchPathSeparator } from "./grammar.js";
import { normalise } from "./normalise.js";
import { resolvePlatform } from "./platform.js";
import { splitSearchPath } from "./search-path.js";
import { combine, combineAlways, joinPath, splitDirectories, splitPath } from "./segments.js";
import type { PathGrammar, PlatformMode, PlatformOverride } from "./types.js";
import { isValid, makeValid } from "./validity.js";

export interface FilePathOptions {
  /** Forces a grammar; `"detected"` (the default) uses the OS identity. */
  platform?: PlatformOverride;
  /** OS identity to detect from instead of the host's. */
  osName?: string;
}

export class FilePath {
  readonly grammar: PathGrammar;

  constructor(mode: PlatformMode) {
    this.grammar = grammarFor(mode);
  }

  get mode(): PlatformMode {
    return this.grammar.mode;
  }

  // ========================================
  // Separators
  // ========================================

  get pathSeparator(): string {
    return this.grammar.pathSeparator;
  }

  get pathSeparators(): readonly string[] {
    return this.grammar.pathSeparators;
  }

  get searchPathSeparator(): string {
    return this.grammar.searchPathSeparator;
  }

  get extSeparator(): string {
    return this.grammar.extSeparator;
  }

  isPathSeparator(char: string): boolean {
    return isPathSeparator(this.grammar, char);
  }

  isSearchPathSeparator(char: string): boolean {
    return isSearchPathSeparator(this.grammar, char);
  }

  isExtSeparator(char: string): boolean {
    return isExtSeparator(this.grammar, char);
  }

  splitSearchPath(value: string): string[] {
    return splitSearchPath(this.grammar, value);
  }

  // ========================================
  // Drive
  // ========================================

  splitDrive(path: string): [string, string] {
    return splitDrive(this.grammar, path);
  }

  joinDrive(drive: string, rest: string): string {
    return joinDrive(this.grammar, drive, rest);
  }

  getDrive(path: string): string {
    return getDrive(this.grammar, path);
  }

  setDrive(path: string, drive: string): string {
    return setDrive(this.grammar, path, drive);
  }

  dropDrive(path: string): string {
    return dropDrive(this.grammar, path);
  }

  hasDrive(path: string): boolean {
    return hasDrive(this.grammar, path);
  }

  isRelative(path: string): boolean {
    return isRelative(this.grammar, path);
  }

  isAbsolute(path: string): boolean {
    return isAbsolute(this.grammar, path);
  }

  // ========================================
  // Extension
  // ========================================

  splitExtension(path: string): [string, string] {
    return splitExtension(this.grammar, path);
  }

  joinExtension(base: string, ext: string): string {
    return joinExtension(this.grammar, base, ext);
  }

  getExtension(path: string): string {
    return getExtension(this.grammar, path);
  }

  setExtension(path: string, ext: string): string {
    return setExtension(this.grammar, path, ext);
  }

  dropExtension(path: string): string {
    return dropExtension(this.grammar, path);
  }

  addExtension(path: string, ext: string): string {
    return addExtension(this.grammar, path, ext);
  }

  hasExtension(path: string): boolean {
    return hasExtension(this.grammar, path);
  }

  splitExtensions(path: string): [string, string] {
    return splitExtensions(this.grammar, path);
  }

  getExtensions(path: string): string {
    return getExtensions(this.grammar, path);
  }

  dropExtensions(path: string): string {
    return dropExtensions(this.grammar, path);
  }

  // ========================================
  // File name and directory
  // ========================================

  splitFileName(path: string): [string, string] {
    return splitFileName(this.grammar, path);
  }

  joinFileName(directory: string, name: string): string {
    return joinFileName(this.grammar, directory, name);
  }

  getFileName(path: string): string {
    return getFileName(this.grammar, path);
  }

  setFileName(path: string, name: string): string {
    return setFileName(this.grammar, path, name);
  }

  dropFileName(path: string): string {
    return dropFileName(this.grammar, path);
  }

  addFileName(directory: string, name: string): string {
    return addFileName(this.grammar, directory, name);
  }

  getBaseName(path: string): string {
    return getBaseName(this.grammar, path);
  }

  setBaseName(path: string, base: string): string {
    return setBaseName(this.grammar, path, base);
  }

  getDirectory(path: string): string {
    return getDirectory(this.grammar, path);
  }

  setDirectory(path: string, directory: string): string {
    return setDirectory(this.grammar, path, directory);
  }

  isDirectoryLike(path: string): boolean {
    return isDirectoryLike(this.grammar, path);
  }

  // ========================================
  // Segments
  // ========================================

  combine(left: string, right: string): string {
    return combine(this.grammar, left, right);
  }

  combineAlways(left: string, right: string): string {
    return combineAlways(this.grammar, left, right);
  }

  splitPath(path: string): string[] {
    return splitPath(this.grammar, path);
  }

  splitDirectories(path: string): string[] {
    return splitDirectories(this.grammar, path);
  }

  joinPath(segments: readonly string[]): string {
    return joinPath(this.grammar, segments);
  }

  // ========================================
  // Normalization and comparison
  // ========================================

  normalise(path: string): string {
    return normalise(this.grammar, path);
  }

  toComparable(path: string): string {
    return toComparable(this.grammar, path);
  }

  equalFilePath(a: string, b: string): boolean {
    return equalFilePath(this.grammar, a, b);
  }

  shortPathWith(base: string, target: string): string {
    return shortPathWith(this.grammar, base, target);
  }

  fullPathWith(base: string, target: string): string {
    return fullPathWith(this.grammar, base, target);
  }

  // ========================================
  // Validity
  // ========================================

  isValid(path: string): boolean {
    return isValid(this.grammar, path);
  }

  makeValid(path: string): string {
    return makeValid(this.grammar, path);
  }
}

export const posix = new FilePath("posix");
export const windows = new FilePath("windows");

/**
 * Returns the `FilePath` of the resolved platform mode.
 */
export function createFilePath(options: FilePathOptions = {}): FilePath {
  const mode = resolvePlatform(options.platform, options.osName);
  return mode === "windows" ? windows : posix;
}
