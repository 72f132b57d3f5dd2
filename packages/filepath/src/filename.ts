/**
 * Operations on the final component of a path and the directory before it.
 */

import { splitDrive } from "./drive.js";
import { dropExtension, joinExtension, splitExtension } from "./extension.js";
import { endsWithSeparator, lastSeparatorIndex, trimTrailingSeparators } from "./grammar.js";
import type { PathGrammar } from "./types.js";

/**
 * Splits a path into its directory prefix (root included, trailing
 * separator kept) and the file name after the last separator.
 *
 * @example
 * splitFileName(g, "file/bob.txt") // ["file/", "bob.txt"]
 * splitFileName(g, "bob")          // ["", "bob"]
 */
export function splitFileName(g: PathGrammar, path: string): [string, string] {
  const [drive, rest] = splitDrive(g, path);
  const index = lastSeparatorIndex(g, rest);
  return [drive + rest.substring(0, index + 1), rest.substring(index + 1)];
}

/**
 * Inverse of `splitFileName`.
 */
export function joinFileName(g: PathGrammar, directory: string, name: string): string {
  if (name.length === 0) return directory;
  return addFileName(g, directory, name);
}

/**
 * Appends a file name, inserting a separator unless the prefix is empty
 * or already ends with one.
 */
export function addFileName(g: PathGrammar, directory: string, name: string): string {
  if (directory.length === 0) return name;
  if (endsWithSeparator(g, directory)) return directory + name;
  return directory + g.pathSeparator + name;
}

export function getFileName(g: PathGrammar, path: string): string {
  return splitFileName(g, path)[1];
}

export function dropFileName(g: PathGrammar, path: string): string {
  return splitFileName(g, path)[0];
}

export function setFileName(g: PathGrammar, path: string, name: string): string {
  return joinFileName(g, dropFileName(g, path), name);
}

/**
 * File name without its last extension.
 */
export function getBaseName(g: PathGrammar, path: string): string {
  return dropExtension(g, getFileName(g, path));
}

/**
 * Replaces the base name, keeping the directory and the extension.
 *
 * @example
 * setBaseName(g, "file/test.txt", "bob") // "file/bob.txt"
 */
export function setBaseName(g: PathGrammar, path: string, base: string): string {
  const [directory, name] = splitFileName(g, path);
  const [, ext] = splitExtension(g, name);
  return joinFileName(g, directory, joinExtension(g, base, ext));
}

/**
 * The directory of a path, moving up one level: `dropFileName` without its
 * trailing separators. A bare root keeps one separator.
 *
 * @example
 * getDirectory(g, "/foo/bar/baz")  // "/foo/bar"
 * getDirectory(g, "/foo/bar/baz/") // "/foo/bar/baz"
 * getDirectory(g, "/")             // "/"
 */
export function getDirectory(g: PathGrammar, path: string): string {
  const prefix = dropFileName(g, path);
  const trimmed = trimTrailingSeparators(g, prefix);
  return trimmed.length > 0 ? trimmed : prefix.substring(0, 1);
}

/**
 * Moves the file name of `path` under `directory`.
 */
export function setDirectory(g: PathGrammar, path: string, directory: string): string {
  return addFileName(g, directory, getFileName(g, path));
}

/**
 * True if the path ends with a separator. Never queries the filesystem.
 */
export function isDirectoryLike(g: PathGrammar, path: string): boolean {
  return endsWithSeparator(g, path);
}
