/**
 * Drive and root handling.
 *
 * A root is `""` (relative), `"/"` (Posix), `"X:"` or `"X:\"` (Windows drive)
 * or `"\\server\share\"` (UNC). `root + rest` always equals the input.
 */

import { endsWithSeparator, isPathSeparator } from "./grammar.js";
import type { PathGrammar } from "./types.js";

function isDriveLetter(char: string): boolean {
  return (char >= "a" && char <= "z") || (char >= "A" && char <= "Z");
}

function indexOfSeparator(g: PathGrammar, path: string, from: number): number {
  for (let i = from; i < path.length; i++) {
    if (isPathSeparator(g, path[i])) return i;
  }
  return -1;
}

function splitWindowsDrive(g: PathGrammar, path: string): [string, string] {
  if (path.length >= 2 && isDriveLetter(path[0]) && path[1] === ":") {
    if (path.length === 2) return [path, ""];
    if (isPathSeparator(g, path[2])) return [path.substring(0, 3), path.substring(3)];
  }

  if (path.length >= 2 && isPathSeparator(g, path[0]) && isPathSeparator(g, path[1])) {
    // \\server\share\ : the root runs through the separator after the share
    const serverEnd = indexOfSeparator(g, path, 2);
    if (serverEnd === -1) return [path, ""];
    const shareEnd = indexOfSeparator(g, path, serverEnd + 1);
    if (shareEnd === -1) return [path, ""];
    return [path.substring(0, shareEnd + 1), path.substring(shareEnd + 1)];
  }

  return ["", path];
}

export function splitDrive(g: PathGrammar, path: string): [string, string] {
  if (g.mode === "windows") {
    return splitWindowsDrive(g, path);
  }
  if (path.length > 0 && isPathSeparator(g, path[0])) {
    return [path.substring(0, 1), path.substring(1)];
  }
  return ["", path];
}

/**
 * Inverse of `splitDrive`. On Windows a separator is inserted between a
 * non-empty root and a non-empty rest unless the root already ends in one.
 */
export function joinDrive(g: PathGrammar, drive: string, rest: string): string {
  if (g.mode === "posix") return drive + rest;
  if (drive.length === 0) return rest;
  if (rest.length === 0) return drive;
  if (endsWithSeparator(g, drive)) return drive + rest;
  return drive + g.pathSeparator + rest;
}

export function getDrive(g: PathGrammar, path: string): string {
  return splitDrive(g, path)[0];
}

export function dropDrive(g: PathGrammar, path: string): string {
  return splitDrive(g, path)[1];
}

/**
 * Replaces the root of `path` with `drive`.
 */
export function setDrive(g: PathGrammar, path: string, drive: string): string {
  return joinDrive(g, drive, dropDrive(g, path));
}

export function hasDrive(g: PathGrammar, path: string): boolean {
  return getDrive(g, path).length > 0;
}

/**
 * A path is relative when it has no root.
 */
export function isRelative(g: PathGrammar, path: string): boolean {
  return !hasDrive(g, path);
}

export function isAbsolute(g: PathGrammar, path: string): boolean {
  return !isRelative(g, path);
}
