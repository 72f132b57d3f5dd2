/**
 * A path as a sequence of segments: each one a run of non-separator
 * characters followed by its run of separators.
 */

import { isAbsolute, splitDrive } from "./drive.js";
import { endsWithSeparator, isPathSeparator, trimTrailingSeparators } from "./grammar.js";
import type { PathGrammar } from "./types.js";

/**
 * Partitions text without a root into segments. Every segment but the
 * last ends with its separator run.
 */
export function splitSegments(g: PathGrammar, rest: string): string[] {
  const segments: string[] = [];
  let start = 0;
  while (start < rest.length) {
    let end = start;
    while (end < rest.length && !isPathSeparator(g, rest[end])) end++;
    while (end < rest.length && isPathSeparator(g, rest[end])) end++;
    segments.push(rest.substring(start, end));
    start = end;
  }
  return segments;
}

/**
 * A segment without its trailing separators. A segment made only of
 * separators is returned whole.
 */
export function segmentName(g: PathGrammar, segment: string): string {
  const name = trimTrailingSeparators(g, segment);
  return name.length > 0 ? name : segment;
}

/**
 * @example
 * splitPath(g, "test//item/")    // ["test//", "item/"]
 * splitPath(g, "/file/test")     // ["/", "file/", "test"]
 * splitPath(g, "")               // []
 */
export function splitPath(g: PathGrammar, path: string): string[] {
  const [drive, rest] = splitDrive(g, path);
  const segments = splitSegments(g, rest);
  return drive.length > 0 ? [drive, ...segments] : segments;
}

/**
 * As `splitPath`, without the trailing separators. A leading root is kept whole.
 *
 * @example
 * splitDirectories(g, "/test/file") // ["/", "test", "file"]
 */
export function splitDirectories(g: PathGrammar, path: string): string[] {
  const [drive, rest] = splitDrive(g, path);
  const names = splitSegments(g, rest).map((segment) => segmentName(g, segment));
  return drive.length > 0 ? [drive, ...names] : names;
}

/**
 * Joins two paths, assuming the right one is not absolute.
 */
export function combineAlways(g: PathGrammar, left: string, right: string): string {
  if (left.length === 0) return right;
  if (right.length === 0) return left;
  if (endsWithSeparator(g, left)) return left + right;
  return left + g.pathSeparator + right;
}

/**
 * Joins two paths. An absolute right side wins.
 *
 * @example
 * combine(g, "/", "test")     // "/test"
 * combine(g, "home", "/abs")  // "/abs"
 */
export function combine(g: PathGrammar, left: string, right: string): string {
  return isAbsolute(g, right) ? right : combineAlways(g, left, right);
}

export function joinPath(g: PathGrammar, segments: readonly string[]): string {
  return segments.reduceRight<string>((acc, segment) => combineAlways(g, segment, acc), "");
}
