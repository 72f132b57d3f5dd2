/**
 * Lexical normalization: canonical separators, collapsed separator runs,
 * `.` removed and `..` resolved against the names before it.
 */

import { joinDrive, splitDrive } from "./drive.js";
import { endsWithSeparator, isPathSeparator, trimTrailingSeparators } from "./grammar.js";
import { splitSegments } from "./segments.js";
import type { PathGrammar } from "./types.js";

const CURRENT = ".";
const PARENT = "..";

function toCanonicalSeparators(g: PathGrammar, text: string): string {
  let result = "";
  for (const char of text) {
    result += isPathSeparator(g, char) ? g.pathSeparator : char;
  }
  return result;
}

/**
 * Drops `.` and cancels each `..` against the last real name kept so far.
 * A `..` with nothing left to cancel is kept, ahead of every real name.
 */
function resolveDots(names: readonly string[]): string[] {
  const parents: string[] = [];
  const kept: string[] = [];
  for (const name of names) {
    if (name === CURRENT) continue;
    if (name === PARENT) {
      if (kept.length > 0) kept.pop();
      else parents.push(PARENT);
      continue;
    }
    kept.push(name);
  }
  return [...parents, ...kept];
}

/**
 * Normalizes a path without touching the filesystem.
 * Idempotent: `normalise(g, normalise(g, x)) === normalise(g, x)`.
 *
 * @example
 * normalise(posix, "/test/file/../bob/fred/") // "/test/bob/fred/"
 * normalise(posix, "./bob/fred/")             // "bob/fred/"
 * normalise(posix, "a/..")                    // ""
 * normalise(windows, "c:\\file/bob\\")        // "c:\\file\\bob\\"
 */
export function normalise(g: PathGrammar, path: string): string {
  if (path.length === 0) return "";

  const [drive, rest] = splitDrive(g, path);
  const root = toCanonicalSeparators(g, drive);

  // A separator run right after a separator-terminated root belongs to the root's run
  const leading =
    rest.length > 0 && isPathSeparator(g, rest[0]) && !endsWithSeparator(g, root)
      ? g.pathSeparator
      : "";

  const names = splitSegments(g, rest)
    .map((segment) => trimTrailingSeparators(g, segment))
    .filter((name) => name.length > 0);

  const result = joinDrive(g, root, leading + resolveDots(names).join(g.pathSeparator));
  const trailing = endsWithSeparator(g, path);

  // Nothing left: "" or, when the input ended with a separator, "./"
  if (result.length === 0) return trailing ? CURRENT + g.pathSeparator : "";
  if (trailing && !endsWithSeparator(g, result)) return result + g.pathSeparator;
  return result;
}
