/**
 * Path equality and lexical relativization.
 *
 * Nothing here follows symlinks or consults the filesystem; two paths that
 * compare unequal may still name the same file.
 */

import { isRelative, splitDrive } from "./drive.js";
import { endsWithSeparator, trimTrailingSeparators } from "./grammar.js";
import { normalise } from "./normalise.js";
import { combine, joinPath, segmentName, splitSegments } from "./segments.js";
import type { PathGrammar } from "./types.js";

/**
 * Lowercases ASCII letters on Windows; identity on Posix.
 */
export function foldCase(g: PathGrammar, text: string): string {
  if (g.mode === "posix") return text;
  return text.replace(/[A-Z]/g, (char) => char.toLowerCase());
}

/**
 * The form two paths are compared in: normalized, without a trailing
 * separator that is not part of the root, case-folded on Windows.
 */
export function toComparable(g: PathGrammar, path: string): string {
  const normalised = normalise(g, path);
  const [drive, rest] = splitDrive(g, normalised);
  const stripped =
    endsWithSeparator(g, rest) && trimTrailingSeparators(g, rest).length > 0
      ? drive + rest.substring(0, rest.length - 1)
      : normalised;
  return foldCase(g, stripped);
}

/**
 * @example
 * equalFilePath(posix, "a/./b/", "a/b")     // true
 * equalFilePath(windows, "C:\\Foo", "c:/foo") // true
 */
export function equalFilePath(g: PathGrammar, a: string, b: string): boolean {
  return toComparable(g, a) === toComparable(g, b);
}

/**
 * Expresses `target` relative to the directory `base`. When no relative
 * form exists (a relative input, or different roots) the normalized
 * target is returned.
 *
 * @example
 * shortPathWith(posix, "/fred/dave", "/fred/bill")          // "../bill"
 * shortPathWith(posix, "/file/test", "/file/test/fred/")    // "fred/"
 */
export function shortPathWith(g: PathGrammar, base: string, target: string): string {
  const normalisedTarget = normalise(g, target);
  if (isRelative(g, target) || isRelative(g, base)) return normalisedTarget;

  const [targetDrive, targetRest] = splitDrive(g, normalisedTarget);
  const [baseDrive, baseRest] = splitDrive(g, normalise(g, base));
  if (foldCase(g, targetDrive) !== foldCase(g, baseDrive)) return normalisedTarget;

  const targetSegments = splitSegments(g, targetRest);
  const targetNames = targetSegments.map((segment) => foldCase(g, segmentName(g, segment)));
  const baseNames = splitSegments(g, baseRest).map((segment) => foldCase(g, segmentName(g, segment)));

  let common = 0;
  while (
    common < targetNames.length &&
    common < baseNames.length &&
    targetNames[common] === baseNames[common]
  ) {
    common++;
  }

  const parents = new Array<string>(baseNames.length - common).fill("..");
  return joinPath(g, [...parents, ...targetSegments.slice(common)]);
}

/**
 * Resolves `target` against the directory `base` and normalizes the result.
 *
 * @example
 * fullPathWith(posix, "/file/test/", "../bob") // "/file/bob"
 */
export function fullPathWith(g: PathGrammar, base: string, target: string): string {
  return normalise(g, combine(g, base, target));
}
