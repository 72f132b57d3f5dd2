/**
 * Separators and character classifiers of the two path grammars.
 */

import type { PathGrammar, PlatformMode } from "./types.js";

const POSIX: PathGrammar = {
  mode: "posix",
  pathSeparator: "/",
  pathSeparators: ["/"],
  searchPathSeparator: ":",
  extSeparator: ".",
};

const WINDOWS: PathGrammar = {
  mode: "windows",
  pathSeparator: "\\",
  pathSeparators: ["\\", "/"],
  searchPathSeparator: ";",
  extSeparator: ".",
};

export function grammarFor(mode: PlatformMode): PathGrammar {
  return mode === "windows" ? WINDOWS : POSIX;
}

/**
 * True if `char` is one of the separators the grammar accepts.
 * Windows accepts both `\` and `/`.
 */
export function isPathSeparator(g: PathGrammar, char: string): boolean {
  return g.pathSeparators.includes(char);
}

export function isSearchPathSeparator(g: PathGrammar, char: string): boolean {
  return char === g.searchPathSeparator;
}

export function isExtSeparator(g: PathGrammar, char: string): boolean {
  return char === g.extSeparator;
}

/**
 * True if the last character of `path` is a path separator.
 */
export function endsWithSeparator(g: PathGrammar, path: string): boolean {
  return path.length > 0 && isPathSeparator(g, path[path.length - 1]);
}

/**
 * Index of the last path separator in `path`, or -1.
 */
export function lastSeparatorIndex(g: PathGrammar, path: string): number {
  for (let i = path.length - 1; i >= 0; i--) {
    if (isPathSeparator(g, path[i])) return i;
  }
  return -1;
}

/**
 * Removes every trailing separator.
 */
export function trimTrailingSeparators(g: PathGrammar, path: string): string {
  let end = path.length;
  while (end > 0 && isPathSeparator(g, path[end - 1])) end--;
  return path.substring(0, end);
}
