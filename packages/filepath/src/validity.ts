/**
 * Characters a Windows file name cannot contain. Posix accepts every path.
 */

import { joinDrive, splitDrive } from "./drive.js";
import type { PathGrammar } from "./types.js";

const RESERVED_CHARACTERS = new Set([":", "*", "?", ">", "<", "|"]);
const REPLACEMENT = "_";

/**
 * @example
 * isValid(windows, "c:\\test")         // true
 * isValid(windows, "c:\\test:of_test") // false
 */
export function isValid(g: PathGrammar, path: string): boolean {
  if (g.mode === "posix") return true;
  const [, rest] = splitDrive(g, path);
  for (const char of rest) {
    if (RESERVED_CHARACTERS.has(char)) return false;
  }
  return true;
}

/**
 * Replaces every reserved character outside the drive with `_`.
 * Leaves valid paths unchanged.
 */
export function makeValid(g: PathGrammar, path: string): string {
  if (g.mode === "posix") return path;
  const [drive, rest] = splitDrive(g, path);
  let repaired = "";
  for (const char of rest) {
    repaired += RESERVED_CHARACTERS.has(char) ? REPLACEMENT : char;
  }
  return joinDrive(g, drive, repaired);
}
