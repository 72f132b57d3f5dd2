/**
 * Search-path variables such as `PATH`.
 */

import { isSearchPathSeparator } from "./grammar.js";
import type { PathGrammar } from "./types.js";

/**
 * Splits a search-path value on the platform's list separator, dropping
 * empty entries.
 *
 * @example
 * splitSearchPath(posix, "File1:File2:File3")   // ["File1", "File2", "File3"]
 * splitSearchPath(windows, "File1;File2;File3") // ["File1", "File2", "File3"]
 */
export function splitSearchPath(g: PathGrammar, value: string): string[] {
  const entries: string[] = [];
  let current = "";
  for (const char of value) {
    if (isSearchPathSeparator(g, char)) {
      if (current.length > 0) entries.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  if (current.length > 0) entries.push(current);
  return entries;
}
