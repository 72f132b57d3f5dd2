/**
 * File extension handling. Only the file name is scanned for the
 * extension separator, never the directory prefix.
 */

import { splitFileName } from "./filename.js";
import type { PathGrammar } from "./types.js";

function splitAt(g: PathGrammar, path: string, pick: (name: string) => number): [string, string] {
  const [directory, name] = splitFileName(g, path);
  const index = pick(name);
  if (index === -1) return [path, ""];
  return [directory + name.substring(0, index), name.substring(index)];
}

/**
 * Splits on the last extension separator of the file name.
 *
 * @example
 * splitExtension(g, "file/path.txt.bob.fred") // ["file/path.txt.bob", ".fred"]
 * splitExtension(g, "file.txt/boris")         // ["file.txt/boris", ""]
 */
export function splitExtension(g: PathGrammar, path: string): [string, string] {
  return splitAt(g, path, (name) => name.lastIndexOf(g.extSeparator));
}

/**
 * Splits on the first extension separator of the file name, so chained
 * extensions stay together: `"file.tar.gz"` gives `["file", ".tar.gz"]`.
 */
export function splitExtensions(g: PathGrammar, path: string): [string, string] {
  return splitAt(g, path, (name) => name.indexOf(g.extSeparator));
}

/**
 * Adds an extension even if one is present already.
 *
 * @example
 * addExtension(g, "file.txt", "bib") // "file.txt.bib"
 * addExtension(g, "file", ".bib")    // "file.bib"
 */
export function addExtension(g: PathGrammar, path: string, ext: string): string {
  if (ext.length === 0) return path;
  if (ext.startsWith(g.extSeparator)) return path + ext;
  return path + g.extSeparator + ext;
}

export function joinExtension(g: PathGrammar, base: string, ext: string): string {
  return addExtension(g, base, ext);
}

export function getExtension(g: PathGrammar, path: string): string {
  return splitExtension(g, path)[1];
}

export function dropExtension(g: PathGrammar, path: string): string {
  return splitExtension(g, path)[0];
}

export function setExtension(g: PathGrammar, path: string, ext: string): string {
  return addExtension(g, dropExtension(g, path), ext);
}

export function hasExtension(g: PathGrammar, path: string): boolean {
  return splitFileName(g, path)[1].includes(g.extSeparator);
}

export function getExtensions(g: PathGrammar, path: string): string {
  return splitExtensions(g, path)[1];
}

export function dropExtensions(g: PathGrammar, path: string): string {
  return splitExtensions(g, path)[0];
}
