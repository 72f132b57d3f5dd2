/**
 * Platform mode resolution.
 *
 * The mode is resolved once (from the OS identity or an explicit override)
 * and then carried by a `FilePath` instance; nothing re-detects it per call.
 */

import type { PlatformMode, PlatformOverride } from "./types.js";

const WINDOWS_OS_NAMES = new Set(["win32", "windows", "mingw32", "cygwin"]);

/**
 * Returns the identity of the host OS as reported by the runtime.
 */
export function hostOsName(): string {
  return typeof process === "undefined" ? "" : process.platform;
}

/**
 * Maps an OS identity to a path grammar. Unknown systems use Posix.
 */
export function detectPlatform(osName: string = hostOsName()): PlatformMode {
  const name = osName.toLowerCase();
  if (WINDOWS_OS_NAMES.has(name) || name.startsWith("win")) {
    return "windows";
  }
  return "posix";
}

/**
 * Applies the override slot: `"posix"` and `"windows"` force a grammar,
 * `"detected"` falls back to the OS identity.
 */
export function resolvePlatform(
  override: PlatformOverride = "detected",
  osName?: string,
): PlatformMode {
  if (override === "detected") {
    return detectPlatform(osName);
  }
  return override;
}
