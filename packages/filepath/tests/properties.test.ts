/**
 * Laws that hold for every path, checked over a fixed set of samples in
 * both grammars, plus end-to-end usage scenarios.
 */

import { describe, expect, it } from "vitest";
import { type FilePath, posix, windows } from "../src/index.js";

const SAMPLES = [
  "",
  "/",
  "file",
  "file.txt",
  "dir/file.tar.gz",
  "/a/b/c/",
  "a//b///c",
  "./a/../b/",
  "../x",
  ".hidden",
  "dir.d/file",
  "c:",
  "c:\\",
  "c:file.txt",
  "C:/Users/Me/file.txt",
  "\\\\server\\share\\dir\\f.x",
  "\\\\server",
  "a\\b/c",
  "/x/y/../../..",
  "test*?:<>|",
  "c:\\a:b",
  "...",
  "a.b/",
  "//double//slash",
];

const GRAMMARS: Array<[string, FilePath]> = [
  ["posix", posix],
  ["windows", windows],
];

describe.each(GRAMMARS)("Path laws [%s]", (_name, paths) => {
  it("should rebuild a path from splitExtension", () => {
    for (const path of SAMPLES) {
      const [base, ext] = paths.splitExtension(path);
      expect(paths.joinExtension(base, ext)).toBe(path);
    }
  });

  it("should rebuild a path from splitFileName", () => {
    for (const path of SAMPLES) {
      const [directory, name] = paths.splitFileName(path);
      expect(paths.joinFileName(directory, name)).toBe(path);
    }
  });

  it("should rebuild a path from splitDrive", () => {
    for (const path of SAMPLES) {
      const [drive, rest] = paths.splitDrive(path);
      expect(paths.joinDrive(drive, rest)).toBe(path);
    }
  });

  it("should rebuild a path from splitPath", () => {
    for (const path of SAMPLES) {
      expect(paths.splitPath(path).join("")).toBe(path);
      expect(paths.equalFilePath(paths.joinPath(paths.splitPath(path)), path)).toBe(true);
    }
  });

  it("should normalise idempotently", () => {
    for (const path of SAMPLES) {
      const once = paths.normalise(path);
      expect(paths.normalise(once)).toBe(once);
    }
  });

  it("should leave no extension after dropExtensions", () => {
    for (const path of SAMPLES) {
      expect(paths.hasExtension(paths.dropExtensions(path))).toBe(false);
    }
  });

  it("should always make a path valid", () => {
    for (const path of SAMPLES) {
      expect(paths.isValid(paths.makeValid(path))).toBe(true);
      if (paths.isValid(path)) {
        expect(paths.makeValid(path)).toBe(path);
      }
    }
  });

  it("should classify every path as exactly one of relative and absolute", () => {
    for (const path of SAMPLES) {
      expect(paths.isAbsolute(path)).toBe(!paths.isRelative(path));
    }
  });
});

describe("Usage scenarios", () => {
  it("should swap an extension", () => {
    const path = "/directory/file.ext";
    expect(posix.getExtension(path)).toBe(".ext");
    expect(posix.setExtension(path, "txt")).toBe("/directory/file.txt");
  });

  it("should take a path apart", () => {
    const path = "/home/user/report.final.pdf";
    expect(posix.getFileName(path)).toBe("report.final.pdf");
    expect(posix.getBaseName(path)).toBe("report.final");
    expect(posix.getDirectory(path)).toBe("/home/user");
    expect(posix.splitDirectories(path)).toEqual(["/", "home", "user", "report.final.pdf"]);
  });

  it("should build a path from parts", () => {
    expect(posix.joinPath(["usr", "local", "bin"])).toBe("usr/local/bin");
    expect(posix.combine(posix.combine("/srv", "app"), "config.json")).toBe("/srv/app/config.json");
  });

  it("should relativize a path", () => {
    expect(posix.shortPathWith("/home/user", "/home/user/docs/a.txt")).toBe("docs/a.txt");
  });

  it("should read a search path", () => {
    expect(posix.splitSearchPath("/usr/bin:/bin")).toEqual(["/usr/bin", "/bin"]);
  });

  it("should compare after normalization", () => {
    const a = posix.normalise("/srv/./app/../app/");
    expect(a).toBe("/srv/app/");
    expect(posix.equalFilePath(a, "/srv/app")).toBe(true);
  });
});
