/**
 * Tests for lexical normalization
 */

import { describe, expect, it } from "vitest";
import { posix, windows } from "../src/index.js";

describe("normalise()", () => {
  describe("posix", () => {
    it("should collapse separator runs and keep one trailing separator", () => {
      expect(posix.normalise("/file/\\test////")).toBe("/file/\\test/");
      expect(posix.normalise("a//b")).toBe("a/b");
    });

    it("should remove '.' segments", () => {
      expect(posix.normalise("/file/./test")).toBe("/file/test");
      expect(posix.normalise("./bob/fred/")).toBe("bob/fred/");
    });

    it("should resolve '..' against the name before it", () => {
      expect(posix.normalise("/test/file/../bob/fred/")).toBe("/test/bob/fred/");
      expect(posix.normalise("../../a/../b")).toBe("../../b");
    });

    it("should keep leading '..' segments", () => {
      expect(posix.normalise("../bob/fred/")).toBe("../bob/fred/");
      expect(posix.normalise("a/b/../../..")).toBe("..");
      expect(posix.normalise("/..")).toBe("/..");
    });

    it("should return an empty path when every name cancels out", () => {
      expect(posix.normalise("a/..")).toBe("");
      expect(posix.normalise("./.")).toBe("");
      expect(posix.normalise(".")).toBe("");
    });

    it("should keep './' when every name cancels out before a trailing separator", () => {
      expect(posix.normalise("a/../")).toBe("./");
      expect(posix.normalise("./")).toBe("./");
    });

    it("should keep the root", () => {
      expect(posix.normalise("/")).toBe("/");
      expect(posix.normalise("//")).toBe("/");
    });

    it("should leave the empty path empty", () => {
      expect(posix.normalise("")).toBe("");
    });
  });

  describe("windows", () => {
    it("should use backslashes throughout", () => {
      expect(windows.normalise("c:\\file/bob\\")).toBe("c:\\file\\bob\\");
      expect(windows.normalise("c:/")).toBe("c:\\");
      expect(windows.normalise("/a//b/")).toBe("\\a\\b\\");
    });

    it("should keep UNC roots", () => {
      expect(windows.normalise("\\\\server\\test")).toBe("\\\\server\\test");
      expect(windows.normalise("//server/share/a/../b")).toBe("\\\\server\\share\\b");
    });

    it("should collapse a separator run after the drive", () => {
      expect(windows.normalise("c:\\\\a")).toBe("c:\\a");
    });

    it("should keep '.\\' for a relative path that cancels out", () => {
      expect(windows.normalise("a\\..\\")).toBe(".\\");
      expect(windows.normalise("a/..")).toBe("");
    });

    it("should keep a bare drive", () => {
      expect(windows.normalise("C:")).toBe("C:");
    });
  });

  describe("idempotence", () => {
    const samples = [
      "",
      "/",
      "//",
      "a/../",
      "./a/./b/",
      "/x/y/../../..",
      "a\\b/c",
      "c:",
      "c:/",
      "C:/Users//Me/./file.txt",
      "\\\\server\\share\\dir\\..\\f.x",
      "//double//slash",
    ];

    it.each(samples)("should be stable for %j", (path) => {
      for (const paths of [posix, windows]) {
        const once = paths.normalise(path);
        expect(paths.normalise(once)).toBe(once);
      }
    });
  });
});
