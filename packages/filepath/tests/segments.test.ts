/**
 * Tests for segment splitting and joining
 */

import { describe, expect, it } from "vitest";
import { posix, windows } from "../src/index.js";

describe("Segment utilities", () => {
  describe("splitPath()", () => {
    it("should keep separators on each segment", () => {
      expect(posix.splitPath("test//item/")).toEqual(["test//", "item/"]);
      expect(posix.splitPath("test/item/file")).toEqual(["test/", "item/", "file"]);
    });

    it("should put the root first", () => {
      expect(posix.splitPath("/file/test")).toEqual(["/", "file/", "test"]);
      expect(windows.splitPath("c:\\test\\path")).toEqual(["c:\\", "test\\", "path"]);
    });

    it("should return no segments for an empty path", () => {
      expect(posix.splitPath("")).toEqual([]);
    });
  });

  describe("splitDirectories()", () => {
    it("should strip separators from each name", () => {
      expect(posix.splitDirectories("test/file")).toEqual(["test", "file"]);
      expect(posix.splitDirectories("/test/file")).toEqual(["/", "test", "file"]);
    });

    it("should not produce an entry for a trailing separator", () => {
      expect(windows.splitDirectories("c:\\test\\path\\")).toEqual(["c:\\", "test", "path"]);
    });

    it("should return no names for an empty path", () => {
      expect(posix.splitDirectories("")).toEqual([]);
    });
  });

  describe("joinPath()", () => {
    it("should rebuild a split path", () => {
      expect(posix.joinPath(["/", "file/", "test"])).toBe("/file/test");
      expect(posix.joinPath(posix.splitPath("test//item/"))).toBe("test//item/");
    });

    it("should insert separators between names", () => {
      expect(posix.joinPath(["a", "b", "c"])).toBe("a/b/c");
      expect(windows.joinPath(["c:\\", "a", "b"])).toBe("c:\\a\\b");
    });

    it("should return an empty string for no segments", () => {
      expect(posix.joinPath([])).toBe("");
    });
  });

  describe("combine()", () => {
    it("should join relative paths", () => {
      expect(posix.combine("/", "test")).toBe("/test");
      expect(posix.combine("home", "bob")).toBe("home/bob");
      expect(posix.combine("home/", "bob")).toBe("home/bob");
      expect(windows.combine("home", "bob")).toBe("home\\bob");
    });

    it("should let an absolute right side win", () => {
      expect(posix.combine("home", "/abs")).toBe("/abs");
      expect(windows.combine("c:\\x", "d:\\y")).toBe("d:\\y");
    });

    it("should ignore an empty side", () => {
      expect(posix.combine("", "x")).toBe("x");
      expect(posix.combine("x", "")).toBe("x");
    });
  });

  describe("combineAlways()", () => {
    it("should append even an absolute right side", () => {
      expect(posix.combineAlways("home", "/abs")).toBe("home//abs");
    });
  });
});
