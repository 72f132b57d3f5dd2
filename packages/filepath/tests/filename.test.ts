/**
 * Tests for file name and directory operations
 */

import { describe, expect, it } from "vitest";
import { posix, windows } from "../src/index.js";

describe("File name utilities", () => {
  describe("splitFileName()", () => {
    it("should split after the last separator", () => {
      expect(posix.splitFileName("file/bob.txt")).toEqual(["file/", "bob.txt"]);
      expect(windows.splitFileName("c:\\dir\\a.txt")).toEqual(["c:\\dir\\", "a.txt"]);
    });

    it("should return an empty name for directory-like paths", () => {
      expect(posix.splitFileName("file/")).toEqual(["file/", ""]);
      expect(posix.splitFileName("/")).toEqual(["/", ""]);
    });

    it("should return an empty directory for a bare name", () => {
      expect(posix.splitFileName("bob")).toEqual(["", "bob"]);
    });

    it("should keep a bare drive as the directory", () => {
      expect(windows.splitFileName("c:")).toEqual(["c:", ""]);
      expect(windows.splitFileName("c:file")).toEqual(["", "c:file"]);
    });
  });

  describe("joinFileName() / addFileName()", () => {
    it("should insert a separator when needed", () => {
      expect(posix.addFileName("dir", "x")).toBe("dir/x");
      expect(posix.addFileName("dir/", "x")).toBe("dir/x");
      expect(posix.addFileName("", "x")).toBe("x");
      expect(windows.joinFileName("c:", "x")).toBe("c:\\x");
    });

    it("should leave the directory alone for an empty name", () => {
      expect(windows.joinFileName("c:", "")).toBe("c:");
      expect(windows.joinFileName("\\\\server\\share", "")).toBe("\\\\server\\share");
    });
  });

  describe("getFileName() / dropFileName() / setFileName()", () => {
    it("should get and drop the file name", () => {
      expect(posix.getFileName("test/")).toBe("");
      expect(posix.getFileName("a/b/c")).toBe("c");
      expect(posix.dropFileName("a/b/c")).toBe("a/b/");
    });

    it("should replace the file name", () => {
      expect(posix.setFileName("a/b.txt", "c")).toBe("a/c");
      expect(windows.setFileName("c:\\x\\y.txt", "z.md")).toBe("c:\\x\\z.md");
    });
  });

  describe("getBaseName() / setBaseName()", () => {
    it("should drop the directory and last extension", () => {
      expect(posix.getBaseName("file/test.txt")).toBe("test");
      expect(posix.getBaseName("dave.ext")).toBe("dave");
      expect(posix.getBaseName("archive.tar.gz")).toBe("archive.tar");
    });

    it("should keep directory and extension", () => {
      expect(posix.setBaseName("file/test.txt", "bob")).toBe("file/bob.txt");
      expect(posix.setBaseName("fred", "bill")).toBe("bill");
    });
  });

  describe("getDirectory()", () => {
    it("should move up one level", () => {
      expect(posix.getDirectory("/foo/bar/baz")).toBe("/foo/bar");
      expect(posix.getDirectory("/foo/bar/baz/")).toBe("/foo/bar/baz");
    });

    it("should keep a bare root", () => {
      expect(posix.getDirectory("/")).toBe("/");
      expect(posix.getDirectory("/bob")).toBe("/");
      expect(posix.getDirectory("//")).toBe("/");
    });

    it("should return an empty string for a bare name", () => {
      expect(posix.getDirectory("bob")).toBe("");
    });

    it("should collapse trailing separator runs", () => {
      expect(posix.getDirectory("a//b")).toBe("a");
    });

    it("should return the drive on windows", () => {
      expect(windows.getDirectory("c:\\foo")).toBe("c:");
      expect(windows.getDirectory("c:\\")).toBe("c:");
    });
  });

  describe("setDirectory()", () => {
    it("should move the file name under another directory", () => {
      expect(posix.setDirectory("a/b.txt", "c")).toBe("c/b.txt");
      expect(posix.setDirectory("a/b.txt", "/srv/")).toBe("/srv/b.txt");
    });
  });

  describe("isDirectoryLike()", () => {
    it("should look only at the last character", () => {
      expect(posix.isDirectoryLike("test")).toBe(false);
      expect(posix.isDirectoryLike("test/")).toBe(true);
      expect(posix.isDirectoryLike("")).toBe(false);
    });

    it("should use the grammar's separators", () => {
      expect(windows.isDirectoryLike("test/")).toBe(true);
      expect(windows.isDirectoryLike("test\\")).toBe(true);
      expect(posix.isDirectoryLike("test\\")).toBe(false);
    });
  });
});
