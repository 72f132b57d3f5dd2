/**
 * Parametrized test suite for IFileSystem implementations
 *
 * This suite tests the IFileSystem contract and the PathSystem helpers
 * layered on it. All filesystem implementations must pass these tests.
 */

import { type FilePath, type IFileSystem, MemEnvironment, PathSystem } from "@lexpath/filepath";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collectEntryNames } from "../test-utils.js";

/**
 * Context provided by the filesystem factory
 */
export interface FileSystemTestContext {
  fs: IFileSystem;
  /** An existing, empty directory the tests may write under. */
  root: string;
  /** Grammar of the paths the filesystem accepts. */
  paths: FilePath;
  cleanup?: () => Promise<void>;
}

/**
 * Factory function to create an IFileSystem instance for testing
 */
export type FileSystemFactory = () => Promise<FileSystemTestContext>;

/**
 * Create the IFileSystem test suite with a specific factory
 *
 * @param name Name of the implementation (e.g., "MemFileSystem", "NodeFileSystem")
 * @param factory Factory function to create filesystem instances
 */
export function createFileSystemTests(name: string, factory: FileSystemFactory): void {
  describe(`IFileSystem [${name}]`, () => {
    let ctx: FileSystemTestContext;

    const at = (relative: string): string => ctx.paths.combine(ctx.root, relative);

    const pathSystem = (): PathSystem =>
      new PathSystem({
        fs: ctx.fs,
        env: new MemEnvironment({ cwd: ctx.root }),
        platform: ctx.paths.mode,
      });

    beforeEach(async () => {
      ctx = await factory();
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    // ========================================
    // 1. STATS
    // ========================================

    describe("stats()", () => {
      it("should return undefined for a missing path", async () => {
        expect(await ctx.fs.stats(at("missing"))).toBeUndefined();
      });

      it("should report the root as a directory", async () => {
        const info = await ctx.fs.stats(ctx.root);
        expect(info?.kind).toBe("directory");
      });

      it("should return undefined below a missing directory", async () => {
        expect(await ctx.fs.stats(at("missing/child"))).toBeUndefined();
      });
    });

    // ========================================
    // 2. MKDIR
    // ========================================

    describe("mkdir()", () => {
      it("should create a directory", async () => {
        await ctx.fs.mkdir(at("alpha"));

        const info = await ctx.fs.stats(at("alpha"));
        expect(info?.kind).toBe("directory");
        expect(info?.name).toBe("alpha");
      });

      it("should fail with already-exists for an existing directory", async () => {
        await ctx.fs.mkdir(at("alpha"));
        await expect(ctx.fs.mkdir(at("alpha"))).rejects.toMatchObject({
          kind: "already-exists",
        });
      });

      it("should fail with not-found when the parent is missing", async () => {
        await expect(ctx.fs.mkdir(at("missing/child"))).rejects.toMatchObject({
          kind: "not-found",
        });
      });
    });

    // ========================================
    // 3. LIST
    // ========================================

    describe("list()", () => {
      it("should yield the names of direct children", async () => {
        await ctx.fs.mkdir(at("beta"));
        await ctx.fs.mkdir(at("alpha"));
        await ctx.fs.mkdir(at("alpha/nested"));

        expect(await collectEntryNames(ctx.fs.list(ctx.root))).toEqual(["alpha", "beta"]);
        expect(await collectEntryNames(ctx.fs.list(at("alpha")))).toEqual(["nested"]);
      });

      it("should yield nothing real for an empty directory", async () => {
        await ctx.fs.mkdir(at("empty"));
        expect(await collectEntryNames(ctx.fs.list(at("empty")))).toEqual([]);
      });

      it("should fail with not-found for a missing directory", async () => {
        await expect(collectEntryNames(ctx.fs.list(at("missing")))).rejects.toMatchObject({
          kind: "not-found",
        });
      });
    });

    // ========================================
    // 4. PATHSYSTEM HELPERS
    // ========================================

    describe("PathSystem", () => {
      it("should create every missing level with ensureDirectory()", async () => {
        const system = pathSystem();
        await system.ensureDirectory(at("one/two/three"));

        expect(await system.directoryExists(at("one"))).toBe(true);
        expect(await system.directoryExists(at("one/two"))).toBe(true);
        expect(await system.directoryExists(at("one/two/three"))).toBe(true);
      });

      it("should accept an existing directory in ensureDirectory()", async () => {
        const system = pathSystem();
        await system.ensureDirectory(at("one/two"));
        await system.ensureDirectory(at("one/two/"));

        expect(await collectEntryNames(ctx.fs.list(at("one")))).toEqual(["two"]);
      });

      it("should list subdirectories with getDirectoryList()", async () => {
        const system = pathSystem();
        await system.ensureDirectory(at("one/left"));
        await system.ensureDirectory(at("one/right"));

        const list = await system.getDirectoryList(at("one"));
        expect(list.sort()).toEqual(["left", "right"]);
      });

      it("should report existence with pathExists()", async () => {
        const system = pathSystem();
        await ctx.fs.mkdir(at("present"));

        expect(await system.pathExists(at("present"))).toBe(true);
        expect(await system.pathExists(at("absent"))).toBe(false);
      });
    });
  });
}
