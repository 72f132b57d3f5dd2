/**
 * Test suites exports
 */

export {
  createFileSystemTests,
  type FileSystemFactory,
  type FileSystemTestContext,
} from "./file-system.suite.js";
