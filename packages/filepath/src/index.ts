/**
 * lexpath filepath - Cross-platform file path manipulation
 */

// Bound API
export { createFilePath, FilePath, type FilePathOptions, posix, windows } from "./file-path.js";
// Grammar-first functions
export { equalFilePath, foldCase, fullPathWith, shortPathWith, toComparable } from "./compare.js";
export {
  dropDrive,
  getDrive,
  hasDrive,
  isAbsolute,
  isRelative,
  joinDrive,
  setDrive,
  splitDrive,
} from "./drive.js";
export {
  addExtension,
  dropExtension,
  dropExtensions,
  getExtension,
  getExtensions,
  hasExtension,
  joinExtension,
  setExtension,
  splitExtension,
  splitExtensions,
} from "./extension.js";
export {
  addFileName,
  dropFileName,
  getBaseName,
  getDirectory,
  getFileName,
  isDirectoryLike,
  joinFileName,
  setBaseName,
  setDirectory,
  setFileName,
  splitFileName,
} from "./filename.js";
export {
  grammarFor,
  isExtSeparator,
  isPathSeparator,
  isSearchPathSeparator,
} from "./grammar.js";
export { normalise } from "./normalise.js";
export { detectPlatform, hostOsName, resolvePlatform } from "./platform.js";
export { splitSearchPath } from "./search-path.js";
export {
  combine,
  combineAlways,
  joinPath,
  splitDirectories,
  splitPath,
} from "./segments.js";
export { isValid, makeValid } from "./validity.js";
// Capabilities
export { MemEnvironment, type MemEnvironmentOptions } from "./impl/mem-environment.js";
export { MemFileSystem, type MemFileSystemOptions } from "./impl/mem-file-system.js";
export { NodeEnvironment, type NodeProcess } from "./impl/node-environment.js";
export { NodeFileSystem, toFileSystemError } from "./impl/node-file-system.js";
export { PathSystem, type PathSystemConfig, type PathSystemOptions } from "./path-system.js";
// Errors and logging
export {
  AlreadyExistsError,
  FileSystemError,
  isFileSystemError,
  NotFoundError,
  PermissionDeniedError,
  toError,
} from "./errors.js";
export { type ILogger, NoOpLogger } from "./logger.js";
// Types
export type {
  FileInfo,
  FileKind,
  FileSystemErrorKind,
  IEnvironment,
  IFileSystem,
  PathGrammar,
  PlatformMode,
  PlatformOverride,
} from "./types.js";
export { collectGenerator } from "./utils/collect-stream.js";
