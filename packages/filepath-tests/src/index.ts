/**
 * @lexpath/filepath-tests
 *
 * Parametrized test suites for IFileSystem implementations.
 * Use these suites to test any filesystem backend against the interface contract.
 */

// Test suites
export * from "./suites/index.js";
// Test utilities
export * from "./test-utils.js";
