/**
 * Test helpers for drive index packages
 */

export { createTempDir, removeDir, withTempDir, writeTree } from "./fs.js";
export type { TreeFile } from "./fs.js";
export { makeEntry, makeDir, createFakeWalker, drivesOf } from "./fixtures.js";
export type { FakeWalker } from "./fixtures.js";
export { collect } from "./async.js";
