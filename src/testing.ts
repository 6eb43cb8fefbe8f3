/**
 * Public test utilities: exported from the `"logroll/testing"` entry point.
 * Consumers can import these helpers to exercise a LogEngine without touching the disk.
 */
export { MemoryFileSystem } from "./adapters/memory-file-system.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
