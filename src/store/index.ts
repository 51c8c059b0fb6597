export { type RunStore, byCreation } from "./run-store.js";
export { MemoryRunStore } from "./memory-store.js";
export { FileRunStore } from "./file-store.js";
export { RunStoreError } from "./errors.js";
export { serializeRun, deserializeRun, runFileName, assertRunId } from "./serialization.js";
