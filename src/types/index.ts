/**
 * Shared type foundations for the report pipeline.
 */

export * from "./pipeline.js";
export * from "./errors.js";
