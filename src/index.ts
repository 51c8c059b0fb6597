/**
 * report-pipeline: durable Planning → Research → Report pipeline that
 * turns a topic into a sectioned research report.
 *
 *   const { service } = createPipeline(loadAppConfig());
 *   const { runId } = await service.submit({ topic: "Urban heat islands" });
 *   const status = await service.waitFor(runId);
 */

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./graph/index.js";
export * from "./gateway/index.js";
export * from "./dispatch/index.js";
export * from "./run/index.js";
export * from "./store/index.js";
export * from "./prompts/index.js";
export * from "./stages/index.js";
export * from "./coordinator/index.js";
export * from "./collaborators/index.js";
export * from "./service/index.js";
