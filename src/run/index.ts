export * from "./schema.js";
export * from "./model.js";
