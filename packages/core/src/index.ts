export * from "./graph.js";
export * from "./results.js";
export * from "./jobs.js";
export * from "./errors.js";
export * from "./logger.js";
