export * from "./config.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./metrics.js";
export * from "./severity.js";
export * from "./thresholds.js";
export * from "./types.js";
