export * from "./bundle.js";
export * from "./classifier.js";
export * from "./cli.js";
export * from "./html.js";
export * from "./pipeline.js";
export * from "./render-html.js";
export * from "./render-json.js";
export * from "./report.js";
export * from "./timestamps.js";
export * from "./writer.js";
