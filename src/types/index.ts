export * from "./config.js";
export * from "./metrics.js";
