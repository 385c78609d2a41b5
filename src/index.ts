// Quarterly Metrics - public API for programmatic usage

export * from "./types/index.js";
export * from "./infra/index.js";
export * from "./core/quarters/index.js";
export * from "./core/metrics/index.js";
export * from "./core/project/index.js";
export * from "./core/fetch/index.js";
