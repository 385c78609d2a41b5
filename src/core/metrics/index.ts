export { QuarterMetrics } from "./quarter-metrics.js";
export * from "./community.js";
export * from "./agility.js";
