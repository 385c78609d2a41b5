export * from "./quarter-key.js";
export * from "./intervals.js";
export * from "./quarters-store.js";
