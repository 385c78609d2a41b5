export { createIntervalsCommand } from "./intervals.js";
export { createFetchCommand } from "./fetch.js";
export { createLastYearCommand } from "./last-year.js";
export { createPreviewCommand } from "./preview.js";
export { createConfigCommand } from "./config.js";
