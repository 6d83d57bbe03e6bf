/**
 * Pipeline modules export
 */

export { clean } from "./clean";
export { validate } from "./validate";
export { schedule, createBuildMatrix } from "./schedule";
export { execute } from "./execute";
export { stats, summaryLine, formatDuration } from "./stats";
export { createDistributions } from "./package";
