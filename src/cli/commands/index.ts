export { registerMergeCommand, runMerge, exitCodeFor } from "./merge.js";
export type { MergeCommandOptions } from "./merge.js";
