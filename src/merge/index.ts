/**
 * Section merge for CloudFormation-style templates.
 *
 * Public API exports for the merge module.
 */

export { SECTION_NAMES, isSectionName } from "./sections.js";
export type { SectionName } from "./sections.js";

export { mergeSection, mergeTemplates } from "./merge.js";

export { summarizeMerge, formatMergeSummary } from "./summary.js";
export type { MergeSummary, SectionSummary } from "./summary.js";
