import type { LoadedTemplate } from "../parser/files.js";
import { isTemplateMapping, type TemplateMapping } from "../parser/tagged.js";
import { SECTION_NAMES, type SectionName } from "./sections.js";

/**
 * Item counts for one section of a merged template
 */
export interface SectionSummary {
  section: SectionName;
  /** Items the base template already had */
  fromBase: number;
  /** Items contributed by fragments */
  fromFragments: number;
  total: number;
}

export interface MergeSummary {
  fragments: number;
  sections: SectionSummary[];
}

function sectionSize(root: TemplateMapping, section: SectionName): number {
  const items = root.get(section);
  return isTemplateMapping(items) ? items.size : 0;
}

/**
 * Describe what a merge added, section by section.
 * Sections absent from both base and result are left out.
 */
export function summarizeMerge(
  base: LoadedTemplate,
  merged: TemplateMapping,
  fragmentCount: number,
): MergeSummary {
  const sections: SectionSummary[] = [];

  for (const section of SECTION_NAMES) {
    if (!merged.has(section)) continue;
    const fromBase = sectionSize(base.root, section);
    const total = sectionSize(merged, section);
    sections.push({ section, fromBase, fromFragments: total - fromBase, total });
  }

  return { fragments: fragmentCount, sections };
}

/**
 * One line per section, e.g. "Resources: 3 (+2 from fragments)"
 */
export function formatMergeSummary(summary: MergeSummary): string[] {
  return summary.sections.map(
    (s) => `${s.section}: ${s.total} (+${s.fromFragments} from fragments)`,
  );
}
