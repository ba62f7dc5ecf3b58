/**
 * Top-level template sections that are merged across templates.
 *
 * Listed in the order they are processed for each fragment. Every other
 * top-level key is taken from the base template only.
 */
export const SECTION_NAMES = ["Parameters", "Conditions", "Resources", "Outputs"] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export function isSectionName(key: string): key is SectionName {
  return SECTION_NAMES.some((name) => name === key);
}
