/**
 * Section merge for CloudFormation-style templates.
 *
 * A merged template is the base template with each of its sections extended
 * by the items of every fragment's matching section. Items are never merged
 * into each other: an item name defined by two templates is a conflict.
 */

import { DuplicateKeyError, SectionTypeError } from "../errors.js";
import type { LoadedTemplate } from "../parser/files.js";
import { isTemplateMapping, type TemplateMapping, type TemplateValue } from "../parser/tagged.js";
import { SECTION_NAMES, type SectionName } from "./sections.js";

/**
 * Copy the items of `src[sectionName]` into `dest[sectionName]`.
 *
 * Items keep the order `src` declares them in and are inserted unchanged
 * (tagged values included). `dest` is modified in place; `src` is only read.
 *
 * @param sourceLabel Path of the template `src` came from, for error messages
 * @throws SectionTypeError if the section in `src` is not a mapping
 * @throws DuplicateKeyError if an item name is already present in `dest`
 */
export function mergeSection(
  dest: TemplateMapping,
  src: TemplateMapping,
  sectionName: SectionName,
  sourceLabel: string,
): void {
  if (!src.has(sectionName)) {
    return;
  }

  const items = src.get(sectionName);
  if (!isTemplateMapping(items)) {
    throw new SectionTypeError(sourceLabel, sectionName);
  }

  let target = dest.get(sectionName);
  if (target === undefined) {
    target = new Map<string, TemplateValue>();
    dest.set(sectionName, target);
  } else if (!isTemplateMapping(target)) {
    throw new SectionTypeError("merged template", sectionName);
  }

  for (const [itemName, itemValue] of items) {
    if (target.has(itemName)) {
      throw new DuplicateKeyError(sectionName, itemName, sourceLabel);
    }
    target.set(itemName, itemValue);
  }
}

/**
 * Merge fragments into a base template.
 *
 * The result starts as a copy of every top-level key of the base. Fragments
 * are applied in the order given, each one section at a time in
 * SECTION_NAMES order. Top-level keys of a fragment that are not sections are
 * ignored.
 *
 * Neither the base nor the fragments are modified; the first error aborts
 * the merge and nothing is returned.
 */
export function mergeTemplates(
  base: LoadedTemplate,
  fragments: readonly LoadedTemplate[],
): TemplateMapping {
  const merged: TemplateMapping = new Map(base.root);

  // Base sections are copied so extending them leaves the base untouched
  for (const section of SECTION_NAMES) {
    if (!base.root.has(section)) continue;
    const items = base.root.get(section);
    if (!isTemplateMapping(items)) {
      throw new SectionTypeError(base.path, section);
    }
    merged.set(section, new Map(items));
  }

  for (const fragment of fragments) {
    for (const section of SECTION_NAMES) {
      mergeSection(merged, fragment.root, section, fragment.path);
    }
  }

  return merged;
}
