/**
 * Centralized error messages
 *
 * Grouped by the stage that raises them so the CLI, the library and the
 * tests all agree on wording.
 */

/**
 * Template loading errors (YAML syntax, root shape, keys, aliases)
 */
export const loadErrors = {
  notMapping: (path: string) => `${path} must contain a YAML mapping`,
  parseFailed: (path: string, err: string) => `Failed to parse ${path}: ${err}`,
  complexKey: (path: string) => `${path} uses a mapping key that is not a plain scalar`,
  unresolvedAlias: (path: string, alias: string) => `${path} references unknown alias *${alias}`,
  circularAlias: (path: string, alias: string) => `${path} contains a circular alias *${alias}`,
  tooManyAliases: (path: string, limit: number) =>
    `${path} expands more than ${limit} aliases`,
  duplicateKey: (path: string, key: string) => `${path} defines key ${key} more than once`,
} as const;

/**
 * Section merge errors
 */
export const mergeErrors = {
  sectionNotMapping: (path: string, section: string) =>
    `${path} section ${section} must be a mapping`,
  duplicateKey: (section: string, key: string, path: string) =>
    `Duplicate ${section} key ${key} in ${path}`,
} as const;

/**
 * Configuration and argument errors
 */
export const configErrors = {
  invalidConfig: (path: string, issues: string) => `Invalid config ${path}: ${issues}`,
  missingBase: 'No base template given. Use --base or set "base" in the config file.',
  missingFragments: 'No fragments given. Use --fragments or set "fragments" in the config file.',
  missingOut: 'No output path given. Use --out or set "out" in the config file.',
} as const;

/**
 * File system errors
 */
export const fileErrors = {
  notFound: (path: string) => `File not found: ${path}`,
  writeFailed: (path: string) => `Failed to write ${path}`,
} as const;

export const errors = {
  load: loadErrors,
  merge: mergeErrors,
  config: configErrors,
  file: fileErrors,
} as const;
