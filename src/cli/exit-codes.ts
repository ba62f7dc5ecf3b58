/**
 * Semantic exit codes for the cfn-merge CLI
 *
 * @see Use these constants instead of magic numbers throughout the CLI
 */
export const EXIT_CODES = {
  /** Merge completed and the output was written */
  SUCCESS: 0,

  /** General error (catch-all for unexpected errors, write failures) */
  ERROR: 1,

  /** Usage error (invalid arguments, flags, or config file) */
  USAGE_ERROR: 2,

  /** An input template does not exist */
  NOT_FOUND: 3,

  /** A template is not a mapping, or a section is not a mapping */
  VALIDATION_FAILED: 4,

  /** Two templates define the same item in the same section */
  CONFLICT: 5,
} as const;

/**
 * Type for exit codes
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code metadata for documentation (printed by --help)
 */
export const EXIT_CODE_METADATA = [
  {
    code: EXIT_CODES.SUCCESS,
    name: 'SUCCESS',
    description: 'Merge completed and the output was written',
  },
  {
    code: EXIT_CODES.ERROR,
    name: 'ERROR',
    description: 'General error (unexpected error, file system error, etc.)',
  },
  {
    code: EXIT_CODES.USAGE_ERROR,
    name: 'USAGE_ERROR',
    description: 'Usage error (invalid arguments, flags, or config file)',
  },
  {
    code: EXIT_CODES.NOT_FOUND,
    name: 'NOT_FOUND',
    description: 'An input template does not exist',
  },
  {
    code: EXIT_CODES.VALIDATION_FAILED,
    name: 'VALIDATION_FAILED',
    description: 'A template or one of its sections is not a mapping',
  },
  {
    code: EXIT_CODES.CONFLICT,
    name: 'CONFLICT',
    description: 'The same item is defined in the same section by two templates',
  },
] as const;

/**
 * Exit code table for the end of --help output
 */
export function formatExitCodeHelp(): string {
  const lines = ['Exit codes:'];
  for (const meta of EXIT_CODE_METADATA) {
    lines.push(`  ${meta.code}  ${meta.name.padEnd(17)} ${meta.description}`);
  }
  return lines.join('\n');
}
