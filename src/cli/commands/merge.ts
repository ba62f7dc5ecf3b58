/**
 * The merge command: base template + fragments -> merged template.
 *
 * Inputs are loaded one at a time in the order given, merged, and the
 * result is written only after the whole merge has succeeded.
 */

import chalk from "chalk";
import type { Command } from "commander";
import {
  ConfigError,
  DuplicateKeyError,
  FileNotFoundError,
  TemplateError,
} from "../../errors.js";
import {
  formatMergeSummary,
  mergeTemplates,
  summarizeMerge,
} from "../../merge/index.js";
import {
  TemplateLoader,
  TemplateSerializer,
  isMissingFile,
  readTemplateFile,
  resolveMergePlan,
  writeTemplateFile,
  type LoadedTemplate,
} from "../../parser/index.js";
import { errors } from "../../strings/index.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { debug, error, output, success } from "../output.js";

export interface MergeCommandOptions {
  base?: string;
  fragments?: string[];
  out?: string;
  config?: string;
}

async function loadInput(filePath: string, loader: TemplateLoader): Promise<LoadedTemplate> {
  debug(`Loading ${filePath}`);
  try {
    return await readTemplateFile(filePath, loader);
  } catch (err) {
    if (isMissingFile(err)) {
      throw new FileNotFoundError(filePath);
    }
    throw err;
  }
}

/**
 * Map a failure to its exit code.
 */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof DuplicateKeyError) return EXIT_CODES.CONFLICT;
  if (err instanceof TemplateError) return EXIT_CODES.VALIDATION_FAILED;
  if (err instanceof ConfigError) return EXIT_CODES.USAGE_ERROR;
  if (err instanceof FileNotFoundError) return EXIT_CODES.NOT_FOUND;
  return EXIT_CODES.ERROR;
}

/**
 * Run one merge and report the outcome.
 *
 * Never throws: every failure is reported through the output helpers and
 * turned into an exit code.
 */
export async function runMerge(options: MergeCommandOptions): Promise<ExitCode> {
  try {
    const plan = await resolveMergePlan(
      { base: options.base, fragments: options.fragments, out: options.out },
      options.config,
    );

    const loader = new TemplateLoader({ onWarning: debug });
    const base = await loadInput(plan.base, loader);
    const fragments: LoadedTemplate[] = [];
    for (const fragmentPath of plan.fragments) {
      fragments.push(await loadInput(fragmentPath, loader));
    }

    const merged = mergeTemplates(base, fragments);

    try {
      await writeTemplateFile(plan.out, merged, new TemplateSerializer(plan.format));
    } catch (err) {
      error(errors.file.writeFailed(plan.out), err);
      return EXIT_CODES.ERROR;
    }

    const summary = summarizeMerge(base, merged, fragments.length);
    output({ success: true, out: plan.out, ...summary }, () => {
      success(`Merged ${fragments.length} fragment(s) into ${plan.out}`);
      for (const line of formatMergeSummary(summary)) {
        console.log(chalk.gray(`  ${line}`));
      }
    });
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    if (
      err instanceof TemplateError ||
      err instanceof ConfigError ||
      err instanceof FileNotFoundError
    ) {
      error(err.message);
    } else {
      error("Merge failed", err);
    }
    return exitCodeFor(err);
  }
}

/**
 * Register the merge options and action on the root program.
 */
export function registerMergeCommand(program: Command): void {
  program
    .option("--base <path>", "Base template")
    .option("--fragments <paths...>", "Fragment templates, merged in the order given")
    .option("--out <path>", "Where to write the merged template")
    .option("--config <path>", "YAML file naming base, fragments, out and format")
    .action(async (options: MergeCommandOptions) => {
      const code = await runMerge(options);
      process.exit(code);
    });
}
