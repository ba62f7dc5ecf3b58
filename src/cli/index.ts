#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { createRequire } from "node:module";
import { Command, CommanderError } from "commander";

// Read version from package.json at runtime
const require = createRequire(import.meta.url);
const { version } = require("../../package.json");

import { registerMergeCommand } from "./commands/index.js";
import { EXIT_CODES, formatExitCodeHelp } from "./exit-codes.js";
import { setJsonMode, setVerboseMode } from "./output.js";

const program = new Command();

program
  .name("cfn-merge")
  .description("Merge CloudFormation template fragments into a base template")
  .version(version)
  .option("--json", "Output in JSON format")
  .option("--verbose", "Print each file loaded and parser warnings")
  .addHelpText("after", `\n${formatExitCodeHelp()}`)
  .exitOverride()
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.json) {
      setJsonMode(true);
    }
    if (opts.verbose) {
      setVerboseMode(true);
    }
  });

registerMergeCommand(program);

// Export program for tests and embedding
export { program };

// Parse and execute (only when run directly)
// Use realpathSync to resolve symlinks (e.g., when run via npm link)
const scriptPath = realpathSync(process.argv[1]);
if (import.meta.url === `file://${scriptPath}`) {
  program.parseAsync().catch((err: unknown) => {
    // exitOverride() turns commander's own exits (help, version, bad flags) into errors
    if (err instanceof CommanderError) {
      process.exit(err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR);
    }
    console.error(err);
    process.exit(EXIT_CODES.ERROR);
  });
}
