import chalk from 'chalk';

/**
 * Global output format (set by --json flag)
 */
let globalJsonMode = false;

/**
 * Debug output (set by --verbose flag or CFN_MERGE_DEBUG=1)
 */
let globalVerboseMode = false;

export function setJsonMode(enabled: boolean): void {
  globalJsonMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
  globalVerboseMode = enabled;
}

export function getVerboseMode(): boolean {
  return globalVerboseMode || process.env.CFN_MERGE_DEBUG === '1';
}

/**
 * Output data - JSON if --json flag, otherwise formatted
 */
export function output(data: unknown, formatter?: () => void): void {
  if (globalJsonMode) {
    console.log(JSON.stringify(data, null, 2));
  } else if (formatter) {
    formatter();
  } else {
    console.log(data);
  }
}

/**
 * Output success message
 */
export function success(message: string): void {
  if (globalJsonMode) {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('OK'), message);
  }
}

/**
 * Output error message
 */
export function error(message: string, details?: unknown): void {
  if (globalJsonMode) {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗'), message);
    if (details) {
      console.error(chalk.gray(String(details)));
    }
  }
}

/**
 * Debug line on stderr, only in verbose mode
 */
export function debug(message: string): void {
  if (getVerboseMode()) {
    console.error(chalk.gray(`[DEBUG] ${message}`));
  }
}
