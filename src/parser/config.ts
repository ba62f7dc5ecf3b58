import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import { ConfigError, FileNotFoundError } from '../errors.js';
import { MergeConfigSchema, type MergeConfig, type MergeFormat } from '../schema/index.js';
import { errors } from '../strings/index.js';
import { isMissingFile } from './files.js';

/**
 * Merge inputs as given on the command line. Anything left undefined falls
 * back to the config file.
 */
export interface MergeOverrides {
  base?: string;
  fragments?: string[];
  out?: string;
}

/**
 * Everything a merge run needs, fully resolved
 */
export interface MergePlan {
  base: string;
  fragments: string[];
  out: string;
  format: MergeFormat;
}

/**
 * Read and validate a merge config file.
 * Relative paths in it are resolved against the file's directory.
 */
export async function loadMergeConfig(configPath: string): Promise<MergeConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      throw new FileNotFoundError(configPath);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content) ?? {};
  } catch (err) {
    throw new ConfigError(
      errors.config.invalidConfig(configPath, err instanceof Error ? err.message : String(err)),
      configPath
    );
  }

  const parsed = MergeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(errors.config.invalidConfig(configPath, issues), configPath);
  }

  const configDir = path.dirname(configPath);
  const resolve = (p: string) => path.resolve(configDir, p);
  const config = parsed.data;

  return {
    ...config,
    base: config.base !== undefined ? resolve(config.base) : undefined,
    fragments: config.fragments?.map(resolve),
    out: config.out !== undefined ? resolve(config.out) : undefined,
  };
}

/**
 * Combine command-line values with an optional config file.
 * Command-line values win; base, at least one fragment and out are required.
 */
export async function resolveMergePlan(
  overrides: MergeOverrides,
  configPath?: string
): Promise<MergePlan> {
  const config: MergeConfig = configPath
    ? await loadMergeConfig(configPath)
    : MergeConfigSchema.parse({});

  const base = overrides.base ?? config.base;
  const fragments =
    overrides.fragments && overrides.fragments.length > 0 ? overrides.fragments : config.fragments;
  const out = overrides.out ?? config.out;

  if (!base) {
    throw new ConfigError(errors.config.missingBase);
  }
  if (!fragments || fragments.length === 0) {
    throw new ConfigError(errors.config.missingFragments);
  }
  if (!out) {
    throw new ConfigError(errors.config.missingOut);
  }

  return { base, fragments, out, format: config.format };
}
